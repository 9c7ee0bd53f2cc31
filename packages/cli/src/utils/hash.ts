import { createHash } from 'node:crypto';
import { readFile } from 'node:fs/promises';

/**
 * SHA-256 of OCR text or raw bytes, prefixed with 'sha256:'.
 */
export function hashContent(content: string | Buffer): string {
    return `sha256:${createHash('sha256').update(content).digest('hex')}`;
}

/**
 * Hash of a file's bytes, the key used by the processed-files manifest.
 */
export async function hashFile(filePath: string): Promise<string> {
    return hashContent(await readFile(filePath));
}
