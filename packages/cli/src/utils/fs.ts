import { copyFile, rename, unlink } from 'node:fs/promises';

/**
 * Message of a thrown value, whatever was thrown.
 */
export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/**
 * Moves a file, falling back to copy + delete across devices.
 */
export async function moveFile(src: string, dest: string): Promise<void> {
    try {
        await rename(src, dest);
    } catch (err) {
        if (err instanceof Error && 'code' in err && err.code === 'EXDEV') {
            await copyFile(src, dest);
            await unlink(src);
        } else {
            throw err;
        }
    }
}

/**
 * Calendar day of a local timestamp as a UTC midnight Date.
 */
export function toUtcDay(date: Date): Date {
    return new Date(Date.UTC(date.getFullYear(), date.getMonth(), date.getDate()));
}
