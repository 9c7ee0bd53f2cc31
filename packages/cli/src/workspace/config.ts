import { existsSync, readFileSync } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { parse } from 'yaml';
import {
    ProcessedManifestSchema,
    WorkspaceConfigSchema,
    type ProcessedManifest,
    type WorkspaceConfig,
} from '@pta-reimburse/shared';

/**
 * Loads config/config.yaml. A missing or empty file yields the defaults.
 *
 * @throws ZodError if the file has values of the wrong shape
 */
export function loadWorkspaceConfig(configPath: string): WorkspaceConfig {
    if (!existsSync(configPath)) {
        return WorkspaceConfigSchema.parse({});
    }
    const data: unknown = parse(readFileSync(configPath, 'utf-8'));
    return WorkspaceConfigSchema.parse(data ?? {});
}

/**
 * Loads the processed-files manifest, or an empty one if none exists yet.
 */
export function loadProcessedManifest(manifestPath: string): ProcessedManifest {
    if (!existsSync(manifestPath)) {
        return { processed: {} };
    }
    const data: unknown = JSON.parse(readFileSync(manifestPath, 'utf-8'));
    return ProcessedManifestSchema.parse(data);
}

export async function saveProcessedManifest(manifestPath: string, manifest: ProcessedManifest): Promise<void> {
    await mkdir(dirname(manifestPath), { recursive: true });
    await writeFile(manifestPath, `${JSON.stringify(manifest, null, 2)}\n`);
}
