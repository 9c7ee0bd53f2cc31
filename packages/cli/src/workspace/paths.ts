import { isAbsolute, join } from 'node:path';
import type { WorkspaceConfig } from '@pta-reimburse/shared';
import { DEFAULTS } from '@pta-reimburse/shared';
import type { Workspace } from '../types.js';

/**
 * Constructs a Workspace object from a root path.
 * The ledger location comes from config when given, relative to the root.
 */
export function resolveWorkspace(root: string, config?: WorkspaceConfig): Workspace {
    const ledgerFile = config?.ledger.file ?? DEFAULTS.LEDGER_FILE;

    return {
        root,
        inbox: join(root, 'inbox'),
        archive: join(root, 'archive'),
        config: {
            configPath: join(root, 'config', 'config.yaml'),
            ledgerPath: isAbsolute(ledgerFile) ? ledgerFile : join(root, ledgerFile),
            manifestPath: join(root, 'ledger', 'processed.json'),
        },
    };
}

export function getArchivePath(workspace: Workspace, month: string): string {
    return join(workspace.archive, month);
}
