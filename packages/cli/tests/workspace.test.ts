import { describe, it, expect, vi, afterEach } from 'vitest';
import { detectWorkspaceRoot } from '../src/workspace/detect.js';
import { resolveWorkspace, getArchivePath } from '../src/workspace/paths.js';
import { WorkspaceConfigSchema } from '@pta-reimburse/shared';
import * as fs from 'node:fs';
import * as path from 'node:path';

// Mocking fs to avoid actual disk I/O in simple unit tests
vi.mock('node:fs');

describe('Workspace Detection', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should detect workspace root when config/config.yaml exists', () => {
        const mockCwd = path.resolve('/home/test/pta');
        vi.spyOn(process, 'cwd').mockReturnValue(mockCwd);
        vi.spyOn(fs, 'existsSync').mockImplementation((p: fs.PathLike) => {
            return p.toString() === path.join(mockCwd, 'config', 'config.yaml');
        });

        expect(detectWorkspaceRoot()).toBe(mockCwd);
    });

    it('should find the root from a subdirectory', () => {
        const root = path.resolve('/home/test/pta');
        vi.spyOn(fs, 'existsSync').mockImplementation((p: fs.PathLike) => {
            return p.toString() === path.join(root, 'config', 'config.yaml');
        });

        expect(detectWorkspaceRoot(path.join(root, 'inbox', 'scans'))).toBe(root);
    });

    it('should return null if no workspace is found in parents', () => {
        vi.spyOn(fs, 'existsSync').mockReturnValue(false);

        expect(detectWorkspaceRoot(path.resolve('/'))).toBeNull();
    });
});

describe('Path Resolution', () => {
    const root = path.resolve('/work');
    const workspace = resolveWorkspace(root);

    it('should resolve standard paths correctly', () => {
        expect(workspace.root).toBe(root);
        expect(workspace.inbox).toBe(path.join(root, 'inbox'));
        expect(workspace.archive).toBe(path.join(root, 'archive'));
        expect(workspace.config.configPath).toBe(path.join(root, 'config', 'config.yaml'));
        expect(workspace.config.ledgerPath).toBe(path.join(root, 'ledger', 'reimbursements.xlsx'));
        expect(workspace.config.manifestPath).toBe(path.join(root, 'ledger', 'processed.json'));
    });

    it('should take the ledger file from config', () => {
        const relative = resolveWorkspace(root, WorkspaceConfigSchema.parse({ ledger: { file: 'books/2024.xlsx' } }));
        expect(relative.config.ledgerPath).toBe(path.join(root, 'books', '2024.xlsx'));

        const absolute = path.resolve('/shared/ledger.xlsx');
        const configured = resolveWorkspace(root, WorkspaceConfigSchema.parse({ ledger: { file: absolute } }));
        expect(configured.config.ledgerPath).toBe(absolute);
    });

    it('should generate monthly archive paths', () => {
        expect(getArchivePath(workspace, '2024-03')).toBe(path.join(root, 'archive', '2024-03'));
    });
});
