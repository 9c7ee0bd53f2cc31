import { detectWorkspaceRoot } from '../workspace/detect.js';
import { resolveWorkspace } from '../workspace/paths.js';
import { loadWorkspaceConfig } from '../workspace/config.js';
import { runPipeline } from '../pipeline/runner.js';
import { log, success, warn, arrow, error } from '../utils/console.js';
import { createConsoleIO, isInteractive } from '../utils/prompt.js';
import { errorMessage } from '../utils/fs.js';
import type { WorkspaceConfig } from '@pta-reimburse/shared';
import type { ProcessOptions } from '../types.js';

/**
 * `reimburse process`: record form submissions in the workspace ledger.
 *
 * @returns Process exit code
 */
export async function processForms(files: string[], options: ProcessOptions): Promise<number> {
    log('\nPTA Reimbursements - Processing forms');

    arrow('Detecting workspace...');
    const root = options.workspace ?? detectWorkspaceRoot();
    if (!root) {
        error('Error: Workspace not found.');
        log('Expected "config/config.yaml" in the current directory or one of its parents.');
        return 1;
    }

    let config: WorkspaceConfig;
    try {
        config = loadWorkspaceConfig(resolveWorkspace(root).config.configPath);
    } catch (err) {
        error(`Error: Failed to load config/config.yaml. ${errorMessage(err)}`);
        return 1;
    }
    const workspace = resolveWorkspace(root, config);
    success(`Workspace: ${workspace.root}`);

    const io = createConsoleIO();
    const state = await runPipeline({
        workspace,
        config,
        options,
        io,
        interactive: isInteractive(options),
        inputs: files,
    }).finally(() => io.close());

    log('\n--- Processing Summary ---');

    for (const w of state.warnings) {
        warn(w);
    }

    for (const e of state.errors) {
        error(`ERROR [${e.step}]: ${e.message}`);
    }
    if (state.errors.some(e => e.fatal)) {
        log('\n✖ Processing failed with fatal errors.');
        return 1;
    }

    const rows = state.forms.flatMap(f => (f.ledgerRow ? [f.ledgerRow] : []));
    const skipped = state.forms.filter(f => f.status === 'duplicate').length;

    for (const row of rows) {
        arrow(`#${row.id} ${row.submitted_by || '(no requestor)'} ${row.amount_submitted || '(no amount)'}`);
    }
    arrow(`Forms: ${state.forms.length}, recorded: ${rows.length}, duplicates skipped: ${skipped}`);

    if (options.dryRun) {
        log('\n[DRY RUN] No files were written or archived.');
    } else if (rows.length > 0) {
        success(`Ledger updated: ${workspace.config.ledgerPath}`);
    }

    return 0;
}
