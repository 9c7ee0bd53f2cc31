import type { PipelineStep } from '../types.js';
import { pendingForms } from '../types.js';
import { loadProcessedManifest } from '../../workspace/config.js';
import { errorMessage } from '../../utils/fs.js';

/**
 * Step 2: Duplicate Check
 * Skips inputs whose content hash is already in processed.json, and repeats
 * of the same content within this run. --force reprocesses recorded inputs.
 */
export const checkDuplicates: PipelineStep = async (state) => {
    try {
        state.manifest = loadProcessedManifest(state.workspace.config.manifestPath);
    } catch (err) {
        state.errors.push({
            step: 'duplicate-check',
            message: `Cannot load ${state.workspace.config.manifestPath}: ${errorMessage(err)}`,
            fatal: true,
            error: err
        });
        return state;
    }

    const seenThisRun = new Set<string>();

    for (const form of state.forms) {
        const { hash, filename } = form.file;

        if (seenThisRun.has(hash)) {
            form.status = 'duplicate';
            state.warnings.push(`Skipping ${filename}: same content as another input in this run.`);
            continue;
        }
        seenThisRun.add(hash);

        const previous = state.manifest.processed[hash];
        if (!previous) continue;

        if (state.options.force) {
            state.warnings.push(`Reprocessing ${filename} (already recorded as ledger ID ${previous.ledger_id}).`);
        } else {
            form.status = 'duplicate';
            state.warnings.push(
                `Skipping ${filename}: already recorded as ledger ID ${previous.ledger_id} on ${previous.processed_at}. Use --force to reprocess.`
            );
        }
    }

    if (state.forms.length > 0 && pendingForms(state).length === 0) {
        state.warnings.push('All inputs have already been processed. Nothing to do.');
    }

    return state;
};
