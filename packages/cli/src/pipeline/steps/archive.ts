import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { formatYearMonth } from '@pta-reimburse/core';
import type { PipelineStep } from '../types.js';
import { getArchivePath } from '../../workspace/paths.js';
import { saveProcessedManifest } from '../../workspace/config.js';
import { errorMessage, moveFile } from '../../utils/fs.js';

/**
 * Step 7: Archiving
 * Records the hash of every form written to the ledger, then moves inbox
 * files into archive/<YYYY-MM>/.
 */
export const archiveInputs: PipelineStep = async (state) => {
    if (state.options.dryRun) {
        state.warnings.push('Dry run: Skipping archival.');
        return state;
    }

    if (state.errors.some(e => e.fatal)) {
        state.warnings.push('Archival skipped due to previous fatal errors.');
        return state;
    }

    const recorded = state.forms.filter(f => f.status === 'recorded');
    if (recorded.length === 0) {
        return state;
    }

    const processedAt = state.startedAt.toISOString();
    for (const form of recorded) {
        if (!form.ledgerRow) continue;
        state.manifest.processed[form.file.hash] = {
            ledger_id: form.ledgerRow.id,
            processed_at: processedAt,
            source_file: form.file.filename
        };
    }

    try {
        await saveProcessedManifest(state.workspace.config.manifestPath, state.manifest);
    } catch (err) {
        state.errors.push({
            step: 'archive',
            message: `Failed to save ${state.workspace.config.manifestPath}: ${errorMessage(err)}`,
            fatal: false,
            error: err
        });
    }

    const toMove = recorded.filter(f => f.file.fromInbox);
    if (toMove.length === 0) {
        return state;
    }

    const archivePath = getArchivePath(state.workspace, formatYearMonth(state.startedAt));

    try {
        await mkdir(archivePath, { recursive: true });
        for (const form of toMove) {
            await moveFile(form.file.path, join(archivePath, form.file.filename));
        }
    } catch (err) {
        state.errors.push({
            step: 'archive',
            message: `Failed to archive files to ${archivePath}: ${errorMessage(err)}`,
            fatal: false,
            error: err
        });
    }

    return state;
};
