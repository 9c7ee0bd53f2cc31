import { readFile } from 'node:fs/promises';
import { extractFieldsWithTrace, toDisplayRecord } from '@pta-reimburse/core';
import type { PipelineStep } from '../types.js';
import { pendingForms } from '../types.js';
import { errorMessage } from '../../utils/fs.js';

/**
 * Step 3: Extraction
 * Reads each pending form and runs the field extractor on its text.
 */
export const extractForms: PipelineStep = async (state) => {
    for (const form of pendingForms(state)) {
        try {
            form.text = await readFile(form.file.path, 'utf-8');
        } catch (err) {
            form.status = 'failed';
            state.errors.push({
                step: 'extract',
                message: `Failed to read ${form.file.filename}: ${errorMessage(err)}`,
                fatal: false,
                error: err
            });
            continue;
        }

        form.extraction = extractFieldsWithTrace(form.text);
        form.display = toDisplayRecord(form.extraction.record);

        const found = Object.values(form.display).filter(v => v !== '').length;
        if (found === 0) {
            state.warnings.push(`${form.file.filename}: no fields recognized.`);
        }
    }

    return state;
};
