import { applyCorrection, resolveDisplayLabel, DISPLAY_ORDER } from '@pta-reimburse/core';
import type { DisplayRecord } from '@pta-reimburse/core';
import type { PipelineStep } from '../types.js';
import { pendingForms } from '../types.js';
import type { PromptIO } from '../../types.js';
import { formatDisplayTable } from '../../utils/table.js';

const REVIEW_HELP = "Enter a field name to edit it, 'raw' to see the OCR text, Enter to accept, or 'quit' to cancel.";

/**
 * Shows the extracted values and lets the reviewer correct them.
 *
 * @returns The accepted mapping, or null when the reviewer quits
 */
export async function reviewDisplay(
    display: DisplayRecord,
    rawText: string,
    title: string,
    io: PromptIO
): Promise<DisplayRecord | null> {
    let current = display;

    while (true) {
        io.print('');
        io.print(formatDisplayTable(current, title));
        io.print(REVIEW_HELP);

        const answer = (await io.ask('> ')).trim();
        const command = answer.toLowerCase();

        if (command === '' || command === 'ok') {
            return current;
        }
        if (command === 'quit' || command === 'q') {
            return null;
        }
        if (command === 'raw') {
            io.print('\n=== Raw OCR Text ===');
            io.print(rawText);
            continue;
        }

        const field = resolveDisplayLabel(answer);
        if (field === null) {
            io.print(`Unknown field '${answer}'. Available: ${DISPLAY_ORDER.join(', ')}`);
            continue;
        }

        const value = await io.ask(`New value for ${field} [${current[field] || '(empty)'}]: `);
        const result = applyCorrection(current, field, value);
        if (result.ok && result.changed) {
            current = result.display;
            io.print(`✓ ${result.field} updated`);
        }
    }
}

/**
 * Step 4: Review
 * Interactive only; otherwise the extracted values go through unchanged.
 */
export const reviewForms: PipelineStep = async (state) => {
    if (!state.interactive) {
        return state;
    }

    for (const form of pendingForms(state)) {
        if (!form.display) continue;

        const reviewed = await reviewDisplay(
            form.display,
            form.text ?? '',
            `Extracted Data: ${form.file.filename}`,
            state.io
        );

        if (reviewed === null) {
            state.errors.push({
                step: 'review',
                message: `Review cancelled at ${form.file.filename}. Nothing was written.`,
                fatal: true
            });
            return state;
        }
        form.display = reviewed;
    }

    return state;
};
