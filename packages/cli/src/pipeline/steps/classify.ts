import { LEDGER } from '@pta-reimburse/shared';
import type { PipelineStep } from '../types.js';
import { pendingForms } from '../types.js';
import { selectFromList } from '../../utils/prompt.js';

/**
 * Step 5: Classification
 * Picks payment type, budget category and budget item for each form from the
 * configured lists. Non-interactive runs take the first entry of each list.
 */
export const classifyForms: PipelineStep = async (state) => {
    const { payment_types, budget_categories, budget_items } = state.config.field_mappings;

    for (const form of pendingForms(state)) {
        if (!state.interactive) {
            form.paymentType = payment_types[0] ?? LEDGER.DEFAULT_PAYMENT_TYPE;
            form.budgetCategory = budget_categories[0] ?? '';
            form.budgetItem = budget_items[0] ?? '';
            continue;
        }

        state.io.print(`\n=== Classify: ${form.file.filename} ===`);
        form.paymentType = await selectFromList(payment_types, 'Payment type', state.io);
        form.budgetCategory = await selectFromList(budget_categories, 'Budget category', state.io);
        form.budgetItem = await selectFromList(budget_items, 'Budget item', state.io);
    }

    return state;
};
