import { createLedgerRow, nextLedgerId } from '@pta-reimburse/core';
import type { PipelineStep } from '../types.js';
import { pendingForms } from '../types.js';
import {
    openLedgerWorkbook,
    getLedgerSheet,
    readIdColumn,
    appendLedgerRow,
    writeLedgerWorkbook
} from '../../excel/ledger.js';
import { errorMessage } from '../../utils/fs.js';

/**
 * Step 6: Ledger Append
 * Numbers each form after the last ID in the ledger and appends its row.
 * Dry runs build the rows but leave the workbook untouched.
 */
export const appendToLedger: PipelineStep = async (state) => {
    const forms = pendingForms(state).filter(f => f.display !== undefined);
    if (forms.length === 0) {
        return state;
    }

    const { ledgerPath } = state.workspace.config;

    try {
        const workbook = await openLedgerWorkbook(ledgerPath);
        const sheet = getLedgerSheet(workbook, state.config.ledger.sheet_name);
        let id = nextLedgerId(readIdColumn(sheet));

        for (const form of forms) {
            if (!form.display) continue;
            const row = createLedgerRow(form.display, {
                id,
                receivedDate: form.file.receivedAt,
                budgetCategory: form.budgetCategory ?? '',
                budgetItem: form.budgetItem ?? '',
                paymentType: form.paymentType
            });
            form.ledgerRow = row;
            appendLedgerRow(sheet, row);
            id++;
        }

        if (state.options.dryRun) {
            state.warnings.push(`Dry run: ${forms.length} row(s) not written to ${ledgerPath}.`);
            return state;
        }

        await writeLedgerWorkbook(workbook, ledgerPath);
        for (const form of forms) {
            form.status = 'recorded';
        }
    } catch (err) {
        state.errors.push({
            step: 'ledger',
            message: `Failed to update ledger ${ledgerPath}: ${errorMessage(err)}`,
            fatal: true,
            error: err
        });
    }

    return state;
};
