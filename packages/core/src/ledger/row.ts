/**
 * Ledger row mapping for reviewed form data.
 *
 * Input is the display mapping (possibly corrected by a reviewer), not the
 * FormRecord, so reviewer edits flow into the ledger.
 */

import { DISPLAY_LABELS, LEDGER, LedgerRowSchema } from '../types/index.js';
import type { DisplayRecord, LedgerRow } from '../types/index.js';
import { formatMdyDate, parseFormDate } from '../utils/date-parse.js';
import type { LedgerRowOptions } from './types.js';

/**
 * Grade portion of a Teacher/Grade value: text after the last "/" when
 * present, otherwise the whole value.
 */
export function extractGrade(teacherGrade: string): string {
    if (!teacherGrade.includes('/')) return teacherGrade;
    const parts = teacherGrade.split('/');
    return parts[parts.length - 1].trim();
}

/**
 * Notes column: a payment TODO followed by event, child and delivery details.
 */
export function buildNotes(display: DisplayRecord, paymentType: string): string {
    const notes: string[] = [];

    const payment = paymentType.toLowerCase();
    if (payment === 'check' || payment === 'cheque') {
        notes.push(LEDGER.NOTE_WRITE_CHECK);
    } else if (payment === 'amazon' || payment === 'debit') {
        notes.push(LEDGER.NOTE_ORDER_AMAZON);
    }

    const event = display[DISPLAY_LABELS.event];
    const child = display[DISPLAY_LABELS.child_name];
    const delivery = display[DISPLAY_LABELS.delivery];

    if (event) notes.push(`Event: ${event}`);
    if (child) notes.push(`Child: ${child}`);
    if (delivery) notes.push(`Delivery: ${delivery}`);

    return notes.join('; ');
}

/**
 * Build the A-T row for one reimbursement request.
 *
 * Year and month come from the form's Date when it is MM-DD-YYYY,
 * MM/DD/YYYY, MM-DD-YY or MM/DD/YY; any other shape leaves them as 0 and "".
 *
 * @throws ZodError if options produce an invalid row (e.g. id < 1)
 */
export function createLedgerRow(display: DisplayRecord, options: LedgerRowOptions): LedgerRow {
    const paymentType = options.paymentType ?? LEDGER.DEFAULT_PAYMENT_TYPE;
    const dateParts = parseFormDate(display[DISPLAY_LABELS.date]);

    const amount = display[DISPLAY_LABELS.amount];

    return LedgerRowSchema.parse({
        id: options.id,
        income_expense: LEDGER.INCOME_EXPENSE,
        year: dateParts?.year ?? 0,
        month: dateParts?.month ?? '',
        date_received: options.receivedDate ? formatMdyDate(options.receivedDate) : '',
        submitted_by: display[DISPLAY_LABELS.requestor],
        grade: extractGrade(display[DISPLAY_LABELS.teacher_grade]),
        type: paymentType,
        budget_category: options.budgetCategory,
        budget_item: options.budgetItem,
        amount_submitted: amount.startsWith('$') ? amount.slice(1) : amount,
        amount_paid: '',
        check_number: '',
        myptez: '',
        bank: '',
        reconcile: '',
        report: '',
        all_mats_printed: '',
        double_signed: '',
        notes: buildNotes(display, paymentType),
    });
}

/**
 * Next ledger ID: one more than the largest numeric value in the ID column.
 * Headers and other non-numeric cells are ignored.
 */
export function nextLedgerId(idColumn: readonly unknown[]): number {
    let maxId = 0;
    for (const cell of idColumn) {
        const id = toInteger(cell);
        if (id !== null && id > maxId) {
            maxId = id;
        }
    }
    return maxId + 1;
}

function toInteger(cell: unknown): number | null {
    if (typeof cell === 'number') {
        return Number.isInteger(cell) ? cell : null;
    }
    if (typeof cell === 'string' && /^\s*-?\d+\s*$/.test(cell)) {
        return parseInt(cell, 10);
    }
    return null;
}
