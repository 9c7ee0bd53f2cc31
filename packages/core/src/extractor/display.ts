/**
 * Display projection of a FormRecord and reviewer corrections.
 *
 * Corrections never touch the record: each one returns a new mapping.
 */

import { DISPLAY_LABELS, FIELD_KEYS } from '../types/index.js';
import type { DisplayLabel, DisplayRecord, FormRecord } from '../types/index.js';

/**
 * Display labels in projection order.
 */
export const DISPLAY_ORDER: readonly DisplayLabel[] = FIELD_KEYS.map((key) => DISPLAY_LABELS[key]);

/**
 * Project a record to its ordered, human-labeled mapping. raw_text is excluded.
 */
export function toDisplayRecord(record: FormRecord): DisplayRecord {
    return Object.freeze({
        [DISPLAY_LABELS.requestor]: record.requestor,
        [DISPLAY_LABELS.date]: record.date,
        [DISPLAY_LABELS.amount]: record.amount,
        [DISPLAY_LABELS.email]: record.email,
        [DISPLAY_LABELS.phone]: record.phone,
        [DISPLAY_LABELS.child_name]: record.child_name,
        [DISPLAY_LABELS.teacher_grade]: record.teacher_grade,
        [DISPLAY_LABELS.reimbursement_type]: record.reimbursement_type,
        [DISPLAY_LABELS.event]: record.event,
        [DISPLAY_LABELS.payable_to]: record.payable_to,
        [DISPLAY_LABELS.delivery]: record.delivery,
    });
}

/**
 * Outcome of a reviewer correction.
 */
export type CorrectionResult =
    | { ok: true; display: DisplayRecord; field: DisplayLabel; changed: boolean }
    | { ok: false; available: readonly DisplayLabel[] };

/**
 * Find the display label matching a reviewer's input, ignoring case.
 */
export function resolveDisplayLabel(input: string): DisplayLabel | null {
    const wanted = input.trim().toLowerCase();
    return DISPLAY_ORDER.find((label) => label.toLowerCase() === wanted) ?? null;
}

/**
 * Replace one field of a display mapping.
 *
 * @param display - Current mapping (not modified)
 * @param fieldName - Display label, matched case-insensitively
 * @param value - Replacement; blank keeps the current value
 */
export function applyCorrection(
    display: DisplayRecord,
    fieldName: string,
    value: string
): CorrectionResult {
    const field = resolveDisplayLabel(fieldName);
    if (field === null) {
        return { ok: false, available: DISPLAY_ORDER };
    }

    const replacement = value.trim();
    if (replacement === '' || replacement === display[field]) {
        return { ok: true, display, field, changed: false };
    }

    return {
        ok: true,
        display: Object.freeze({ ...display, [field]: replacement }),
        field,
        changed: true,
    };
}
