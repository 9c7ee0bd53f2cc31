/**
 * Zod schemas for reimbursement form data structures.
 *
 * FormRecord values are plain strings: "" means the field was not found.
 */

import { z } from 'zod';
import { DEFAULTS, DISPLAY_LABELS, FIELD_KEYS } from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

/**
 * A recognized field value: empty, or trimmed with single internal spaces.
 */
const fieldValue = z.string().refine(
    (v) => v === '' || (v === v.trim() && !/\s{2,}|[\n\r\t]/.test(v)),
    'Must be empty or a trimmed, whitespace-collapsed single line'
);

/**
 * MM/DD/YYYY, as written into the ledger.
 */
const mdyDateString = z.string().regex(/^\d{2}\/\d{2}\/\d{4}$/, 'Must be MM/DD/YYYY format');

// ============================================================================
// Form Record Schemas
// ============================================================================

/**
 * Structured record extracted from one combined OCR text.
 */
export const FormRecordSchema = z.object({
    requestor: fieldValue,
    date: fieldValue,
    amount: fieldValue,
    email: fieldValue,
    phone: fieldValue,
    child_name: fieldValue,
    teacher_grade: fieldValue,
    reimbursement_type: fieldValue,
    event: fieldValue,
    payable_to: fieldValue,
    delivery: fieldValue,
    raw_text: z.string(),
});

export type FormRecord = Readonly<z.infer<typeof FormRecordSchema>>;

export const FieldKeySchema = z.enum(FIELD_KEYS);

export type FieldKey = z.infer<typeof FieldKeySchema>;

export type DisplayLabel = (typeof DISPLAY_LABELS)[FieldKey];

/**
 * Ordered label → value projection of a FormRecord, without raw_text.
 */
export type DisplayRecord = Readonly<Record<DisplayLabel, string>>;

/**
 * Which cascade rule produced each field (null when nothing matched).
 */
export type ExtractionTrace = Readonly<Record<FieldKey, string | null>>;

// ============================================================================
// Ledger Schemas
// ============================================================================

/**
 * One spreadsheet row, columns A-T.
 */
export const LedgerRowSchema = z.object({
    id: z.number().int().min(1),
    income_expense: z.string(),
    year: z.number().int().min(0),
    month: z.string(),
    date_received: z.union([mdyDateString, z.literal('')]),
    submitted_by: z.string(),
    grade: z.string(),
    type: z.string(),
    budget_category: z.string(),
    budget_item: z.string(),
    amount_submitted: z.string(),
    amount_paid: z.string(),
    check_number: z.string(),
    myptez: z.string(),
    bank: z.string(),
    reconcile: z.string(),
    report: z.string(),
    all_mats_printed: z.string(),
    double_signed: z.string(),
    notes: z.string(),
});

export type LedgerRow = z.infer<typeof LedgerRowSchema>;

/**
 * Hashes of inputs already written to the ledger.
 */
export const ProcessedManifestSchema = z.object({
    processed: z.record(
        z.string(),
        z.object({
            ledger_id: z.number().int().min(1),
            processed_at: z.string(),
            source_file: z.string(),
        })
    ),
});

export type ProcessedManifest = z.infer<typeof ProcessedManifestSchema>;

// ============================================================================
// Workspace Configuration
// ============================================================================

/**
 * config/config.yaml in a workspace root.
 */
export const WorkspaceConfigSchema = z.object({
    ledger: z
        .object({
            file: z.string().min(1).default(DEFAULTS.LEDGER_FILE),
            sheet_name: z.string().min(1).default(DEFAULTS.SHEET_NAME),
        })
        .default({}),
    field_mappings: z
        .object({
            payment_types: z.array(z.string().min(1)).min(1).default([...DEFAULTS.PAYMENT_TYPES]),
            budget_categories: z.array(z.string().min(1)).default([]),
            budget_items: z.array(z.string().min(1)).default([]),
        })
        .default({}),
});

export type WorkspaceConfig = z.infer<typeof WorkspaceConfigSchema>;
