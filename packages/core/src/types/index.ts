/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
export type {
    FormRecord,
    FieldKey,
    DisplayLabel,
    DisplayRecord,
    ExtractionTrace,
    LedgerRow,
} from '@pta-reimburse/shared';

export {
    FormRecordSchema,
    LedgerRowSchema,
    FIELD_KEYS,
    DISPLAY_LABELS,
    CHECKBOX_GLYPHS,
    REIMBURSEMENT_TYPES,
    DELIVERY_OPTIONS,
    KNOWN_EVENTS,
    SEPARATORS,
    CAPTURE,
    LEDGER,
} from '@pta-reimburse/shared';
