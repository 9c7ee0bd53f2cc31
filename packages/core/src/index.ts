// Types (re-exported from shared)
export type {
    FormRecord,
    FieldKey,
    DisplayLabel,
    DisplayRecord,
    ExtractionTrace,
    LedgerRow,
} from './types/index.js';

export {
    FormRecordSchema,
    LedgerRowSchema,
    FIELD_KEYS,
    DISPLAY_LABELS,
    SEPARATORS,
} from './types/index.js';

// Utils
export { normalizeLineEndings, collapseWhitespace } from './utils/normalize.js';
export { parseFormDate, formatMdyDate, formatYearMonth } from './utils/date-parse.js';
export type { FormDateParts } from './utils/date-parse.js';

// Extractor
export {
    extractFields,
    extractFieldsWithTrace,
    combinePages,
    combineDocuments,
    toDisplayRecord,
    applyCorrection,
    resolveDisplayLabel,
    DISPLAY_ORDER,
    applyRule,
    runCascade,
    classify,
    formatAmount,
    REQUESTOR_RULES,
    DATE_RULES,
    AMOUNT_RULES,
    EMAIL_RULES,
    PHONE_RULES,
    CHILD_NAME_RULES,
    TEACHER_GRADE_TIERS,
    REIMBURSEMENT_TYPE_RULES,
    EVENT_RULES,
    PAYABLE_TO_RULES,
    DELIVERY_RULES,
} from './extractor/index.js';
export type {
    ExtractionOutput,
    CorrectionResult,
    CaptureRule,
    CategoryRule,
    FieldMatch,
    ReimbursementType,
    DeliveryOption,
} from './extractor/index.js';

// Ledger
export { createLedgerRow, extractGrade, buildNotes, nextLedgerId } from './ledger/index.js';
export type { LedgerRowOptions } from './ledger/index.js';
