/**
 * Constants for the reimbursement form engine.
 */

/**
 * Internal FormRecord field keys, in display order.
 */
export const FIELD_KEYS = [
    'requestor',
    'date',
    'amount',
    'email',
    'phone',
    'child_name',
    'teacher_grade',
    'reimbursement_type',
    'event',
    'payable_to',
    'delivery',
] as const;

/**
 * Human-readable labels used by the display projection.
 * Order here is the order of the projected mapping.
 */
export const DISPLAY_LABELS = {
    requestor: 'Requestor',
    date: 'Date',
    amount: 'Amount',
    email: 'Email',
    phone: 'Phone',
    child_name: 'Child',
    teacher_grade: 'Teacher/Grade',
    reimbursement_type: 'Type',
    event: 'Event',
    payable_to: 'Payable To',
    delivery: 'Delivery',
} as const;

/**
 * Glyphs and sequences a scanned form uses to mark a selected option.
 * Matched against lowercased text.
 */
export const CHECKBOX_GLYPHS = ['☑', '✓', '✔', '[x]', 'x'] as const;

/**
 * Reimbursement categories, in resolution priority order.
 */
export const REIMBURSEMENT_TYPES = ['Home Room Parent', 'Teacher', 'PTA Program'] as const;

/**
 * Delivery preferences, in resolution priority order.
 */
export const DELIVERY_OPTIONS = ['Teacher mailbox', 'Send home with child', 'Pickup'] as const;

/**
 * Recurring school events recognized anywhere in the text when no label is present.
 */
export const KNOWN_EVENTS = [
    { name: 'winter-party', pattern: 'Winter\\s+Party' },
    { name: 'fall-party', pattern: 'Fall\\s+Party' },
    { name: 'spring-party', pattern: 'Spring\\s+Party' },
    { name: 'valentines-party', pattern: "Valentine(?:['’]?s)?\\s+(?:Day\\s+)?Party" },
    { name: 'halloween-party', pattern: 'Halloween\\s+Party' },
    { name: 'end-of-year-party', pattern: 'End\\s+of\\s+Year\\s+Party' },
    { name: 'field-day', pattern: 'Field\\s+Day' },
    { name: 'teacher-appreciation', pattern: 'Teacher\\s+Appreciation' },
] as const;

/**
 * Separators inserted by callers that concatenate several OCR outputs.
 * The engine treats them as ordinary text.
 */
export const SEPARATORS = {
    PAGE_BREAK: '\n\n--- Page Break ---\n\n',
    NEXT_DOCUMENT: '\n\n=== Next Attachment ===\n\n',
} as const;

/**
 * Capture acceptance thresholds.
 * A cleaned capture shorter than MIN_LENGTH is treated as OCR noise.
 */
export const CAPTURE = {
    MIN_LENGTH: 2,
    MIN_EVENT_LENGTH: 3,
} as const;

/**
 * Workspace configuration defaults.
 */
export const DEFAULTS = {
    LEDGER_FILE: 'ledger/reimbursements.xlsx',
    SHEET_NAME: 'Income and Expenses',
    PAYMENT_TYPES: ['Check', 'Debit', 'Amazon'],
} as const;

/**
 * Fixed values written into every ledger row.
 */
export const LEDGER = {
    INCOME_EXPENSE: 'Expense',
    DEFAULT_PAYMENT_TYPE: 'Check',
    NOTE_WRITE_CHECK: 'TODO: WRITE CHECK',
    NOTE_ORDER_AMAZON: 'TODO: ORDER ON AMAZON',
} as const;
