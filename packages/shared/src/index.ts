// Schemas
export {
    FormRecordSchema,
    FieldKeySchema,
    LedgerRowSchema,
    ProcessedManifestSchema,
    WorkspaceConfigSchema,
} from './schemas.js';

// Types
export type {
    FormRecord,
    FieldKey,
    DisplayLabel,
    DisplayRecord,
    ExtractionTrace,
    LedgerRow,
    ProcessedManifest,
    WorkspaceConfig,
} from './schemas.js';

// Constants
export {
    FIELD_KEYS,
    DISPLAY_LABELS,
    CHECKBOX_GLYPHS,
    REIMBURSEMENT_TYPES,
    DELIVERY_OPTIONS,
    KNOWN_EVENTS,
    SEPARATORS,
    CAPTURE,
    DEFAULTS,
    LEDGER,
} from './constants.js';
