export { extractFields, extractFieldsWithTrace, combinePages, combineDocuments, RECOGNIZERS } from './assemble.js';
export type { ExtractionOutput } from './assemble.js';
export { toDisplayRecord, applyCorrection, resolveDisplayLabel, DISPLAY_ORDER } from './display.js';
export type { CorrectionResult } from './display.js';
export { applyRule, runCascade, classify, acceptCapture } from './cascade.js';
export type { CaptureRule, CategoryRule, FieldMatch, Recognizer } from './types.js';
export { REQUESTOR_RULES, recognizeRequestor } from './fields/requestor.js';
export { DATE_RULES, recognizeDate } from './fields/date.js';
export { AMOUNT_RULES, recognizeAmount, formatAmount } from './fields/amount.js';
export { EMAIL_RULES, PHONE_RULES, recognizeEmail, recognizePhone } from './fields/contact.js';
export { CHILD_NAME_RULES, recognizeChildName } from './fields/child-name.js';
export {
    COMBINED_LABEL_RULES,
    TEACHER_LABEL_RULES,
    GRADE_LABEL_RULES,
    UNLABELED_RULES,
    TEACHER_GRADE_TIERS,
    recognizeTeacherGrade,
} from './fields/teacher-grade.js';
export { REIMBURSEMENT_TYPE_RULES, recognizeReimbursementType } from './fields/reimbursement-type.js';
export type { ReimbursementType } from './fields/reimbursement-type.js';
export { EVENT_RULES, recognizeEvent, stripEventLabel } from './fields/event.js';
export { PAYABLE_TO_RULES, recognizePayableTo } from './fields/payable-to.js';
export { DELIVERY_RULES, recognizeDelivery } from './fields/delivery.js';
export type { DeliveryOption } from './fields/delivery.js';
