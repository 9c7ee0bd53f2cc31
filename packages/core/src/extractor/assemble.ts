/**
 * Record assembly: normalize once, run every recognizer against the same
 * text, and freeze the result.
 *
 * ARCHITECTURAL NOTE: No I/O, no console.*, no exceptions. Text with no
 * recognizable fields yields a record of empty strings.
 */

import { SEPARATORS } from '../types/index.js';
import type { ExtractionTrace, FieldKey, FormRecord } from '../types/index.js';
import { normalizeLineEndings } from '../utils/normalize.js';
import { recognizeAmount } from './fields/amount.js';
import { recognizeChildName } from './fields/child-name.js';
import { recognizeEmail, recognizePhone } from './fields/contact.js';
import { recognizeDate } from './fields/date.js';
import { recognizeDelivery } from './fields/delivery.js';
import { recognizeEvent } from './fields/event.js';
import { recognizePayableTo } from './fields/payable-to.js';
import { recognizeReimbursementType } from './fields/reimbursement-type.js';
import { recognizeRequestor } from './fields/requestor.js';
import { recognizeTeacherGrade } from './fields/teacher-grade.js';
import type { Recognizer } from './types.js';

/**
 * Recognizer for each FormRecord field. Recognizers read only the text,
 * never each other's output, so their order is irrelevant.
 */
export const RECOGNIZERS: Readonly<Record<FieldKey, Recognizer>> = {
    requestor: recognizeRequestor,
    date: recognizeDate,
    amount: recognizeAmount,
    email: recognizeEmail,
    phone: recognizePhone,
    child_name: recognizeChildName,
    teacher_grade: recognizeTeacherGrade,
    reimbursement_type: recognizeReimbursementType,
    event: recognizeEvent,
    payable_to: recognizePayableTo,
    delivery: recognizeDelivery,
};

/**
 * Extraction output with the rule that produced each field.
 */
export interface ExtractionOutput {
    record: FormRecord;
    trace: ExtractionTrace;
}

/**
 * Extract a FormRecord and its rule trace from combined OCR text.
 *
 * @param ocrText - OCR text, possibly several pages/documents joined by separators
 * @returns Frozen record (raw_text is ocrText verbatim) and frozen trace
 */
export function extractFieldsWithTrace(ocrText: string): ExtractionOutput {
    const text = normalizeLineEndings(ocrText);

    const requestor = RECOGNIZERS.requestor(text);
    const date = RECOGNIZERS.date(text);
    const amount = RECOGNIZERS.amount(text);
    const email = RECOGNIZERS.email(text);
    const phone = RECOGNIZERS.phone(text);
    const childName = RECOGNIZERS.child_name(text);
    const teacherGrade = RECOGNIZERS.teacher_grade(text);
    const reimbursementType = RECOGNIZERS.reimbursement_type(text);
    const event = RECOGNIZERS.event(text);
    const payableTo = RECOGNIZERS.payable_to(text);
    const delivery = RECOGNIZERS.delivery(text);

    const record: FormRecord = Object.freeze({
        requestor: requestor.value,
        date: date.value,
        amount: amount.value,
        email: email.value,
        phone: phone.value,
        child_name: childName.value,
        teacher_grade: teacherGrade.value,
        reimbursement_type: reimbursementType.value,
        event: event.value,
        payable_to: payableTo.value,
        delivery: delivery.value,
        raw_text: ocrText,
    });

    const trace: ExtractionTrace = Object.freeze({
        requestor: requestor.rule,
        date: date.rule,
        amount: amount.rule,
        email: email.rule,
        phone: phone.rule,
        child_name: childName.rule,
        teacher_grade: teacherGrade.rule,
        reimbursement_type: reimbursementType.rule,
        event: event.rule,
        payable_to: payableTo.rule,
        delivery: delivery.rule,
    });

    return { record, trace };
}

/**
 * Extract a FormRecord from combined OCR text.
 */
export function extractFields(ocrText: string): FormRecord {
    return extractFieldsWithTrace(ocrText).record;
}

/**
 * Join the OCR text of each page of one source document.
 */
export function combinePages(pages: readonly string[]): string {
    return pages.join(SEPARATORS.PAGE_BREAK);
}

/**
 * Join the OCR text of several independent source documents.
 */
export function combineDocuments(documents: readonly string[]): string {
    return documents.join(SEPARATORS.NEXT_DOCUMENT);
}
