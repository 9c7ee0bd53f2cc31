/**
 * Form date recognizer.
 *
 * Numeric dates are preferred over written ones; within each shape a
 * "Date" label beats an unlabeled match. Values are returned as written.
 */

import { runCascade } from '../cascade.js';
import type { CaptureRule, FieldMatch } from '../types.js';

const MONTH_NAME =
    '(?:Jan(?:uary)?|Feb(?:ruary)?|Mar(?:ch)?|Apr(?:il)?|May|June?|July?|Aug(?:ust)?|Sep(?:t(?:ember)?)?|Oct(?:ober)?|Nov(?:ember)?|Dec(?:ember)?)\\.?';

const WRITTEN_DATE = `${MONTH_NAME}\\s+\\d{1,2},?\\s+\\d{4}`;

export const DATE_RULES: readonly CaptureRule[] = [
    {
        name: 'date-label-numeric',
        pattern: /\bDate[\s:]*(\d{1,2}[-/]\d{1,2}[-/]\d{2,4})(?!\d)/i,
    },
    {
        name: 'numeric-four-digit-year',
        pattern: /(?<!\d)(\d{1,2}[-/]\d{1,2}[-/]\d{4})(?!\d)/,
    },
    {
        name: 'numeric-two-digit-year',
        pattern: /(?<!\d)(\d{1,2}[-/]\d{1,2}[-/]\d{2})(?!\d)/,
    },
    {
        name: 'date-label-written',
        pattern: new RegExp(`\\bDate[\\s:]*(${WRITTEN_DATE})(?!\\d)`, 'i'),
    },
    {
        name: 'written',
        pattern: new RegExp(`\\b(${WRITTEN_DATE})(?!\\d)`, 'i'),
    },
];

export function recognizeDate(text: string): FieldMatch {
    return runCascade(text, DATE_RULES);
}
