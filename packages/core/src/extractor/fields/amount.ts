/**
 * Requested amount recognizer.
 *
 * Money is rendered through decimal.js, never native floats.
 */

import { Decimal } from 'decimal.js';
import { runCascade } from '../cascade.js';
import type { CaptureRule, FieldMatch } from '../types.js';

const PLAIN_NUMBER = /^(?:\d+(?:\.\d*)?|\.\d+)$/;

/**
 * Render captured digits as "$<value>" with exactly two decimals.
 *
 * Thousands separators are dropped. When the capture is not a number
 * (OCR leftovers such as a lone comma), the raw capture is kept behind "$".
 *
 * @param digits - Digits, commas and at most one decimal point
 */
export function formatAmount(digits: string): string {
    const plain = digits.replace(/,/g, '');
    if (!PLAIN_NUMBER.test(plain)) {
        return `$${digits}`;
    }
    return `$${new Decimal(plain).toFixed(2)}`;
}

export const AMOUNT_RULES: readonly CaptureRule[] = [
    {
        name: 'amount-requested-label',
        pattern: /Amount\s+Requested[\s:]*\$?\s*([\d,]+\.?\d*)/i,
        transform: formatAmount,
    },
    {
        name: 'amount-label',
        pattern: /Amount[\s:]*\$?\s*([\d,]+\.?\d*)/i,
        transform: formatAmount,
    },
    {
        name: 'total-label',
        pattern: /Total[\s:]*\$?\s*([\d,]+\.?\d*)/i,
        transform: formatAmount,
    },
    {
        name: 'dollar-amount',
        pattern: /\$\s*([\d,]+\.\d{2})/,
        transform: formatAmount,
    },
];

export function recognizeAmount(text: string): FieldMatch {
    return runCascade(text, AMOUNT_RULES);
}
