/**
 * Email and phone recognizers.
 */

import { runCascade } from '../cascade.js';
import type { CaptureRule, FieldMatch } from '../types.js';

export const EMAIL_RULES: readonly CaptureRule[] = [
    {
        name: 'email-address',
        pattern: /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/,
        group: 0,
        transform: (address) => address.toLowerCase(),
    },
];

/**
 * Phone formats, tried in order. Every rule refuses to start or end inside
 * a longer digit run, so tracking and account numbers are never read as phones.
 */
export const PHONE_RULES: readonly CaptureRule[] = [
    {
        name: 'parenthesized-area-code',
        pattern: /(?<!\d)\(\d{3}\)[ \t]*\d{3}[-. \t]?\d{4}(?!\d)/,
        group: 0,
    },
    {
        name: 'separated-triplet',
        pattern: /(?<!\d)\d{3}[-. \t]\d{3}[-. \t]\d{4}(?!\d)/,
        group: 0,
    },
    {
        name: 'ten-digit-run',
        pattern: /(?<!\d)\d{10}(?!\d)/,
        group: 0,
    },
];

export function recognizeEmail(text: string): FieldMatch {
    return runCascade(text, EMAIL_RULES);
}

export function recognizePhone(text: string): FieldMatch {
    return runCascade(text, PHONE_RULES);
}
