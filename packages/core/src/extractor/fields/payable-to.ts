import { runCascade } from '../cascade.js';
import { PERSON_NAME } from '../patterns.js';
import type { CaptureRule, FieldMatch } from '../types.js';

export const PAYABLE_TO_RULES: readonly CaptureRule[] = [
    {
        name: 'make-check-payable-to-label',
        pattern: new RegExp(`Make\\s+Check\\s+Payable\\s+To[\\s:]+(${PERSON_NAME})(?:\\n|$)`, 'i'),
    },
    {
        name: 'payable-to-label',
        pattern: new RegExp(`Payable\\s+To[\\s:]+(${PERSON_NAME})(?:\\n|$)`, 'i'),
    },
    {
        name: 'pay-to-label',
        pattern: new RegExp(`\\bPay\\s+To[\\s:]+(${PERSON_NAME})(?:\\n|$)`, 'i'),
    },
];

export function recognizePayableTo(text: string): FieldMatch {
    return runCascade(text, PAYABLE_TO_RULES);
}
