/**
 * Check requestor recognizer.
 *
 * Rules run from the most specific label ("Check Requestor") down to a bare
 * "Name" label, which skips child, student and teacher names.
 */

import { runCascade } from '../cascade.js';
import { PERSON_NAME } from '../patterns.js';
import type { CaptureRule, FieldMatch } from '../types.js';

export const REQUESTOR_RULES: readonly CaptureRule[] = [
    {
        name: 'check-requestor-label',
        pattern: new RegExp(`Check\\s+Request(?:or|er)[\\s:]*(${PERSON_NAME})(?:\\n|$|Date)`, 'i'),
    },
    {
        name: 'requestor-label',
        pattern: new RegExp(`\\bRequest(?:or|er)[\\s:]+(${PERSON_NAME})(?:\\n|$)`, 'i'),
    },
    {
        name: 'name-label',
        pattern: new RegExp(
            `(?<!(?:Child|Student|Teacher)(?:['’]s)?\\s+)\\bName[\\s:]+(${PERSON_NAME})(?:\\n|$|Email|Phone)`,
            'i'
        ),
    },
    {
        name: 'submitted-by-label',
        pattern: new RegExp(`Submitted\\s+By[\\s:]+(${PERSON_NAME})(?:\\n|$)`, 'i'),
    },
];

export function recognizeRequestor(text: string): FieldMatch {
    return runCascade(text, REQUESTOR_RULES);
}
