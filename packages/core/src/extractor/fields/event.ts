/**
 * Event recognizer.
 *
 * Labeled captures come first, then a closed list of recurring school
 * events matched anywhere. A known event phrase therefore wins over an
 * unlabeled custom event name.
 */

import { CAPTURE, KNOWN_EVENTS } from '../../types/index.js';
import { runCascade } from '../cascade.js';
import { EVENT_TITLE } from '../patterns.js';
import type { CaptureRule, FieldMatch } from '../types.js';

/**
 * Drop a leading "Event:" or "For:" swept into the capture.
 */
export function stripEventLabel(value: string): string {
    return value
        .replace(/^Event[\s:]+/i, '')
        .replace(/^For[\s:]+/i, '');
}

const LABEL_RULES: CaptureRule[] = [
    {
        name: 'event-label',
        pattern: new RegExp(`\\bEvent(?:\\s+Name)?[\\s:]+(${EVENT_TITLE})(?:\\n|$|Amount)`, 'i'),
    },
    {
        name: 'for-label',
        pattern: new RegExp(`\\bFor[\\s:]+(${EVENT_TITLE}(?:Party|Event|Activity))(?:\\n|$)`, 'i'),
    },
    {
        name: 'purpose-label',
        pattern: new RegExp(`\\bPurpose[\\s:]+(${EVENT_TITLE})(?:\\n|$)`, 'i'),
    },
];

const KNOWN_EVENT_RULES: CaptureRule[] = KNOWN_EVENTS.map(({ name, pattern }) => ({
    name: `known-event:${name}`,
    pattern: new RegExp(`(${pattern})`, 'i'),
}));

export const EVENT_RULES: readonly CaptureRule[] = [...LABEL_RULES, ...KNOWN_EVENT_RULES].map(
    (rule) => ({ ...rule, transform: stripEventLabel, minLength: CAPTURE.MIN_EVENT_LENGTH })
);

export function recognizeEvent(text: string): FieldMatch {
    return runCascade(text, EVENT_RULES);
}
