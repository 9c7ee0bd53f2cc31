/**
 * Ordered rule cascade shared by the free-text and structured recognizers.
 *
 * ARCHITECTURAL NOTE: No console.* calls. A non-matching rule is not an
 * error; the cascade simply moves on.
 */

import { CAPTURE } from '../types/index.js';
import { collapseWhitespace } from '../utils/normalize.js';
import { NO_MATCH } from './types.js';
import type { CaptureRule, CategoryRule, FieldMatch } from './types.js';

/**
 * Clean a raw capture and decide whether it is usable.
 *
 * @param raw - Text captured by a rule
 * @param minLength - Shortest accepted cleaned value
 * @returns Cleaned value, or null if rejected as noise
 */
export function acceptCapture(raw: string, minLength: number = CAPTURE.MIN_LENGTH): string | null {
    const cleaned = collapseWhitespace(raw);
    if (cleaned.length === 0 || cleaned.length < minLength) {
        return null;
    }
    return cleaned;
}

/**
 * Apply one rule to the text.
 *
 * @returns Accepted value, or null if the rule did not match or its capture was rejected
 */
export function applyRule(text: string, rule: CaptureRule): string | null {
    const match = rule.pattern.exec(text);
    if (!match) return null;

    const captured = rule.compose ? rule.compose(match) : match[rule.group ?? 1];
    if (captured === undefined) return null;

    const collapsed = collapseWhitespace(captured);
    const value = rule.transform ? rule.transform(collapsed) : collapsed;
    return acceptCapture(value, rule.minLength);
}

/**
 * Run rules in order and return the first accepted capture.
 *
 * Later rules are never consulted once an earlier rule is accepted.
 */
export function runCascade(text: string, rules: readonly CaptureRule[]): FieldMatch {
    for (const rule of rules) {
        const value = applyRule(text, rule);
        if (value !== null) {
            return { value, rule: rule.name };
        }
    }
    return NO_MATCH;
}

/**
 * Resolve a categorical field: the first rule whose pattern occurs in the
 * lowercased text selects its value. Matches are never ranked.
 */
export function classify<T extends string>(
    text: string,
    rules: readonly CategoryRule<T>[]
): FieldMatch {
    const lower = text.toLowerCase();
    for (const rule of rules) {
        if (rule.pattern.test(lower)) {
            return { value: rule.value, rule: rule.name };
        }
    }
    return NO_MATCH;
}
