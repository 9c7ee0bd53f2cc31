/**
 * Internal types for the field extractor.
 */

/**
 * One entry of a recognizer's ordered rule table.
 * Rules are tried top to bottom; the first accepted capture wins.
 */
export interface CaptureRule {
    /** Stable name reported in extraction traces */
    name: string;
    /** Pattern searched against the normalized text */
    pattern: RegExp;
    /** Capture group holding the value (0 = whole match). Defaults to 1. */
    group?: number;
    /** Builds the value from several groups; takes precedence over `group` */
    compose?: (match: RegExpExecArray) => string | undefined;
    /** Rewrites the whitespace-collapsed capture before acceptance */
    transform?: (capture: string) => string;
    /** Minimum accepted length after cleaning. Defaults to CAPTURE.MIN_LENGTH. */
    minLength?: number;
}

/**
 * Rule for a categorical field: a match selects `value`.
 */
export interface CategoryRule<T extends string> {
    name: string;
    pattern: RegExp;
    value: T;
}

/**
 * Result of a single recognizer.
 */
export interface FieldMatch {
    /** Cleaned value, or "" when nothing matched */
    value: string;
    /** Name of the winning rule, or null when nothing matched */
    rule: string | null;
}

/**
 * A recognizer maps normalized text to a field match.
 */
export type Recognizer = (text: string) => FieldMatch;

export const NO_MATCH: FieldMatch = Object.freeze({ value: '', rule: null });
