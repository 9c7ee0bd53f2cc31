/**
 * Text normalization for field recognition.
 *
 * NOTE: Only line endings are canonicalized globally. Casing and trimming
 * are left to each recognizer, since some rely on case-sensitive cues.
 */

/**
 * Canonicalize CRLF and lone CR line terminators to LF.
 *
 * @param raw - OCR text as received
 * @returns Text with every line terminator as "\n"
 */
export function normalizeLineEndings(raw: string): string {
    return raw.replace(/\r\n?/g, '\n');
}

/**
 * Collapse runs of whitespace (including newlines) to a single space and trim.
 *
 * @param value - Captured text
 * @returns Single-line, trimmed text
 */
export function collapseWhitespace(value: string): string {
    return value.replace(/\s+/g, ' ').trim();
}

/**
 * Escape a literal string for use inside a RegExp source.
 */
export function escapeRegExp(literal: string): string {
    return literal.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
