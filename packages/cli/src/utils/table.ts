import type { DisplayRecord } from '@pta-reimburse/core';

const EMPTY = '(empty)';
const MIN_VALUE_WIDTH = 20;
const MAX_VALUE_WIDTH = 50;

/**
 * Renders a display record as a bordered two-column table.
 * Empty values show as "(empty)"; long values are cut with "...".
 */
export function formatDisplayTable(display: DisplayRecord, title: string = 'Extracted Data'): string {
    const entries = Object.entries(display);

    const fieldWidth = Math.max(...entries.map(([field]) => field.length)) + 2;
    const longest = Math.max(...entries.map(([, value]) => value.length)) + 2;
    const valueWidth = Math.min(Math.max(longest, MIN_VALUE_WIDTH), MAX_VALUE_WIDTH);

    const border = `+-${'-'.repeat(fieldWidth)}-+-${'-'.repeat(valueWidth)}-+`;
    const lines = [
        `=== ${title} ===`,
        border,
        `| ${'Field'.padEnd(fieldWidth)} | ${'Value'.padEnd(valueWidth)} |`,
        border,
    ];

    for (const [field, value] of entries) {
        let shown = value || EMPTY;
        if (shown.length > valueWidth) {
            shown = `${shown.slice(0, valueWidth - 3)}...`;
        }
        lines.push(`| ${field.padEnd(fieldWidth)} | ${shown.padEnd(valueWidth)} |`);
    }

    lines.push(border);
    return lines.join('\n');
}
