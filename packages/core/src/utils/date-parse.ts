/**
 * Date parsing for the ledger mapping.
 * All dates are handled as UTC (00:00:00Z).
 */

const MONTH_NAMES = [
    'January',
    'February',
    'March',
    'April',
    'May',
    'June',
    'July',
    'August',
    'September',
    'October',
    'November',
    'December',
] as const;

/**
 * Year and full month name derived from a form date.
 */
export interface FormDateParts {
    year: number;
    month: string;
}

/**
 * Parse a form date written as MM-DD-YYYY, MM/DD/YYYY, MM-DD-YY or MM/DD/YY.
 *
 * Month and day may be one or two digits. Two-digit years 00-68 map to
 * 20xx and 69-99 to 19xx. Any other shape, or an impossible calendar
 * date, returns null.
 */
export function parseFormDate(value: string): FormDateParts | null {
    const match = value.match(/^(\d{1,2})([-/])(\d{1,2})\2(\d{4}|\d{2})$/);
    if (!match) return null;

    const month = parseInt(match[1], 10);
    const day = parseInt(match[3], 10);
    const year = expandYear(match[4]);

    const date = new Date(Date.UTC(year, month - 1, day));
    if (!isValidDate(date)) return null;

    // Date.UTC maps years 0-99 onto 1900-1999
    date.setUTCFullYear(year);

    if (date.getUTCFullYear() !== year ||
        date.getUTCMonth() !== month - 1 ||
        date.getUTCDate() !== day) {
        return null;
    }

    return { year, month: MONTH_NAMES[month - 1] };
}

function expandYear(digits: string): number {
    const year = parseInt(digits, 10);
    if (digits.length === 4) return year;
    return year <= 68 ? 2000 + year : 1900 + year;
}

/**
 * Format Date as MM/DD/YYYY (UTC).
 */
export function formatMdyDate(date: Date): string {
    const month = String(date.getUTCMonth() + 1).padStart(2, '0');
    const day = String(date.getUTCDate()).padStart(2, '0');
    const year = date.getUTCFullYear();
    return `${month}/${day}/${year}`;
}

/**
 * Format Date as YYYY-MM (UTC), used for archive folders.
 */
export function formatYearMonth(date: Date): string {
    const year = date.getUTCFullYear();
    const month = String(date.getUTCMonth() + 1).padStart(2, '0');
    return `${year}-${month}`;
}

/**
 * Check if date is valid.
 */
export function isValidDate(date: Date): boolean {
    return !isNaN(date.getTime());
}
