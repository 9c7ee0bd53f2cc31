import { describe, it, expect } from 'vitest';
import { parseFormDate, formatMdyDate, formatYearMonth, isValidDate } from '../../src/utils/date-parse.js';

describe('date-parse utilities', () => {
    describe('parseFormDate', () => {
        it('should parse MM/DD/YYYY', () => {
            expect(parseFormDate('03/14/2024')).toEqual({ year: 2024, month: 'March' });
        });

        it('should parse MM-DD-YYYY', () => {
            expect(parseFormDate('12-01-2023')).toEqual({ year: 2023, month: 'December' });
        });

        it('should accept one-digit month and day', () => {
            expect(parseFormDate('1/5/2025')).toEqual({ year: 2025, month: 'January' });
        });

        it('should map two-digit years 00-68 to the 2000s', () => {
            expect(parseFormDate('03/14/24')).toEqual({ year: 2024, month: 'March' });
            expect(parseFormDate('07-04-00')).toEqual({ year: 2000, month: 'July' });
            expect(parseFormDate('07-04-68')).toEqual({ year: 2068, month: 'July' });
        });

        it('should map two-digit years 69-99 to the 1900s', () => {
            expect(parseFormDate('07-04-69')).toEqual({ year: 1969, month: 'July' });
            expect(parseFormDate('11/30/99')).toEqual({ year: 1999, month: 'November' });
        });

        it('should return null for mixed separators', () => {
            expect(parseFormDate('03/14-2024')).toBeNull();
        });

        it('should return null for other shapes', () => {
            expect(parseFormDate('March 14, 2024')).toBeNull();
            expect(parseFormDate('2024-03-14')).toBeNull();
            expect(parseFormDate('03/14/202')).toBeNull();
            expect(parseFormDate('')).toBeNull();
        });

        it('should return null for impossible dates', () => {
            expect(parseFormDate('13/01/2024')).toBeNull();
            expect(parseFormDate('02/30/2024')).toBeNull();
            expect(parseFormDate('00/10/2024')).toBeNull();
        });

        it('should accept Feb 29 only in leap years', () => {
            expect(parseFormDate('02/29/2024')).toEqual({ year: 2024, month: 'February' });
            expect(parseFormDate('02/29/2023')).toBeNull();
        });
    });

    describe('formatMdyDate', () => {
        it('should zero-pad month and day', () => {
            expect(formatMdyDate(new Date(Date.UTC(2024, 2, 5)))).toBe('03/05/2024');
        });
    });

    describe('formatYearMonth', () => {
        it('should format as YYYY-MM', () => {
            expect(formatYearMonth(new Date(Date.UTC(2024, 8, 30)))).toBe('2024-09');
        });
    });

    describe('isValidDate', () => {
        it('should reject Invalid Date', () => {
            expect(isValidDate(new Date('nope'))).toBe(false);
            expect(isValidDate(new Date(Date.UTC(2024, 0, 1)))).toBe(true);
        });
    });
});
