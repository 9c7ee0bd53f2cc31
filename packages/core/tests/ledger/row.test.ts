import { describe, it, expect } from 'vitest';
import { createLedgerRow, extractGrade, buildNotes, nextLedgerId } from '../../src/ledger/row.js';
import type { DisplayLabel, DisplayRecord } from '../../src/types/index.js';

const EMPTY: DisplayRecord = {
    Requestor: '',
    Date: '',
    Amount: '',
    Email: '',
    Phone: '',
    Child: '',
    'Teacher/Grade': '',
    Type: '',
    Event: '',
    'Payable To': '',
    Delivery: '',
};

function displayWith(values: Partial<Record<DisplayLabel, string>>): DisplayRecord {
    return { ...EMPTY, ...values };
}

const reviewed = displayWith({
    Requestor: 'Jane Kim',
    Date: '03/14/2024',
    Amount: '$45.00',
    Child: 'Sam Kim',
    'Teacher/Grade': 'Mrs. Lanford - 3rd',
    Type: 'Teacher',
    Event: 'Spring Party',
    'Payable To': 'Jane Kim',
    Delivery: 'Send home with child',
});

describe('extractGrade', () => {
    it('takes the text after the last slash', () => {
        expect(extractGrade('McCord / 3rd')).toBe('3rd');
        expect(extractGrade('a/b/ 2nd ')).toBe('2nd');
    });

    it('returns the whole value without a slash', () => {
        expect(extractGrade('K Michaud')).toBe('K Michaud');
    });
});

describe('buildNotes', () => {
    it('adds a check TODO and the event, child and delivery details', () => {
        expect(buildNotes(reviewed, 'Check')).toBe(
            'TODO: WRITE CHECK; Event: Spring Party; Child: Sam Kim; Delivery: Send home with child'
        );
    });

    it('uses the Amazon TODO for Amazon and Debit', () => {
        expect(buildNotes(EMPTY, 'Amazon')).toBe('TODO: ORDER ON AMAZON');
        expect(buildNotes(EMPTY, 'debit')).toBe('TODO: ORDER ON AMAZON');
    });

    it('skips the TODO for other payment types and empty details', () => {
        expect(buildNotes(displayWith({ Child: 'Mia Wu' }), 'Venmo')).toBe('Child: Mia Wu');
        expect(buildNotes(EMPTY, 'Venmo')).toBe('');
    });
});

describe('createLedgerRow', () => {
    it('maps a reviewed form onto columns A-T', () => {
        const row = createLedgerRow(reviewed, {
            id: 7,
            receivedDate: new Date(Date.UTC(2024, 2, 20)),
            budgetCategory: 'Classroom',
            budgetItem: 'Parties',
            paymentType: 'Check',
        });

        expect(row).toEqual({
            id: 7,
            income_expense: 'Expense',
            year: 2024,
            month: 'March',
            date_received: '03/20/2024',
            submitted_by: 'Jane Kim',
            grade: 'Mrs. Lanford - 3rd',
            type: 'Check',
            budget_category: 'Classroom',
            budget_item: 'Parties',
            amount_submitted: '45.00',
            amount_paid: '',
            check_number: '',
            myptez: '',
            bank: '',
            reconcile: '',
            report: '',
            all_mats_printed: '',
            double_signed: '',
            notes: 'TODO: WRITE CHECK; Event: Spring Party; Child: Sam Kim; Delivery: Send home with child',
        });
    });

    it('defaults the payment type to Check', () => {
        const row = createLedgerRow(reviewed, { id: 1, budgetCategory: '', budgetItem: '' });
        expect(row.type).toBe('Check');
        expect(row.date_received).toBe('');
    });

    it('leaves year and month blank for unsupported date shapes', () => {
        const row = createLedgerRow(displayWith({ Date: 'March 14, 2024' }), {
            id: 2,
            budgetCategory: '',
            budgetItem: '',
        });
        expect(row.year).toBe(0);
        expect(row.month).toBe('');
    });

    it('expands two-digit years', () => {
        const row = createLedgerRow(displayWith({ Date: '9-1-23' }), { id: 3, budgetCategory: '', budgetItem: '' });
        expect(row.year).toBe(2023);
        expect(row.month).toBe('September');
    });

    it('rejects an ID below 1', () => {
        expect(() => createLedgerRow(reviewed, { id: 0, budgetCategory: '', budgetItem: '' })).toThrow();
    });
});

describe('nextLedgerId', () => {
    it('returns one more than the largest integer ID', () => {
        expect(nextLedgerId(['ID', 3, '7', 5.5, null, 2])).toBe(8);
    });

    it('starts at 1 for an empty column', () => {
        expect(nextLedgerId([])).toBe(1);
        expect(nextLedgerId(['ID', ''])).toBe(1);
    });
});
