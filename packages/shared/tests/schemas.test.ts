import { describe, it, expect } from 'vitest';
import {
    FormRecordSchema,
    FieldKeySchema,
    LedgerRowSchema,
    ProcessedManifestSchema,
    WorkspaceConfigSchema,
} from '../src/schemas.js';

describe('FormRecordSchema', () => {
    const validRecord = {
        requestor: 'Jane Kim',
        date: '03/14/2024',
        amount: '$45.00',
        email: '',
        phone: '',
        child_name: 'Sam Kim',
        teacher_grade: 'Mrs. Lanford - 3rd',
        reimbursement_type: 'Teacher',
        event: 'Spring Party',
        payable_to: 'Jane Kim',
        delivery: 'Send home with child',
        raw_text: 'Check Requestor: Jane Kim\n  ...',
    };

    it('validates a complete record', () => {
        expect(FormRecordSchema.safeParse(validRecord).success).toBe(true);
    });

    it('rejects values with surrounding whitespace', () => {
        expect(FormRecordSchema.safeParse({ ...validRecord, requestor: ' Jane Kim' }).success).toBe(false);
    });

    it('rejects values with repeated or line-breaking whitespace', () => {
        expect(FormRecordSchema.safeParse({ ...validRecord, event: 'Spring  Party' }).success).toBe(false);
        expect(FormRecordSchema.safeParse({ ...validRecord, event: 'Spring\nParty' }).success).toBe(false);
    });

    it('allows raw_text to hold any text', () => {
        expect(FormRecordSchema.safeParse({ ...validRecord, raw_text: '  \r\n  ' }).success).toBe(true);
    });

    it('rejects a missing field', () => {
        const { phone: _phone, ...withoutPhone } = validRecord;
        expect(FormRecordSchema.safeParse(withoutPhone).success).toBe(false);
    });
});

describe('FieldKeySchema', () => {
    it('accepts record keys but not raw_text', () => {
        expect(FieldKeySchema.safeParse('teacher_grade').success).toBe(true);
        expect(FieldKeySchema.safeParse('raw_text').success).toBe(false);
    });
});

describe('LedgerRowSchema', () => {
    const validRow = {
        id: 12,
        income_expense: 'Expense',
        year: 2024,
        month: 'March',
        date_received: '03/20/2024',
        submitted_by: 'Jane Kim',
        grade: '3rd',
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
        notes: 'TODO: WRITE CHECK',
    };

    it('validates a complete row', () => {
        expect(LedgerRowSchema.safeParse(validRow).success).toBe(true);
    });

    it('accepts an empty received date', () => {
        expect(LedgerRowSchema.safeParse({ ...validRow, date_received: '' }).success).toBe(true);
    });

    it('rejects other received date formats', () => {
        expect(LedgerRowSchema.safeParse({ ...validRow, date_received: '2024-03-20' }).success).toBe(false);
    });

    it('rejects non-positive IDs', () => {
        expect(LedgerRowSchema.safeParse({ ...validRow, id: 0 }).success).toBe(false);
        expect(LedgerRowSchema.safeParse({ ...validRow, id: 1.5 }).success).toBe(false);
    });
});

describe('ProcessedManifestSchema', () => {
    it('validates hash entries', () => {
        const manifest = {
            processed: {
                'sha256:abc': {
                    ledger_id: 4,
                    processed_at: '2024-03-20T12:00:00.000Z',
                    source_file: 'form-001.txt',
                },
            },
        };
        expect(ProcessedManifestSchema.safeParse(manifest).success).toBe(true);
    });

    it('rejects entries without a ledger ID', () => {
        const manifest = { processed: { 'sha256:abc': { processed_at: 'x', source_file: 'y' } } };
        expect(ProcessedManifestSchema.safeParse(manifest).success).toBe(false);
    });
});

describe('WorkspaceConfigSchema', () => {
    it('fills every default from an empty object', () => {
        expect(WorkspaceConfigSchema.parse({})).toEqual({
            ledger: {
                file: 'ledger/reimbursements.xlsx',
                sheet_name: 'Income and Expenses',
            },
            field_mappings: {
                payment_types: ['Check', 'Debit', 'Amazon'],
                budget_categories: [],
                budget_items: [],
            },
        });
    });

    it('keeps configured values', () => {
        const config = WorkspaceConfigSchema.parse({
            ledger: { sheet_name: '2024-25' },
            field_mappings: { budget_categories: ['Classroom', 'Events'] },
        });
        expect(config.ledger.sheet_name).toBe('2024-25');
        expect(config.ledger.file).toBe('ledger/reimbursements.xlsx');
        expect(config.field_mappings.budget_categories).toEqual(['Classroom', 'Events']);
        expect(config.field_mappings.payment_types).toEqual(['Check', 'Debit', 'Amazon']);
    });

    it('rejects an empty payment type list', () => {
        expect(WorkspaceConfigSchema.safeParse({ field_mappings: { payment_types: [] } }).success).toBe(false);
    });
});
