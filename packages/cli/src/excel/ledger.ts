import { existsSync } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { CellValue, Workbook, Worksheet } from 'exceljs';
import { Decimal } from 'decimal.js';
import type { LedgerRow } from '@pta-reimburse/shared';
import { createWorkbook, formatHeaderRow, autoFitColumns, formatCurrencyColumn } from './utils.js';

/**
 * Ledger columns A-T, in sheet order.
 */
export const LEDGER_COLUMNS: readonly { header: string; key: keyof LedgerRow }[] = [
    { header: 'ID', key: 'id' },
    { header: 'Income/Expense', key: 'income_expense' },
    { header: 'Year', key: 'year' },
    { header: 'Month', key: 'month' },
    { header: 'Date Received', key: 'date_received' },
    { header: 'Submitted By', key: 'submitted_by' },
    { header: 'Grade', key: 'grade' },
    { header: 'Type', key: 'type' },
    { header: 'Budget Category', key: 'budget_category' },
    { header: 'Budget Item', key: 'budget_item' },
    { header: 'Amount Submitted', key: 'amount_submitted' },
    { header: 'Amount Paid', key: 'amount_paid' },
    { header: 'Check #', key: 'check_number' },
    { header: 'MyPTEZ', key: 'myptez' },
    { header: 'Bank', key: 'bank' },
    { header: 'Reconcile', key: 'reconcile' },
    { header: 'Report', key: 'report' },
    { header: 'All Mats Printed', key: 'all_mats_printed' },
    { header: 'Double Signed', key: 'double_signed' },
    { header: 'Notes', key: 'notes' },
];

const AMOUNT_COLUMNS = ['K', 'L'];

/**
 * Opens the ledger workbook, or a fresh one if the file does not exist yet.
 */
export async function openLedgerWorkbook(ledgerPath: string): Promise<Workbook> {
    const workbook = createWorkbook();
    if (existsSync(ledgerPath)) {
        await workbook.xlsx.readFile(ledgerPath);
    }
    return workbook;
}

/**
 * Returns the named sheet, adding it with the ledger header row when missing.
 */
export function getLedgerSheet(workbook: Workbook, sheetName: string): Worksheet {
    const existing = workbook.getWorksheet(sheetName);
    if (existing) {
        return existing;
    }

    const sheet = workbook.addWorksheet(sheetName);
    sheet.columns = LEDGER_COLUMNS.map(({ header, key }) => ({ header, key }));
    formatHeaderRow(sheet);
    for (const col of AMOUNT_COLUMNS) {
        formatCurrencyColumn(sheet, col);
    }
    autoFitColumns(sheet);
    return sheet;
}

/**
 * Values of column A below the header row.
 */
export function readIdColumn(sheet: Worksheet): CellValue[] {
    const ids: CellValue[] = [];
    sheet.eachRow((row, rowNumber) => {
        if (rowNumber > 1) {
            ids.push(row.getCell(1).value);
        }
    });
    return ids;
}

/**
 * Cell values for one row, A-T. Money columns become numbers when they
 * hold a plain decimal so the sheet can total them.
 */
export function toCellValues(row: LedgerRow): (string | number)[] {
    return LEDGER_COLUMNS.map(({ key }) => {
        const value = row[key];
        if (
            (key === 'amount_submitted' || key === 'amount_paid') &&
            typeof value === 'string' &&
            /^\d+(?:\.\d+)?$/.test(value)
        ) {
            return new Decimal(value).toNumber();
        }
        return value;
    });
}

export function appendLedgerRow(sheet: Worksheet, row: LedgerRow): void {
    sheet.addRow(toCellValues(row));
}

export async function writeLedgerWorkbook(workbook: Workbook, ledgerPath: string): Promise<void> {
    await mkdir(dirname(ledgerPath), { recursive: true });
    await workbook.xlsx.writeFile(ledgerPath);
}
