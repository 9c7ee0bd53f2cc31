/**
 * Ledger module: mapping reviewed form data onto spreadsheet rows.
 */

export { createLedgerRow, extractGrade, buildNotes, nextLedgerId } from './row.js';
export type { LedgerRowOptions } from './types.js';
