/**
 * Choices made outside the form that complete a ledger row.
 */
export interface LedgerRowOptions {
    id: number;
    /** When the request arrived; omitted when unknown */
    receivedDate?: Date;
    budgetCategory: string;
    budgetItem: string;
    /** Defaults to LEDGER.DEFAULT_PAYMENT_TYPE */
    paymentType?: string;
}
