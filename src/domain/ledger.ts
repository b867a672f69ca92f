import type { ITransferRecord } from './payment.js';

export interface ILedgerClient {
    /**
     * Confirmed incoming token transfers for `address` newer than `sinceTimestamp` (ms),
     * newest first, one bounded page. Rejects with TransientLedgerError when the ledger
     * cannot be queried.
     */
    fetchTransfers(address: string, sinceTimestamp: number): Promise<ITransferRecord[]>;
}
