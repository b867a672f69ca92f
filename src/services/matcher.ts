import type { IPaymentStorage } from '../domain/storage.js';
import type { ILedgerClient } from '../domain/ledger.js';
import type { IPaymentRecord, ITransferRecord } from '../domain/payment.js';
import type { ICallbackDispatcher } from './notifier.js';
import { AlreadyTerminalError, TransientLedgerError, errorMessage } from '../domain/errors.js';
import { amountsMatch, toDecimalAmount } from '../utils/amount.js';
import { componentLogger } from '../logger.js';

const logger = componentLogger('matcher');

export type MatchOutcome = 'matched' | 'no_match' | 'query_failed';

export interface TransferMatch {
    transfer: ITransferRecord;
    amount: number;
}

/**
 * First transfer, in the order given, paying `payment.expectedAmount` of the configured
 * token to the payment's wallet. Later qualifying transfers are ignored.
 */
export function findMatchingTransfer(
    transfers: readonly ITransferRecord[],
    payment: Pick<IPaymentRecord, 'walletAddress' | 'expectedAmount'>,
    contractAddress: string
): TransferMatch | undefined {
    for (const transfer of transfers) {
        if (transfer.toAddress !== payment.walletAddress) continue;
        if (transfer.tokenContractAddress !== contractAddress) continue;

        const amount = toDecimalAmount(transfer.rawAmount, transfer.tokenDecimals);
        if (amountsMatch(amount, payment.expectedAmount)) {
            return { transfer, amount };
        }
    }
    return undefined;
}

export class PaymentMatcher {
    constructor(
        private storage: IPaymentStorage,
        private ledger: ILedgerClient,
        private dispatcher: ICallbackDispatcher,
        private contractAddress: string,
        private now: () => number = Date.now
    ) { }

    async process(payment: IPaymentRecord): Promise<MatchOutcome> {
        const fetchedAt = this.now();
        const since = payment.checkpointTimestamp;

        let transfers: ITransferRecord[];
        try {
            transfers = await this.ledger.fetchTransfers(payment.walletAddress, since);
        } catch (error) {
            if (!(error instanceof TransientLedgerError)) throw error;
            // Checkpoint stays put so nothing is skipped once the ledger answers again
            await this.storage.appendEvent(payment.id, 'api_error', error.message, { since, status: error.status ?? null });
            logger.warn({ paymentId: payment.id, address: payment.walletAddress }, 'Ledger query failed, will retry next tick');
            return 'query_failed';
        }

        const match = findMatchingTransfer(transfers, payment, this.contractAddress);

        if (!match) {
            await this.storage.advanceCheckpoint(payment.id, fetchedAt);
            if (transfers.length > 0) {
                await this.storage.appendEvent(payment.id, 'checking', `Inspected ${transfers.length} transfer(s), none matched`, {
                    since,
                    transfers: transfers.length,
                });
            }
            return 'no_match';
        }

        const { transfer, amount } = match;
        let completed: IPaymentRecord;
        try {
            completed = await this.storage.transitionToCompleted(payment.id, {
                txHash: transfer.txHash,
                receivedAmount: amount,
                blockTimestamp: transfer.blockTimestamp,
                completedAt: fetchedAt,
            });
        } catch (error) {
            if (!(error instanceof AlreadyTerminalError)) throw error;
            logger.info({ paymentId: payment.id, status: error.status }, 'Payment left pending before the match was recorded');
            return 'no_match';
        }
        // A completed payment is never listed again, so a failed audit write must not block delivery
        // A completed payment is never listed again: deliver first, rethrow after
        let auditFailure: { error: unknown } | undefined;
        try {
            await this.storage.appendEvent(payment.id, 'matched', `Transfer ${transfer.txHash} matches ${payment.expectedAmount} USDT`, {
                txHash: transfer.txHash,
                rawAmount: transfer.rawAmount.toString(),
                decimals: transfer.tokenDecimals,
                blockTimestamp: transfer.blockTimestamp,
            });
            await this.storage.appendEvent(payment.id, 'completed', `Payment completed with ${amount} USDT`, {
                txHash: transfer.txHash,
                receivedAmount: amount,
            });
            await this.storage.advanceCheckpoint(payment.id, fetchedAt);
        } catch (error) {
            logger.error({ paymentId: payment.id, error: errorMessage(error) }, 'Recording the match failed, delivering callback anyway');
            auditFailure = { error };
        }
        logger.info({ paymentId: payment.id, orderId: payment.orderId, txHash: transfer.txHash, amount }, 'Payment matched');

        await this.dispatcher.deliver(completed);
        if (auditFailure) throw auditFailure.error;
        return 'matched';
    }
}
