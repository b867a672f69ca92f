import crypto from 'crypto';
import type { IPaymentStorage } from '../domain/storage.js';
import type {
    IPaymentEvent,
    IPaymentRecord,
    NewPayment,
    PaymentStats,
    PaymentStatusView,
} from '../domain/payment.js';
import { PaymentNotCompletedError, PaymentNotFoundError } from '../domain/errors.js';
import type { DeliveryResult, ICallbackDispatcher } from './notifier.js';
import { componentLogger } from '../logger.js';

const logger = componentLogger('payments');

export function toStatusView(payment: IPaymentRecord): PaymentStatusView {
    return {
        id: payment.id,
        wallet_address: payment.walletAddress,
        expected_amount_usdt: payment.expectedAmount,
        order_id: payment.orderId,
        status: payment.status,
        transaction_hash: payment.txHash ?? null,
        received_amount_usdt: payment.receivedAmount ?? null,
        created_at: payment.createdAt / 1000,
        completed_at: payment.completedAt !== undefined ? payment.completedAt / 1000 : null,
    };
}

/** Intake and read side used by the HTTP layer. */
export class PaymentService {
    constructor(
        private storage: IPaymentStorage,
        private dispatcher: ICallbackDispatcher,
        private now: () => number = Date.now
    ) { }

    async create(input: NewPayment): Promise<IPaymentRecord> {
        const createdAt = this.now();
        const record: IPaymentRecord = {
            id: crypto.randomUUID(),
            walletAddress: input.walletAddress,
            expectedAmount: input.expectedAmount,
            callbackUrl: input.callbackUrl,
            orderId: input.orderId,
            status: 'pending',
            createdAt,
            checkpointTimestamp: createdAt,
            callbackAttempts: 0,
            callbackDelivered: false,
        };

        await this.storage.create(record);
        await this.storage.appendEvent(record.id, 'created', `Watching ${record.walletAddress} for ${record.expectedAmount} USDT`, {
            orderId: record.orderId,
            expectedAmount: record.expectedAmount,
        });
        logger.info({ paymentId: record.id, orderId: record.orderId, wallet: record.walletAddress }, 'Payment watch created');
        return record;
    }

    async getStatus(id: string): Promise<PaymentStatusView> {
        return toStatusView(await this.require(id));
    }

    async getEvents(id: string): Promise<IPaymentEvent[]> {
        await this.require(id);
        return this.storage.listEvents(id);
    }

    async getStats(): Promise<PaymentStats> {
        const counts = await this.storage.countByStatus();
        const total = counts.pending + counts.completed + counts.failed + counts.expired;
        return { ...counts, total };
    }

    /** Operator re-drive of a completion callback that never got through. */
    async redeliverCallback(id: string): Promise<DeliveryResult> {
        const payment = await this.require(id);
        if (payment.status !== 'completed') {
            throw new PaymentNotCompletedError(id, payment.status);
        }
        if (payment.callbackDelivered) {
            return 'delivered';
        }
        logger.info({ paymentId: id, attempts: payment.callbackAttempts }, 'Re-driving completion callback');
        return this.dispatcher.deliver(payment);
    }

    private async require(id: string): Promise<IPaymentRecord> {
        const payment = await this.storage.get(id);
        if (!payment) throw new PaymentNotFoundError(id);
        return payment;
    }
}
