import axios, { type AxiosInstance } from 'axios';
import type { IPaymentStorage } from '../domain/storage.js';
import type { IPaymentRecord, WebhookPayload } from '../domain/payment.js';
import { DeliveryError, errorMessage } from '../domain/errors.js';
import { componentLogger } from '../logger.js';

const logger = componentLogger('notifier');

export type DeliveryResult = 'delivered' | 'failed';

export interface ICallbackDispatcher {
    deliver(payment: IPaymentRecord): Promise<DeliveryResult>;
}

export function buildWebhookPayload(payment: IPaymentRecord): WebhookPayload {
    if (payment.status !== 'completed' || payment.txHash === undefined
        || payment.receivedAmount === undefined || payment.blockTimestamp === undefined) {
        throw new Error(`Payment ${payment.id} has no completed match to report`);
    }
    return {
        payment_id: payment.id,
        order_id: payment.orderId,
        wallet_address: payment.walletAddress,
        currency: 'USDT_TRC20',
        expected_amount_usdt: payment.expectedAmount,
        received_amount_usdt: payment.receivedAmount,
        transaction_hash: payment.txHash,
        block_timestamp: payment.blockTimestamp,
        status: 'completed',
    };
}

/**
 * Posts the completion webhook once per call. There is no retry loop: a failed attempt
 * leaves `callbackDelivered` false and the attempt counted, for an operator to re-drive.
 */
export class WebhookNotifier implements ICallbackDispatcher {
    private http: AxiosInstance;

    constructor(
        private storage: IPaymentStorage,
        timeoutMs: number = 5000
    ) {
        this.http = axios.create({
            timeout: timeoutMs,
            headers: { 'Content-Type': 'application/json' },
        });
    }

    async deliver(payment: IPaymentRecord): Promise<DeliveryResult> {
        const payload = buildWebhookPayload(payment);
        const attempt = payment.callbackAttempts + 1;

        await this.storage.recordCallbackAttempt(payment.id, Date.now());

        try {
            await this.post(payment.callbackUrl, payload);
        } catch (error) {
            const status = error instanceof DeliveryError ? error.status : undefined;
            logger.warn({ paymentId: payment.id, url: payment.callbackUrl, attempt, status, error: errorMessage(error) }, 'Callback delivery failed');
            await this.storage.appendEvent(payment.id, 'callback_failed', errorMessage(error), {
                url: payment.callbackUrl,
                attempt,
                status: status ?? null,
            });
            return 'failed';
        }

        await this.storage.markCallbackDelivered(payment.id);
        await this.storage.appendEvent(payment.id, 'callback_sent', `Callback delivered to ${payment.callbackUrl}`, {
            url: payment.callbackUrl,
            attempt,
        });
        logger.info({ paymentId: payment.id, orderId: payment.orderId, attempt }, 'Callback delivered');
        return 'delivered';
    }

    private async post(url: string, payload: WebhookPayload): Promise<void> {
        try {
            await this.http.post(url, payload, {
                headers: { 'Idempotency-Key': payload.payment_id },
            });
        } catch (error) {
            const status = axios.isAxiosError(error) ? error.response?.status : undefined;
            const reason = status !== undefined ? `HTTP ${status}` : errorMessage(error);
            throw new DeliveryError(`Callback to ${url} failed: ${reason}`, status);
        }
    }
}
