import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { WebhookNotifier, buildWebhookPayload } from '../../src/services/notifier.js';
import { JsonPaymentStorage } from '../../src/storage/json.js';
import type { IPaymentRecord } from '../../src/domain/payment.js';
import { T0, WALLET, makePayment, sendJson, startStubServer, type StubServer } from '../helpers.js';

describe('WebhookNotifier', () => {
    let storage: JsonPaymentStorage;
    let server: StubServer | undefined;

    const completePayment = async (callbackUrl: string): Promise<IPaymentRecord> => {
        const payment = makePayment({ id: 'pay-1', orderId: 'order-42', callbackUrl });
        await storage.create(payment);
        return storage.transitionToCompleted(payment.id, {
            txHash: 'tx-match',
            receivedAmount: 12.34,
            blockTimestamp: T0 + 5_000,
            completedAt: T0 + 9_000,
        });
    };

    beforeEach(() => {
        storage = new JsonPaymentStorage();
    });

    afterEach(async () => {
        await server?.close();
        server = undefined;
    });

    it('should build the fixed webhook payload', async () => {
        const payment = await completePayment('https://merchant.example/hook');

        expect(buildWebhookPayload(payment)).toEqual({
            payment_id: 'pay-1',
            order_id: 'order-42',
            wallet_address: WALLET,
            currency: 'USDT_TRC20',
            expected_amount_usdt: 12.34,
            received_amount_usdt: 12.34,
            transaction_hash: 'tx-match',
            block_timestamp: T0 + 5_000,
            status: 'completed',
        });
    });

    it('should refuse to build a payload for a pending payment', () => {
        expect(() => buildWebhookPayload(makePayment({ id: 'pay-pending' })))
            .toThrow('Payment pay-pending has no completed match to report');
    });

    it('should post the payload and mark the callback delivered', async () => {
        server = await startStubServer((_req, res) => sendJson(res, 200, { ok: true }));
        const payment = await completePayment(`${server.url}/hook`);
        const notifier = new WebhookNotifier(storage);

        const result = await notifier.deliver(payment);

        expect(result).toBe('delivered');
        expect(server.requests).toHaveLength(1);
        const request = server.requests[0];
        expect(request.method).toBe('POST');
        expect(request.url).toBe('/hook');
        expect(request.headers['content-type']).toContain('application/json');
        expect(request.headers['idempotency-key']).toBe('pay-1');
        expect(JSON.parse(request.body)).toEqual(buildWebhookPayload(payment));

        const stored = await storage.get('pay-1');
        expect(stored?.callbackAttempts).toBe(1);
        expect(stored?.callbackDelivered).toBe(true);
        expect(stored?.lastCallbackAt).toBeTypeOf('number');
        const events = await storage.listEvents('pay-1');
        expect(events.map(e => e.eventType)).toEqual(['callback_sent']);
        expect(events[0].payload).toEqual({ url: `${server.url}/hook`, attempt: 1 });
    });

    it('should record a failed callback without touching the payment status', async () => {
        server = await startStubServer((_req, res) => sendJson(res, 500, { error: 'boom' }));
        const payment = await completePayment(`${server.url}/hook`);
        const notifier = new WebhookNotifier(storage);

        const result = await notifier.deliver(payment);

        expect(result).toBe('failed');
        const stored = await storage.get('pay-1');
        expect(stored?.status).toBe('completed');
        expect(stored?.callbackAttempts).toBe(1);
        expect(stored?.callbackDelivered).toBe(false);

        const events = await storage.listEvents('pay-1');
        expect(events).toHaveLength(1);
        expect(events[0].eventType).toBe('callback_failed');
        expect(events[0].message).toBe(`Callback to ${server.url}/hook failed: HTTP 500`);
        expect(events[0].payload).toEqual({ url: `${server.url}/hook`, attempt: 1, status: 500 });
    });

    it('should give up on a receiver that does not answer in time', async () => {
        server = await startStubServer(() => { /* hangs */ });
        const payment = await completePayment(`${server.url}/hook`);
        const notifier = new WebhookNotifier(storage, 50);

        expect(await notifier.deliver(payment)).toBe('failed');
        const events = await storage.listEvents('pay-1');
        expect(events[0].payload).toMatchObject({ status: null });
    });

    it('should count every attempt', async () => {
        server = await startStubServer((_req, res) => sendJson(res, 503, {}));
        const payment = await completePayment(`${server.url}/hook`);
        const notifier = new WebhookNotifier(storage);

        await notifier.deliver(payment);
        const again = await storage.get('pay-1');
        if (!again) throw new Error('payment vanished');
        await notifier.deliver(again);

        const stored = await storage.get('pay-1');
        expect(stored?.callbackAttempts).toBe(2);
        const events = await storage.listEvents('pay-1');
        expect(events.map(e => e.payload?.attempt)).toEqual([1, 2]);
    });
});
