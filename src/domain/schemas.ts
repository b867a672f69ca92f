import { z } from 'zod';
import { PAYMENT_EVENT_TYPES } from './payment.js';
import { countDecimals, USDT_DECIMALS } from '../utils/amount.js';

export const TRON_ADDRESS_PATTERN = /^T[1-9A-HJ-NP-Za-km-z]{33}$/;

export const PaymentStatusSchema = z.enum(['pending', 'completed', 'failed', 'expired']);

export const PaymentEventTypeSchema = z.enum(PAYMENT_EVENT_TYPES);

export const EventPayloadSchema = z.record(z.unknown());

const HttpUrlSchema = z.string().url().refine(value => /^https?:\/\//i.test(value), 'callback_url must be an http(s) URL');

export function createPaymentRequestSchema(limits: { min: number; max: number }) {
    return z.object({
        wallet_address: z.string().regex(TRON_ADDRESS_PATTERN, 'wallet_address must be a TRON base58 address'),
        expected_amount_usdt: z.number()
            .positive()
            .min(limits.min, `expected_amount_usdt must be at least ${limits.min}`)
            .max(limits.max, `expected_amount_usdt must be at most ${limits.max}`)
            .refine(value => countDecimals(value) <= USDT_DECIMALS, `expected_amount_usdt supports at most ${USDT_DECIMALS} decimals`),
        callback_url: HttpUrlSchema,
        order_id: z.string().min(1).max(100),
    });
}

export type CreatePaymentRequest = z.infer<ReturnType<typeof createPaymentRequestSchema>>;

export const PaymentRecordSchema = z.object({
    id: z.string(),
    walletAddress: z.string(),
    expectedAmount: z.number(),
    callbackUrl: z.string(),
    orderId: z.string(),
    status: PaymentStatusSchema,
    txHash: z.string().optional(),
    receivedAmount: z.number().optional(),
    blockTimestamp: z.number().optional(),
    createdAt: z.number(),
    completedAt: z.number().optional(),
    checkpointTimestamp: z.number(),
    callbackAttempts: z.number().int(),
    lastCallbackAt: z.number().optional(),
    callbackDelivered: z.boolean(),
});

export const PaymentEventSchema = z.object({
    id: z.number().int(),
    paymentId: z.string(),
    eventType: PaymentEventTypeSchema,
    message: z.string(),
    payload: EventPayloadSchema.optional(),
    createdAt: z.number(),
});

export const JsonStoreFileSchema = z.object({
    payments: z.array(PaymentRecordSchema),
    events: z.array(PaymentEventSchema),
});
