export type PaymentStatus = 'pending' | 'completed' | 'failed' | 'expired';

export interface IPaymentRecord {
    id: string; // UUID v4
    walletAddress: string; // Base58, 34 chars, 'T' prefix
    expectedAmount: number; // USDT, at most 6 decimals
    callbackUrl: string;
    orderId: string;
    status: PaymentStatus;
    txHash?: string;
    receivedAmount?: number;
    blockTimestamp?: number; // ms, block of the matched transfer
    createdAt: number; // ms
    completedAt?: number; // ms
    checkpointTimestamp: number; // ms, exclusive lower bound for the next ledger fetch
    callbackAttempts: number;
    lastCallbackAt?: number; // ms
    callbackDelivered: boolean;
}

export interface ITransferRecord {
    toAddress: string;
    tokenContractAddress: string;
    rawAmount: bigint;
    tokenDecimals: number;
    txHash: string;
    blockTimestamp: number; // ms
    confirmed: boolean;
}

export const PAYMENT_EVENT_TYPES = [
    'created',
    'checking',
    'matched',
    'api_error',
    'completed',
    'callback_sent',
    'callback_failed',
    'expired',
] as const;

export type PaymentEventType = typeof PAYMENT_EVENT_TYPES[number];

export type EventPayload = Record<string, unknown>;

export interface IPaymentEvent {
    id: number;
    paymentId: string;
    eventType: PaymentEventType;
    message: string;
    payload?: EventPayload;
    createdAt: number; // ms
}

export interface ICompletion {
    txHash: string;
    receivedAmount: number;
    blockTimestamp: number;
    completedAt: number;
}

export interface NewPayment {
    walletAddress: string;
    expectedAmount: number;
    callbackUrl: string;
    orderId: string;
}

// Shape delivered to the merchant webhook. Field names are part of the public contract.
export interface WebhookPayload {
    payment_id: string;
    order_id: string;
    wallet_address: string;
    currency: 'USDT_TRC20';
    expected_amount_usdt: number;
    received_amount_usdt: number;
    transaction_hash: string;
    block_timestamp: number;
    status: 'completed';
}

export interface PaymentStatusView {
    id: string;
    wallet_address: string;
    expected_amount_usdt: number;
    order_id: string;
    status: PaymentStatus;
    transaction_hash: string | null;
    received_amount_usdt: number | null;
    created_at: number; // seconds
    completed_at: number | null; // seconds
}

export type PaymentStats = Record<PaymentStatus, number> & { total: number };
