import type { PaymentStatus } from './payment.js';

/** Ledger query failed (network, timeout, non-2xx, unreadable body). Retry on the next tick. */
export class TransientLedgerError extends Error {
    constructor(message: string, readonly status?: number) {
        super(message);
        this.name = 'TransientLedgerError';
    }
}

export class DeliveryError extends Error {
    constructor(message: string, readonly status?: number) {
        super(message);
        this.name = 'DeliveryError';
    }
}

export class DuplicateOrderIdError extends Error {
    constructor(readonly orderId: string) {
        super(`A pending payment already exists for order ${orderId}`);
        this.name = 'DuplicateOrderIdError';
    }
}

export class PaymentNotFoundError extends Error {
    constructor(readonly paymentId: string) {
        super(`Payment ${paymentId} not found`);
        this.name = 'PaymentNotFoundError';
    }
}

export class AlreadyTerminalError extends Error {
    constructor(readonly paymentId: string, readonly status: PaymentStatus) {
        super(`Payment ${paymentId} is already ${status}`);
        this.name = 'AlreadyTerminalError';
    }
}

export class InvalidTransitionError extends Error {
    constructor(readonly from: PaymentStatus, readonly to: PaymentStatus) {
        super(`Cannot move payment from ${from} to ${to}`);
        this.name = 'InvalidTransitionError';
    }
}

export class PaymentNotCompletedError extends Error {
    constructor(readonly paymentId: string, readonly status: PaymentStatus) {
        super(`Payment ${paymentId} is ${status}, not completed`);
        this.name = 'PaymentNotCompletedError';
    }
}

/** The payment store is unreachable or rejected an operation. Aborts the current tick. */
export class StorageError extends Error {
    constructor(message: string, cause?: unknown) {
        super(message, { cause });
        this.name = 'StorageError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
