import type {
    EventPayload,
    ICompletion,
    IPaymentEvent,
    IPaymentRecord,
    PaymentEventType,
    PaymentStatus,
} from './payment.js';

/**
 * Payment store. Every status change is conditional on the payment still being pending,
 * so two writers racing on the same payment resolve to one winner and one
 * AlreadyTerminalError. Driver failures surface as StorageError.
 */
export interface IPaymentStorage {
    /** Throws DuplicateOrderIdError when a pending payment already uses the order id. */
    create(record: IPaymentRecord): Promise<void>;
    get(id: string): Promise<IPaymentRecord | null>;
    listPending(): Promise<IPaymentRecord[]>;
    /** Pending payments created strictly before `cutoff` (ms). */
    listExpirable(cutoff: number): Promise<IPaymentRecord[]>;
    transitionToCompleted(id: string, completion: ICompletion): Promise<IPaymentRecord>;
    transitionToExpired(id: string): Promise<IPaymentRecord>;
    /** Moves the checkpoint forward; an older timestamp leaves it unchanged. */
    advanceCheckpoint(id: string, timestamp: number): Promise<void>;
    recordCallbackAttempt(id: string, at: number): Promise<void>;
    markCallbackDelivered(id: string): Promise<void>;
    appendEvent(paymentId: string, type: PaymentEventType, message: string, payload?: EventPayload): Promise<void>;
    listEvents(paymentId: string): Promise<IPaymentEvent[]>;
    /** Returns the number of events removed. */
    deleteEventsBefore(cutoff: number): Promise<number>;
    countByStatus(): Promise<Record<PaymentStatus, number>>;
}
