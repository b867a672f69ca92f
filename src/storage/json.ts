import fs from 'fs';
import path from 'path';
import type { IPaymentStorage } from '../domain/storage.js';
import type {
    EventPayload,
    ICompletion,
    IPaymentEvent,
    IPaymentRecord,
    PaymentEventType,
    PaymentStatus,
} from '../domain/payment.js';
import { DuplicateOrderIdError, PaymentNotFoundError, StorageError, errorMessage } from '../domain/errors.js';
import { assertTransition } from '../domain/lifecycle.js';
import { JsonStoreFileSchema } from '../domain/schemas.js';

/**
 * Single-process store kept in memory and, when given a path, mirrored to a JSON file
 * after every write. Each method reads and mutates synchronously, so a status guard
 * cannot be interleaved with another writer.
 */
export class JsonPaymentStorage implements IPaymentStorage {
    private payments: Map<string, IPaymentRecord> = new Map();
    private events: IPaymentEvent[] = [];
    private nextEventId = 1;

    constructor(private filePath?: string) {
        this.load();
    }

    private load() {
        if (!this.filePath || !fs.existsSync(this.filePath)) return;
        try {
            const data = JsonStoreFileSchema.parse(JSON.parse(fs.readFileSync(this.filePath, 'utf-8')));
            for (const record of data.payments) {
                this.payments.set(record.id, record);
            }
            this.events = data.events;
            this.nextEventId = data.events.reduce((max, event) => Math.max(max, event.id), 0) + 1;
        } catch (e) {
            throw new StorageError(`Failed to load storage file ${this.filePath}: ${errorMessage(e)}`, e);
        }
    }

    private saveToFile(payments: Map<string, IPaymentRecord>, events: IPaymentEvent[]) {
        if (!this.filePath) return;
        try {
            fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
            const data = { payments: Array.from(payments.values()), events };
            fs.writeFileSync(this.filePath, JSON.stringify(data, null, 2));
        } catch (e) {
            throw new StorageError(`Failed to save storage file ${this.filePath}: ${errorMessage(e)}`, e);
        }
    }

    /** Memory only takes the new state once the file write went through. */
    private commitPayment(record: IPaymentRecord) {
        const payments = new Map(this.payments).set(record.id, record);
        this.saveToFile(payments, this.events);
        this.payments = payments;
    }

    private commitEvents(events: IPaymentEvent[]) {
        this.saveToFile(this.payments, events);
        this.events = events;
    }

    private require(id: string): IPaymentRecord {
        const record = this.payments.get(id);
        if (!record) throw new PaymentNotFoundError(id);
        return record;
    }

    async create(record: IPaymentRecord): Promise<void> {
        for (const existing of this.payments.values()) {
            if (existing.status === 'pending' && existing.orderId === record.orderId) {
                throw new DuplicateOrderIdError(record.orderId);
            }
        }
        this.commitPayment({ ...record });
    }

    async get(id: string): Promise<IPaymentRecord | null> {
        const record = this.payments.get(id);
        return record ? { ...record } : null;
    }

    async listPending(): Promise<IPaymentRecord[]> {
        return this.select(record => record.status === 'pending');
    }

    async listExpirable(cutoff: number): Promise<IPaymentRecord[]> {
        return this.select(record => record.status === 'pending' && record.createdAt < cutoff);
    }

    async transitionToCompleted(id: string, completion: ICompletion): Promise<IPaymentRecord> {
        const record = this.require(id);
        assertTransition(id, record.status, 'completed');
        const updated: IPaymentRecord = {
            ...record,
            status: 'completed',
            txHash: completion.txHash,
            receivedAmount: completion.receivedAmount,
            blockTimestamp: completion.blockTimestamp,
            completedAt: completion.completedAt,
        };
        this.commitPayment(updated);
        return { ...updated };
    }

    async transitionToExpired(id: string): Promise<IPaymentRecord> {
        const record = this.require(id);
        assertTransition(id, record.status, 'expired');
        const updated: IPaymentRecord = { ...record, status: 'expired' };
        this.commitPayment(updated);
        return { ...updated };
    }

    async advanceCheckpoint(id: string, timestamp: number): Promise<void> {
        const record = this.require(id);
        if (timestamp <= record.checkpointTimestamp) return;
        this.commitPayment({ ...record, checkpointTimestamp: timestamp });
    }

    async recordCallbackAttempt(id: string, at: number): Promise<void> {
        const record = this.require(id);
        this.commitPayment({ ...record, callbackAttempts: record.callbackAttempts + 1, lastCallbackAt: at });
    }

    async markCallbackDelivered(id: string): Promise<void> {
        this.commitPayment({ ...this.require(id), callbackDelivered: true });
    }

    async appendEvent(paymentId: string, type: PaymentEventType, message: string, payload?: EventPayload): Promise<void> {
        const event: IPaymentEvent = {
            id: this.nextEventId,
            paymentId,
            eventType: type,
            message,
            payload,
            createdAt: Date.now(),
        };
        this.commitEvents([...this.events, event]);
        this.nextEventId += 1;
    }

    async listEvents(paymentId: string): Promise<IPaymentEvent[]> {
        return this.events.filter(event => event.paymentId === paymentId).map(event => ({ ...event }));
    }

    async deleteEventsBefore(cutoff: number): Promise<number> {
        const kept = this.events.filter(event => event.createdAt >= cutoff);
        const removed = this.events.length - kept.length;
        if (removed > 0) {
            this.commitEvents(kept);
        }
        return removed;
    }

    async countByStatus(): Promise<Record<PaymentStatus, number>> {
        const counts: Record<PaymentStatus, number> = { pending: 0, completed: 0, failed: 0, expired: 0 };
        for (const record of this.payments.values()) {
            counts[record.status] += 1;
        }
        return counts;
    }

    private select(predicate: (record: IPaymentRecord) => boolean): IPaymentRecord[] {
        return Array.from(this.payments.values())
            .filter(predicate)
            .sort((a, b) => a.createdAt - b.createdAt)
            .map(record => ({ ...record }));
    }
}
