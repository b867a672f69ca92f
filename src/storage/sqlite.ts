import { open, Database } from 'sqlite';
import sqlite3 from 'sqlite3';
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
import { EventPayloadSchema, PaymentEventTypeSchema, PaymentStatusSchema } from '../domain/schemas.js';

interface PaymentRow {
    id: string;
    walletAddress: string;
    expectedAmount: number;
    callbackUrl: string;
    orderId: string;
    status: string;
    txHash: string | null;
    receivedAmount: number | null;
    blockTimestamp: number | null;
    createdAt: number;
    completedAt: number | null;
    checkpointTimestamp: number;
    callbackAttempts: number;
    lastCallbackAt: number | null;
    callbackDelivered: number;
}

interface EventRow {
    id: number;
    paymentId: string;
    eventType: string;
    message: string;
    payload: string | null;
    createdAt: number;
}

const SCHEMA = `
    CREATE TABLE IF NOT EXISTS payments (
        id TEXT PRIMARY KEY,
        walletAddress TEXT NOT NULL,
        expectedAmount REAL NOT NULL,
        callbackUrl TEXT NOT NULL,
        orderId TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'pending',
        txHash TEXT,
        receivedAmount REAL,
        blockTimestamp INTEGER,
        createdAt INTEGER NOT NULL,
        completedAt INTEGER,
        checkpointTimestamp INTEGER NOT NULL,
        callbackAttempts INTEGER NOT NULL DEFAULT 0,
        lastCallbackAt INTEGER,
        callbackDelivered INTEGER NOT NULL DEFAULT 0
    );
    CREATE UNIQUE INDEX IF NOT EXISTS idx_payments_pending_order ON payments(orderId) WHERE status = 'pending';
    CREATE INDEX IF NOT EXISTS idx_payments_status_created ON payments(status, createdAt);
    CREATE INDEX IF NOT EXISTS idx_payments_wallet ON payments(walletAddress);

    CREATE TABLE IF NOT EXISTS payment_events (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        paymentId TEXT NOT NULL REFERENCES payments(id),
        eventType TEXT NOT NULL,
        message TEXT NOT NULL,
        payload TEXT,
        createdAt INTEGER NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_payment_events_payment ON payment_events(paymentId);
    CREATE INDEX IF NOT EXISTS idx_payment_events_created ON payment_events(createdAt);
`;

export class SqlitePaymentStorage implements IPaymentStorage {
    private ready?: Promise<Database>;

    constructor(private dbPath: string) { }

    init(): Promise<Database> {
        if (!this.ready) {
            this.ready = this.connect();
            // Let a later call retry after a failed open
            this.ready.catch(() => { this.ready = undefined; });
        }
        return this.ready;
    }

    async close(): Promise<void> {
        if (!this.ready) return;
        const db = await this.ready;
        this.ready = undefined;
        await db.close();
    }

    async create(record: IPaymentRecord): Promise<void> {
        const db = await this.connection();
        try {
            await db.run(`
                INSERT INTO payments(id, walletAddress, expectedAmount, callbackUrl, orderId, status, createdAt, checkpointTimestamp, callbackAttempts, callbackDelivered)
                VALUES(?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
            `, record.id, record.walletAddress, record.expectedAmount, record.callbackUrl, record.orderId,
                record.status, record.createdAt, record.checkpointTimestamp, record.callbackAttempts, record.callbackDelivered ? 1 : 0);
        } catch (e) {
            if (isUniqueViolation(e, 'payments.orderId')) {
                throw new DuplicateOrderIdError(record.orderId);
            }
            throw new StorageError(`create failed: ${errorMessage(e)}`, e);
        }
    }

    async get(id: string): Promise<IPaymentRecord | null> {
        const row = await this.query('get', db => db.get<PaymentRow>('SELECT * FROM payments WHERE id = ?', id));
        return row ? toRecord(row) : null;
    }

    async listPending(): Promise<IPaymentRecord[]> {
        const rows = await this.query('listPending', db =>
            db.all<PaymentRow[]>(`SELECT * FROM payments WHERE status = 'pending' ORDER BY createdAt`));
        return rows.map(toRecord);
    }

    async listExpirable(cutoff: number): Promise<IPaymentRecord[]> {
        const rows = await this.query('listExpirable', db =>
            db.all<PaymentRow[]>(`SELECT * FROM payments WHERE status = 'pending' AND createdAt < ? ORDER BY createdAt`, cutoff));
        return rows.map(toRecord);
    }

    async transitionToCompleted(id: string, completion: ICompletion): Promise<IPaymentRecord> {
        const result = await this.query('transitionToCompleted', db => db.run(`
            UPDATE payments SET status = 'completed', txHash = ?, receivedAmount = ?, blockTimestamp = ?, completedAt = ?
            WHERE id = ? AND status = 'pending'
        `, completion.txHash, completion.receivedAmount, completion.blockTimestamp, completion.completedAt, id));
        return this.afterTransition(id, 'completed', result.changes);
    }

    async transitionToExpired(id: string): Promise<IPaymentRecord> {
        const result = await this.query('transitionToExpired', db =>
            db.run(`UPDATE payments SET status = 'expired' WHERE id = ? AND status = 'pending'`, id));
        return this.afterTransition(id, 'expired', result.changes);
    }

    async advanceCheckpoint(id: string, timestamp: number): Promise<void> {
        await this.query('advanceCheckpoint', db =>
            db.run('UPDATE payments SET checkpointTimestamp = MAX(checkpointTimestamp, ?) WHERE id = ?', timestamp, id));
    }

    async recordCallbackAttempt(id: string, at: number): Promise<void> {
        await this.query('recordCallbackAttempt', db =>
            db.run('UPDATE payments SET callbackAttempts = callbackAttempts + 1, lastCallbackAt = ? WHERE id = ?', at, id));
    }

    async markCallbackDelivered(id: string): Promise<void> {
        await this.query('markCallbackDelivered', db =>
            db.run('UPDATE payments SET callbackDelivered = 1 WHERE id = ?', id));
    }

    async appendEvent(paymentId: string, type: PaymentEventType, message: string, payload?: EventPayload): Promise<void> {
        await this.query('appendEvent', db => db.run(`
            INSERT INTO payment_events(paymentId, eventType, message, payload, createdAt)
            VALUES(?, ?, ?, ?, ?)
        `, paymentId, type, message, payload ? JSON.stringify(payload) : null, Date.now()));
    }

    async listEvents(paymentId: string): Promise<IPaymentEvent[]> {
        const rows = await this.query('listEvents', db =>
            db.all<EventRow[]>('SELECT * FROM payment_events WHERE paymentId = ? ORDER BY id', paymentId));
        return rows.map(toEvent);
    }

    async deleteEventsBefore(cutoff: number): Promise<number> {
        const result = await this.query('deleteEventsBefore', db =>
            db.run('DELETE FROM payment_events WHERE createdAt < ?', cutoff));
        return result.changes ?? 0;
    }

    async countByStatus(): Promise<Record<PaymentStatus, number>> {
        const rows = await this.query('countByStatus', db =>
            db.all<{ status: string; count: number }[]>('SELECT status, COUNT(*) AS count FROM payments GROUP BY status'));
        const counts: Record<PaymentStatus, number> = { pending: 0, completed: 0, failed: 0, expired: 0 };
        for (const row of rows) {
            counts[PaymentStatusSchema.parse(row.status)] = row.count;
        }
        return counts;
    }

    private async connect(): Promise<Database> {
        const db = await open({
            filename: this.dbPath,
            driver: sqlite3.Database
        });
        await db.exec(SCHEMA);
        return db;
    }

    private async connection(): Promise<Database> {
        try {
            return await this.init();
        } catch (e) {
            throw new StorageError(`Cannot open ${this.dbPath}: ${errorMessage(e)}`, e);
        }
    }

    private async query<T>(operation: string, run: (db: Database) => Promise<T>): Promise<T> {
        const db = await this.connection();
        try {
            return await run(db);
        } catch (e) {
            throw new StorageError(`${operation} failed: ${errorMessage(e)}`, e);
        }
    }

    // A zero-row conditional update means the payment is missing or no longer pending
    private async afterTransition(id: string, to: PaymentStatus, changes: number | undefined): Promise<IPaymentRecord> {
        const current = await this.get(id);
        if (!current) throw new PaymentNotFoundError(id);
        if (!changes) {
            assertTransition(id, current.status, to);
            throw new StorageError(`Payment ${id} was not moved to ${to}`);
        }
        return current;
    }
}

function isUniqueViolation(error: unknown, column: string): boolean {
    return error instanceof Error
        && 'code' in error
        && error.code === 'SQLITE_CONSTRAINT'
        && error.message.includes(column);
}

function toRecord(row: PaymentRow): IPaymentRecord {
    return {
        id: row.id,
        walletAddress: row.walletAddress,
        expectedAmount: row.expectedAmount,
        callbackUrl: row.callbackUrl,
        orderId: row.orderId,
        status: PaymentStatusSchema.parse(row.status),
        txHash: row.txHash ?? undefined,
        receivedAmount: row.receivedAmount ?? undefined,
        blockTimestamp: row.blockTimestamp ?? undefined,
        createdAt: row.createdAt,
        completedAt: row.completedAt ?? undefined,
        checkpointTimestamp: row.checkpointTimestamp,
        callbackAttempts: row.callbackAttempts,
        lastCallbackAt: row.lastCallbackAt ?? undefined,
        callbackDelivered: row.callbackDelivered === 1,
    };
}

function toEvent(row: EventRow): IPaymentEvent {
    return {
        id: row.id,
        paymentId: row.paymentId,
        eventType: PaymentEventTypeSchema.parse(row.eventType),
        message: row.message,
        payload: row.payload ? EventPayloadSchema.parse(JSON.parse(row.payload)) : undefined,
        createdAt: row.createdAt,
    };
}
