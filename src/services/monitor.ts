import type { IPaymentStorage } from '../domain/storage.js';
import { AlreadyTerminalError, StorageError, errorMessage } from '../domain/errors.js';
import type { MatchOutcome, PaymentMatcher } from './matcher.js';
import { componentLogger } from '../logger.js';

const logger = componentLogger('monitor');

export interface MonitorOptions {
    pollingIntervalMs: number;
    maxPaymentLifetimeMs: number;
    now?: () => number;
}

export interface TickSummary {
    expired: number;
    pending: number;
    outcomes: Record<MatchOutcome, number>;
    errors: number;
    interrupted: boolean;
}

/**
 * Reconciliation loop. Each tick expires stale payments, then runs the matcher over
 * every pending payment one after another. The next tick is armed only after the
 * previous one settles, so ticks never overlap.
 */
export class PaymentMonitor {
    private timer?: NodeJS.Timeout;
    private inFlight?: Promise<void>;
    private running = false;
    private stopping = false;
    private generation = 0;
    private now: () => number;

    constructor(
        private storage: Pick<IPaymentStorage, 'listPending' | 'listExpirable' | 'transitionToExpired' | 'appendEvent'>,
        private matcher: Pick<PaymentMatcher, 'process'>,
        private options: MonitorOptions
    ) {
        this.now = options.now ?? Date.now;
    }

    start() {
        if (this.running) return;
        this.running = true;
        this.stopping = false;
        this.generation += 1;
        logger.info({ intervalMs: this.options.pollingIntervalMs }, 'Payment monitor started');
        this.schedule(0);
    }

    /** Resolves once the in-flight tick, if any, has finished its current payment. */
    async stop(): Promise<void> {
        this.running = false;
        this.stopping = true;
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = undefined;
        }
        await this.inFlight;
        logger.info('Payment monitor stopped');
    }

    isRunning(): boolean {
        return this.running;
    }

    async tick(now: number = this.now()): Promise<TickSummary> {
        const summary: TickSummary = {
            expired: await this.expireStale(now),
            pending: 0,
            outcomes: { matched: 0, no_match: 0, query_failed: 0 },
            errors: 0,
            interrupted: false,
        };

        const pending = await this.storage.listPending();
        summary.pending = pending.length;

        for (const payment of pending) {
            if (this.stopping) {
                summary.interrupted = true;
                break;
            }
            try {
                const outcome = await this.matcher.process(payment);
                summary.outcomes[outcome] += 1;
            } catch (error) {
                if (error instanceof StorageError) throw error;
                summary.errors += 1;
                logger.error({ paymentId: payment.id, error: errorMessage(error) }, 'Unexpected error while processing payment');
            }
        }

        return summary;
    }

    async expireStale(now: number): Promise<number> {
        const cutoff = now - this.options.maxPaymentLifetimeMs;
        const expirable = await this.storage.listExpirable(cutoff);
        let expired = 0;

        for (const payment of expirable) {
            try {
                await this.storage.transitionToExpired(payment.id);
            } catch (error) {
                if (error instanceof AlreadyTerminalError) {
                    logger.debug({ paymentId: payment.id, status: error.status }, 'Payment already settled, not expiring');
                    continue;
                }
                throw error;
            }
            await this.storage.appendEvent(payment.id, 'expired', 'No matching transfer before the payment lifetime ran out', {
                createdAt: payment.createdAt,
                cutoff,
            });
            logger.info({ paymentId: payment.id, orderId: payment.orderId }, 'Payment expired');
            expired += 1;
        }

        return expired;
    }

    private schedule(delayMs: number) {
        // A tick left over from before a restart must not re-arm alongside the new chain
        const generation = this.generation;
        this.timer = setTimeout(() => {
            this.timer = undefined;
            const tick = this.runTick().finally(() => {
                if (this.inFlight === tick) this.inFlight = undefined;
                if (this.running && generation === this.generation) this.schedule(this.options.pollingIntervalMs);
            });
            this.inFlight = tick;
        }, delayMs);
        this.timer.unref();
    }

    private async runTick(): Promise<void> {
        try {
            const summary = await this.tick();
            if (summary.pending > 0 || summary.expired > 0) {
                logger.info(summary, 'Reconciliation tick finished');
            }
        } catch (error) {
            logger.error({ error: errorMessage(error) }, 'Reconciliation tick aborted, retrying next interval');
        }
    }
}
