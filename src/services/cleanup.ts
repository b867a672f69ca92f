import type { IPaymentStorage } from '../domain/storage.js';
import { errorMessage } from '../domain/errors.js';
import { componentLogger } from '../logger.js';

const logger = componentLogger('cleanup');

/** Periodically drops audit events older than the retention window. Payments are kept. */
export class CleanupService {
    private timer?: NodeJS.Timeout;

    constructor(
        private storage: Pick<IPaymentStorage, 'deleteEventsBefore'>,
        private retentionMs: number = 30 * 24 * 60 * 60 * 1000, // 30 days
        private intervalMs: number = 60 * 60 * 1000 // 1 hour
    ) { }

    start() {
        if (this.timer) return;
        this.timer = setInterval(() => {
            void this.purge();
        }, this.intervalMs);
        this.timer.unref(); // Don't keep the process alive just for this
    }

    stop() {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = undefined;
        }
    }

    async purge(now: number = Date.now()): Promise<number> {
        const cutoff = now - this.retentionMs;
        try {
            const removed = await this.storage.deleteEventsBefore(cutoff);
            logger.info({ removed, cutoff: new Date(cutoff).toISOString() }, 'Purged old payment events');
            return removed;
        } catch (e) {
            logger.error({ error: errorMessage(e) }, 'Error during cleanup');
            return 0;
        }
    }
}
