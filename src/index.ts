import express, { type Request, type Response } from 'express';
import { ZodError } from 'zod';
import { pathToFileURL } from 'url';
import { PaymentService } from './services/payments.js';
import { PaymentMatcher } from './services/matcher.js';
import { PaymentMonitor } from './services/monitor.js';
import { CleanupService } from './services/cleanup.js';
import { TronGridClient } from './services/trongrid.js';
import { WebhookNotifier, type ICallbackDispatcher } from './services/notifier.js';
import { JsonPaymentStorage } from './storage/json.js';
import { SqlitePaymentStorage } from './storage/sqlite.js';
import { createPaymentRequestSchema } from './domain/schemas.js';
import type { IPaymentStorage } from './domain/storage.js';
import {
    DuplicateOrderIdError,
    PaymentNotCompletedError,
    PaymentNotFoundError,
    errorMessage,
} from './domain/errors.js';
import { config } from './config.js';
import { logger } from './logger.js';

function sendError(res: Response, error: unknown) {
    if (error instanceof ZodError) {
        res.status(400).json({ error: 'Invalid request', details: error.issues.map(issue => issue.message) });
    } else if (error instanceof DuplicateOrderIdError) {
        res.status(409).json({ error: error.message });
    } else if (error instanceof PaymentNotFoundError) {
        res.status(404).json({ error: 'Payment ID not found' });
    } else if (error instanceof PaymentNotCompletedError) {
        res.status(409).json({ error: error.message });
    } else {
        logger.error({ error: errorMessage(error) }, 'Request failed');
        res.status(500).json({ error: 'Internal server error' });
    }
}

export function createServer(dependencies: {
    storage: IPaymentStorage,
    dispatcher: ICallbackDispatcher,
    monitor?: Pick<PaymentMonitor, 'isRunning'>,
    amountLimits?: { min: number; max: number }
}) {
    const { storage, dispatcher, monitor } = dependencies;
    const payments = new PaymentService(storage, dispatcher);
    const CreatePaymentSchema = createPaymentRequestSchema(dependencies.amountLimits ?? config.amountLimits);

    const app = express();
    app.use(express.json());

    // /create_payment and /payment_status/:id are the first-generation paths integrations still call
    app.post(['/payments', '/create_payment'], async (req: Request, res: Response) => {
        try {
            const body = CreatePaymentSchema.parse(req.body);
            const payment = await payments.create({
                walletAddress: body.wallet_address,
                expectedAmount: body.expected_amount_usdt,
                callbackUrl: body.callback_url,
                orderId: body.order_id,
            });
            res.status(201).json({
                payment_id: payment.id,
                status: 'watching',
                message: 'Payment watch created successfully. Waiting for transaction.',
            });
        } catch (error) {
            logger.warn({ error: errorMessage(error) }, 'Create payment request rejected');
            sendError(res, error);
        }
    });

    app.get(['/payments/:id', '/payment_status/:id'], async (req: Request, res: Response) => {
        try {
            res.json(await payments.getStatus(req.params.id));
        } catch (error) {
            sendError(res, error);
        }
    });

    app.get('/payments/:id/events', async (req: Request, res: Response) => {
        try {
            const events = await payments.getEvents(req.params.id);
            res.json(events.map(event => ({
                event_type: event.eventType,
                message: event.message,
                payload: event.payload ?? null,
                created_at: event.createdAt / 1000,
            })));
        } catch (error) {
            sendError(res, error);
        }
    });

    app.post('/payments/:id/redeliver', async (req: Request, res: Response) => {
        try {
            const result = await payments.redeliverCallback(req.params.id);
            res.json({ payment_id: req.params.id, result });
        } catch (error) {
            sendError(res, error);
        }
    });

    app.get('/stats', async (_req: Request, res: Response) => {
        try {
            const stats = await payments.getStats();
            res.json({
                total_payments: stats.total,
                pending_payments: stats.pending,
                completed_payments: stats.completed,
                failed_payments: stats.failed,
                expired_payments: stats.expired,
            });
        } catch (error) {
            sendError(res, error);
        }
    });

    app.get('/health', (_req: Request, res: Response) => {
        res.json({
            status: 'ok',
            monitor: monitor?.isRunning() ? 'running' : 'stopped',
            timestamp: new Date().toISOString(),
        });
    });

    return app;
}

async function openStorage(): Promise<{ storage: IPaymentStorage; close: () => Promise<void> }> {
    if (config.storageType === 'sqlite') {
        logger.info({ path: config.sqliteDbPath }, 'Using SQLite storage');
        const sqliteStorage = new SqlitePaymentStorage(config.sqliteDbPath);
        await sqliteStorage.init();
        return { storage: sqliteStorage, close: () => sqliteStorage.close() };
    }
    logger.info({ path: config.jsonDbPath }, 'Using JSON storage');
    return { storage: new JsonPaymentStorage(config.jsonDbPath), close: async () => { } };
}

async function start() {
    const { storage, close } = await openStorage();

    const ledger = new TronGridClient(config.tronGrid);
    const notifier = new WebhookNotifier(storage, config.callbackTimeoutMs);
    const matcher = new PaymentMatcher(storage, ledger, notifier, config.usdtContractAddress);
    const monitor = new PaymentMonitor(storage, matcher, {
        pollingIntervalMs: config.pollingIntervalMs,
        maxPaymentLifetimeMs: config.maxPaymentLifetimeMs,
    });
    const cleanupService = new CleanupService(storage, config.eventRetentionMs, config.cleanupIntervalMs);

    const app = createServer({ storage, dispatcher: notifier, monitor });
    const server = app.listen(config.port, () => {
        logger.info({ port: config.port, ledger: config.tronGrid.baseUrl }, 'TRC20 payment monitor started');
    });

    monitor.start();
    cleanupService.start();

    let shuttingDown = false;
    const shutdown = async (signal: string) => {
        if (shuttingDown) return;
        shuttingDown = true;
        logger.info({ signal }, 'Shutting down');
        cleanupService.stop();
        await monitor.stop();
        await new Promise<void>(resolve => server.close(() => resolve()));
        await close();
        process.exit(0);
    };
    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
        process.once(signal, () => {
            shutdown(signal).catch(err => {
                logger.error({ error: errorMessage(err) }, 'Shutdown failed');
                process.exit(1);
            });
        });
    }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
    start().catch(err => {
        logger.error({ error: errorMessage(err) }, 'Failed to start server');
        process.exit(1);
    });
}
