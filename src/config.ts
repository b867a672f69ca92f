import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';

dotenv.config();

// Tether USD on TRON mainnet
export const USDT_TRC20_CONTRACT_ADDRESS = 'TR7NHqjeKQxGTCi8q8ZY4pL8otSzgjLj6t';

const ConfigSchema = z.object({
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    POLLING_INTERVAL_SECONDS: z.coerce.number().positive().default(10),
    MAX_PAYMENT_LIFETIME_SECONDS: z.coerce.number().int().positive().default(86400),
    TRONGRID_API_BASE_URL: z.string().url().default('https://api.trongrid.io/v1'),
    TRONGRID_API_KEY: z.string().optional(),
    LEDGER_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
    CALLBACK_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
    MIN_AMOUNT_USDT: z.coerce.number().positive().default(0.01),
    MAX_AMOUNT_USDT: z.coerce.number().positive().default(1000000),
    STORAGE_TYPE: z.enum(['sqlite', 'json']).default('sqlite'),
    SQLITE_DB_PATH: z.string().default('./payments.db'),
    JSON_DB_PATH: z.string().default('./data/payments.json'),
    EVENT_RETENTION_DAYS: z.coerce.number().int().positive().default(30),
    CLEANUP_INTERVAL_MS: z.coerce.number().int().positive().default(60 * 60 * 1000),
}).refine(env => env.MIN_AMOUNT_USDT <= env.MAX_AMOUNT_USDT, {
    message: 'MIN_AMOUNT_USDT must not exceed MAX_AMOUNT_USDT',
    path: ['MIN_AMOUNT_USDT'],
});

export type LogLevel = z.infer<typeof ConfigSchema>['LOG_LEVEL'];

export interface AppConfig {
    port: number;
    logLevel: LogLevel;
    pollingIntervalMs: number;
    maxPaymentLifetimeMs: number;
    usdtContractAddress: string;
    tronGrid: {
        baseUrl: string;
        apiKey?: string;
        timeoutMs: number;
    };
    callbackTimeoutMs: number;
    amountLimits: {
        min: number;
        max: number;
    };
    storageType: 'sqlite' | 'json';
    sqliteDbPath: string;
    jsonDbPath: string;
    eventRetentionMs: number;
    cleanupIntervalMs: number;
}

export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
    // Blank values in .env behave like unset ones
    const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== ''));
    const parsed = ConfigSchema.parse(present);

    return {
        port: parsed.PORT,
        logLevel: parsed.LOG_LEVEL,
        pollingIntervalMs: parsed.POLLING_INTERVAL_SECONDS * 1000,
        maxPaymentLifetimeMs: parsed.MAX_PAYMENT_LIFETIME_SECONDS * 1000,
        usdtContractAddress: USDT_TRC20_CONTRACT_ADDRESS,
        tronGrid: {
            baseUrl: parsed.TRONGRID_API_BASE_URL,
            apiKey: parsed.TRONGRID_API_KEY,
            timeoutMs: parsed.LEDGER_TIMEOUT_MS,
        },
        callbackTimeoutMs: parsed.CALLBACK_TIMEOUT_MS,
        amountLimits: {
            min: parsed.MIN_AMOUNT_USDT,
            max: parsed.MAX_AMOUNT_USDT,
        },
        storageType: parsed.STORAGE_TYPE,
        sqliteDbPath: path.resolve(parsed.SQLITE_DB_PATH),
        jsonDbPath: path.resolve(parsed.JSON_DB_PATH),
        eventRetentionMs: parsed.EVENT_RETENTION_DAYS * 24 * 60 * 60 * 1000,
        cleanupIntervalMs: parsed.CLEANUP_INTERVAL_MS,
    };
}

export const config = loadConfig(process.env);
