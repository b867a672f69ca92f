import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { ILedgerClient } from '../domain/ledger.js';
import type { ITransferRecord } from '../domain/payment.js';
import { TransientLedgerError, errorMessage } from '../domain/errors.js';
import { USDT_DECIMALS } from '../utils/amount.js';
import { componentLogger } from '../logger.js';

const logger = componentLogger('trongrid');

export const TRONGRID_PAGE_SIZE = 50;

const TronGridTransferSchema = z.object({
    transaction_id: z.string(),
    block_timestamp: z.number(),
    to: z.string(),
    type: z.string().optional(),
    value: z.string().regex(/^\d+$/),
    token_info: z.object({
        address: z.string(),
        decimals: z.number().int().nonnegative().optional(),
    }),
});

const TronGridResponseSchema = z.object({
    data: z.array(TronGridTransferSchema).default([]),
});

export interface TronGridOptions {
    baseUrl: string;
    apiKey?: string;
    timeoutMs?: number;
}

/**
 * Reads TRC20 transfer history from TronGrid. Only confirmed transfers are requested,
 * newest first, one page per call.
 */
export class TronGridClient implements ILedgerClient {
    private http: AxiosInstance;

    constructor(options: TronGridOptions) {
        this.http = axios.create({
            baseURL: options.baseUrl,
            timeout: options.timeoutMs ?? 10000,
            headers: options.apiKey ? { 'TRON-PRO-API-KEY': options.apiKey } : {},
        });
    }

    async fetchTransfers(address: string, sinceTimestamp: number): Promise<ITransferRecord[]> {
        if (!address) {
            throw new Error('address is required');
        }
        if (!Number.isFinite(sinceTimestamp) || sinceTimestamp < 0) {
            throw new RangeError(`sinceTimestamp must be a non-negative number, got ${sinceTimestamp}`);
        }

        let body: unknown;
        try {
            const response = await this.http.get(`/accounts/${encodeURIComponent(address)}/transactions/trc20`, {
                params: {
                    only_confirmed: true,
                    limit: TRONGRID_PAGE_SIZE,
                    order_by: 'block_timestamp,desc',
                    min_timestamp: sinceTimestamp,
                },
            });
            body = response.data;
        } catch (error) {
            const status = axios.isAxiosError(error) ? error.response?.status : undefined;
            logger.warn({ address, status, error: errorMessage(error) }, 'TronGrid request failed');
            throw new TransientLedgerError(`TronGrid request failed: ${errorMessage(error)}`, status);
        }

        const parsed = TronGridResponseSchema.safeParse(body);
        if (!parsed.success) {
            logger.warn({ address, issues: parsed.error.issues }, 'Unexpected TronGrid response');
            throw new TransientLedgerError('Unexpected TronGrid response shape');
        }

        return parsed.data.data
            .filter(tx => tx.type === undefined || tx.type === 'Transfer')
            .map(tx => ({
                toAddress: tx.to,
                tokenContractAddress: tx.token_info.address,
                rawAmount: BigInt(tx.value),
                tokenDecimals: tx.token_info.decimals ?? USDT_DECIMALS,
                txHash: tx.transaction_id,
                blockTimestamp: tx.block_timestamp,
                confirmed: true,
            }));
    }
}
