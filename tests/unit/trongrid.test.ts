import { describe, it, expect, afterEach } from 'vitest';
import { TronGridClient } from '../../src/services/trongrid.js';
import { TransientLedgerError } from '../../src/domain/errors.js';
import { FAKE_TOKEN, T0, USDT, WALLET, sendJson, startStubServer, type StubServer } from '../helpers.js';

describe('TronGridClient', () => {
    let server: StubServer | undefined;

    afterEach(async () => {
        await server?.close();
        server = undefined;
    });

    it('should request one page of confirmed transfers newer than the checkpoint', async () => {
        server = await startStubServer((_req, res) => sendJson(res, 200, { data: [], success: true }));
        const client = new TronGridClient({ baseUrl: `${server.url}/v1`, apiKey: 'test-api-key' });

        await client.fetchTransfers(WALLET, T0);

        expect(server.requests).toHaveLength(1);
        const request = server.requests[0];
        const url = new URL(request.url, server.url);
        expect(request.method).toBe('GET');
        expect(url.pathname).toBe(`/v1/accounts/${WALLET}/transactions/trc20`);
        expect(url.searchParams.get('only_confirmed')).toBe('true');
        expect(url.searchParams.get('limit')).toBe('50');
        expect(url.searchParams.get('order_by')).toBe('block_timestamp,desc');
        expect(url.searchParams.get('min_timestamp')).toBe(String(T0));
        expect(request.headers['tron-pro-api-key']).toBe('test-api-key');
    });

    it('should omit the API key header when none is configured', async () => {
        server = await startStubServer((_req, res) => sendJson(res, 200, { data: [] }));
        const client = new TronGridClient({ baseUrl: server.url });

        await client.fetchTransfers(WALLET, 0);

        expect(server.requests[0].headers['tron-pro-api-key']).toBeUndefined();
    });

    it('should map transfers and drop approvals', async () => {
        server = await startStubServer((_req, res) => sendJson(res, 200, {
            data: [
                {
                    transaction_id: 'tx-1',
                    block_timestamp: T0 + 3_000,
                    from: 'TSenderAddress',
                    to: WALLET,
                    type: 'Transfer',
                    value: '12340000',
                    token_info: { address: USDT, decimals: 6, symbol: 'USDT' },
                },
                {
                    transaction_id: 'tx-2',
                    block_timestamp: T0 + 2_000,
                    to: WALLET,
                    type: 'Approval',
                    value: '99000000',
                    token_info: { address: USDT, decimals: 6 },
                },
                {
                    transaction_id: 'tx-3',
                    block_timestamp: T0 + 1_000,
                    to: WALLET,
                    value: '500',
                    token_info: { address: FAKE_TOKEN },
                },
            ],
        }));
        const client = new TronGridClient({ baseUrl: server.url });

        const transfers = await client.fetchTransfers(WALLET, T0);

        expect(transfers).toEqual([
            {
                toAddress: WALLET,
                tokenContractAddress: USDT,
                rawAmount: 12_340_000n,
                tokenDecimals: 6,
                txHash: 'tx-1',
                blockTimestamp: T0 + 3_000,
                confirmed: true,
            },
            {
                toAddress: WALLET,
                tokenContractAddress: FAKE_TOKEN,
                rawAmount: 500n,
                tokenDecimals: 6,
                txHash: 'tx-3',
                blockTimestamp: T0 + 1_000,
                confirmed: true,
            },
        ]);
    });

    it('should treat a missing data field as no transfers', async () => {
        server = await startStubServer((_req, res) => sendJson(res, 200, { success: true }));
        const client = new TronGridClient({ baseUrl: server.url });

        expect(await client.fetchTransfers(WALLET, T0)).toEqual([]);
    });

    it('should turn HTTP errors into TransientLedgerError', async () => {
        server = await startStubServer((_req, res) => sendJson(res, 429, { error: 'rate limited' }));
        const client = new TronGridClient({ baseUrl: server.url });

        const error = await client.fetchTransfers(WALLET, T0).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(TransientLedgerError);
        expect(error).toMatchObject({ status: 429 });
    });

    it('should turn an unexpected body into TransientLedgerError', async () => {
        server = await startStubServer((_req, res) => sendJson(res, 200, { data: [{ to: WALLET }] }));
        const client = new TronGridClient({ baseUrl: server.url });

        await expect(client.fetchTransfers(WALLET, T0)).rejects.toThrow('Unexpected TronGrid response shape');
    });

    it('should time out slow responses', async () => {
        server = await startStubServer(() => { /* never answers */ });
        const client = new TronGridClient({ baseUrl: server.url, timeoutMs: 50 });

        await expect(client.fetchTransfers(WALLET, T0)).rejects.toThrow(TransientLedgerError);
    });

    it('should reject invalid arguments without calling the API', async () => {
        server = await startStubServer((_req, res) => sendJson(res, 200, { data: [] }));
        const client = new TronGridClient({ baseUrl: server.url });

        await expect(client.fetchTransfers('', T0)).rejects.toThrow('address is required');
        await expect(client.fetchTransfers(WALLET, -1)).rejects.toThrow(RangeError);
        expect(server.requests).toHaveLength(0);
    });
});
