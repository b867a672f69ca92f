import http from 'http';
import type { IPaymentRecord, ITransferRecord } from '../src/domain/payment.js';
import { USDT_TRC20_CONTRACT_ADDRESS } from '../src/config.js';

export const WALLET = 'TWatchWa11etAddress111111111111111';
export const OTHER_WALLET = 'TSecondWa11etAddress22222222222222';
export const FAKE_TOKEN = 'TFakeTokenContract3333333333333333';
export const USDT = USDT_TRC20_CONTRACT_ADDRESS;

export const T0 = 1_700_000_000_000;

let sequence = 0;

export function makePayment(overrides: Partial<IPaymentRecord> = {}): IPaymentRecord {
    sequence += 1;
    return {
        id: `payment-${sequence}`,
        walletAddress: WALLET,
        expectedAmount: 12.34,
        callbackUrl: 'https://merchant.example/webhook',
        orderId: `order-${sequence}`,
        status: 'pending',
        createdAt: T0,
        checkpointTimestamp: T0,
        callbackAttempts: 0,
        callbackDelivered: false,
        ...overrides,
    };
}

export function makeTransfer(overrides: Partial<ITransferRecord> = {}): ITransferRecord {
    sequence += 1;
    return {
        toAddress: WALLET,
        tokenContractAddress: USDT,
        rawAmount: 12_340_000n,
        tokenDecimals: 6,
        txHash: `tx-${sequence}`,
        blockTimestamp: T0 + 5_000,
        confirmed: true,
        ...overrides,
    };
}

export interface RecordedRequest {
    method: string;
    url: string;
    headers: http.IncomingHttpHeaders;
    body: string;
}

export interface StubServer {
    url: string;
    requests: RecordedRequest[];
    close(): Promise<void>;
}

export type StubResponder = (req: RecordedRequest, res: http.ServerResponse) => void;

/** HTTP server on a random local port that records every request it receives. */
export async function startStubServer(respond: StubResponder): Promise<StubServer> {
    const requests: RecordedRequest[] = [];
    const server = http.createServer((req, res) => {
        const chunks: Buffer[] = [];
        req.on('data', chunk => chunks.push(Buffer.from(chunk)));
        req.on('end', () => {
            const recorded: RecordedRequest = {
                method: req.method ?? '',
                url: req.url ?? '',
                headers: req.headers,
                body: Buffer.concat(chunks).toString('utf-8'),
            };
            requests.push(recorded);
            respond(recorded, res);
        });
    });

    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') {
        throw new Error('Stub server is not listening on a TCP port');
    }

    return {
        url: `http://127.0.0.1:${address.port}`,
        requests,
        close: () => new Promise<void>((resolve, reject) => {
            server.closeAllConnections();
            server.close(err => (err ? reject(err) : resolve()));
        }),
    };
}

export function sendJson(res: http.ServerResponse, status: number, body: unknown) {
    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(body));
}
