import request from 'supertest';
import http from 'http';
import { WebSocket } from 'ws';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Express } from 'express';
import { createServer } from '../../src/index.js';
import { attachTransport } from '../../src/ws.js';
import { Facilitator } from '../../src/services/facilitator.js';
import { FacilitatorPaymentProcessor } from '../../src/stream/payments.js';
import { ChainUnavailableError } from '../../src/domain/errors.js';
import {
    FakeChain,
    NETWORK,
    PAY_TO,
    T0,
    TX_HASH,
    USDC,
    buildServices,
    nonce,
    payer,
    requirements,
    signPayment,
} from '../fixtures.js';

describe('API E2E Tests', () => {
    let app: Express;
    let chain: FakeChain;
    let services: ReturnType<typeof buildServices>;
    let facilitator: Facilitator;

    beforeEach(() => {
        chain = new FakeChain();
        services = buildServices(undefined, chain);
        facilitator = new Facilitator(services.registry, services.verifier, services.settler, services.clock.now);
        app = createServer({ facilitator });
    });

    it('GET /supported lists active kinds', async () => {
        const res = await request(app).get('/supported');
        expect(res.status).toBe(200);
        expect(res.body).toEqual({ kinds: [{ x402Version: 1, scheme: 'exact', network: NETWORK, asset: USDC }] });
    });

    it('GET /health reports ok', async () => {
        const res = await request(app).get('/health');
        expect(res.body).toEqual({ status: 'ok' });
    });

    it('POST /verify accepts a signed payment', async () => {
        const res = await request(app)
            .post('/verify')
            .send({ x402Version: 1, paymentPayload: await signPayment(), paymentRequirements: requirements() });

        expect(res.status).toBe(200);
        expect(res.body).toEqual({ isValid: true, payer: payer.address });
    });

    it('POST /verify returns a reason for an invalid payment', async () => {
        const res = await request(app)
            .post('/verify')
            .send({ paymentPayload: await signPayment({ validBefore: T0 - 1 }), paymentRequirements: requirements() });

        expect(res.status).toBe(200);
        expect(res.body).toEqual({ isValid: false, invalidReason: 'expired', payer: payer.address });
    });

    it('POST /verify rejects a malformed body', async () => {
        const res = await request(app).post('/verify').send({ paymentPayload: { scheme: 'exact' } });
        expect(res.status).toBe(400);
        expect(res.body.error).toBe('invalid_request');
    });

    it('POST /verify answers 503 when the chain is unreachable', async () => {
        chain.readError = new ChainUnavailableError(NETWORK);
        const res = await request(app)
            .post('/verify')
            .send({ paymentPayload: await signPayment(), paymentRequirements: requirements() });

        expect(res.status).toBe(503);
        expect(res.body).toEqual({ error: 'chain_unavailable', network: NETWORK });
    });

    it('POST /settle settles once and refuses a replay', async () => {
        const body = { paymentPayload: await signPayment(), paymentRequirements: requirements() };

        const first = await request(app).post('/settle').send(body);
        expect(first.status).toBe(200);
        expect(first.body).toEqual({ success: true, payer: payer.address, transaction: TX_HASH, network: NETWORK });

        const second = await request(app).post('/settle').send(body);
        expect(second.body).toEqual({ success: false, errorReason: 'nonce_reused', payer: payer.address, network: NETWORK });
        expect(chain.submissions).toHaveLength(1);
    });

    describe('message transport', () => {
        let server: http.Server;
        let url: string;
        const open: WebSocket[] = [];

        beforeEach(async () => {
            server = http.createServer(app);
            attachTransport(server, {
                facilitator,
                stream: {
                    terms: {
                        network: NETWORK,
                        asset: USDC,
                        payTo: PAY_TO,
                        unitSeconds: 60,
                        pricePerUnit: '50000',
                        resource: 'wss://seller.test/stream',
                        extra: { name: 'USDC', version: '2' },
                    },
                    policy: {
                        requireAtFraction: 0.5,
                        windowGraceSeconds: 10,
                        requirementGraceSeconds: 10,
                        heartbeatIntervalMs: 60000,
                        settle: true,
                    },
                    processor: new FacilitatorPaymentProcessor(services.verifier, services.settler, services.clock.now),
                    tickIntervalMs: 60000,
                },
            });
            await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
            const address = server.address();
            if (address === null || typeof address === 'string') throw new Error('Expected a TCP listener');
            url = `ws://127.0.0.1:${address.port}`;
        });

        afterEach(async () => {
            open.splice(0).forEach((ws) => ws.terminate());
            await new Promise<void>((resolve, reject) => server.close((e) => (e ? reject(e) : resolve())));
        });

        function streamIdOf(message: unknown): unknown {
            return typeof message === 'object' && message !== null && 'params' in message
                && typeof message.params === 'object' && message.params !== null && 'streamId' in message.params
                ? message.params.streamId
                : undefined;
        }

        async function connect(path: string) {
            const ws = new WebSocket(`${url}${path}`);
            open.push(ws);
            const inbox: unknown[] = [];
            const waiters: Array<() => void> = [];
            ws.on('message', (data) => {
                inbox.push(JSON.parse(data.toString()));
                waiters.splice(0).forEach((wake) => wake());
            });
            await new Promise<void>((resolve, reject) => {
                ws.once('open', () => resolve());
                ws.once('error', reject);
            });
            const next = async (): Promise<unknown> => {
                while (inbox.length === 0) {
                    await new Promise<void>((resolve) => waiters.push(resolve));
                }
                return inbox.shift();
            };
            return { ws, next };
        }

        it('serves facilitator methods over /ws', async () => {
            const { ws, next } = await connect('/ws');
            ws.send(JSON.stringify({ id: 1, method: 'x402.supported' }));
            expect(await next()).toEqual({
                id: 1,
                result: { kinds: [{ x402Version: 1, scheme: 'exact', network: NETWORK, asset: USDC }] },
            });

            ws.send('{');
            expect(await next()).toEqual({ id: null, error: { code: -32700, message: 'Parse error' } });
        });

        it('refuses a request id already in flight on the same connection', async () => {
            let confirm: (status: 'confirmed') => void = () => undefined;
            const status = vi.spyOn(chain, 'getTxStatus').mockImplementationOnce(
                () => new Promise((resolve) => { confirm = resolve; })
            );
            const { ws, next } = await connect('/ws');
            const settle = async (n: number) => JSON.stringify({
                id: 7,
                method: 'x402.settle',
                params: { paymentPayload: await signPayment({ nonce: nonce(n) }), paymentRequirements: requirements() },
            });
            const first = await settle(1);
            const second = await settle(2);

            ws.send(first);
            ws.send(first);
            expect(await next()).toEqual({
                id: 7,
                error: { code: -32600, message: 'Duplicate request id in flight' },
            });

            await vi.waitFor(() => expect(status).toHaveBeenCalledTimes(1));
            confirm('confirmed');
            expect(await next()).toEqual({
                id: 7,
                result: { success: true, payer: payer.address, transaction: TX_HASH, network: NETWORK },
            });

            ws.send(second);
            expect(await next()).toEqual({
                id: 7,
                result: { success: true, payer: payer.address, transaction: TX_HASH, network: NETWORK },
            });
        });

        it('runs a paid stream over /stream', async () => {
            const { ws, next } = await connect('/stream');
            ws.send(JSON.stringify({ id: 1, method: 'stream.init', params: { unitSeconds: 60, price: '50000' } }));

            const accept = await next();
            expect(accept).toMatchObject({ id: 1, result: { method: 'stream.accept' } });
            const required = await next();
            expect(required).toMatchObject({ method: 'stream.require', params: { sliceIndex: 0 } });

            const streamId = streamIdOf(required);
            ws.send(JSON.stringify({
                id: 2,
                method: 'stream.pay',
                params: { streamId, sliceIndex: 0, paymentPayload: await signPayment() },
            }));
            expect(await next()).toMatchObject({
                id: 2,
                result: { method: 'stream.accept', params: { sliceIndex: 0, settle: { success: true, transaction: TX_HASH } } },
            });
        });

        it('closes the connection once the buyer ends the stream', async () => {
            const { ws, next } = await connect('/stream');
            ws.send(JSON.stringify({ id: 1, method: 'stream.init' }));
            await next();
            const streamId = streamIdOf(await next());

            const closed = new Promise<number>((resolve) => ws.once('close', (code) => resolve(code)));
            ws.send(JSON.stringify({ id: 2, method: 'stream.end', params: { streamId } }));
            expect(await next()).toMatchObject({ id: 2, result: { method: 'stream.end', params: { reason: 'buyer_end' } } });
            expect(await closed).toBe(1000);
        });

        it('refuses upgrades on unknown paths', async () => {
            const ws = new WebSocket(`${url}/nowhere`);
            open.push(ws);
            await expect(new Promise((resolve, reject) => {
                ws.once('open', resolve);
                ws.once('error', reject);
            })).rejects.toBeInstanceOf(Error);
        });
    });
});
