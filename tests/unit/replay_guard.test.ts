import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ReplayGuard, type NonceKey } from '../../src/services/replay_guard.js';
import { JsonNonceStorage } from '../../src/storage/json.js';
import { SqliteNonceStorage } from '../../src/storage/sqlite.js';
import type { INonceStorage } from '../../src/domain/storage.js';
import { NETWORK, T0, TX_HASH, USDC, nonce, payer } from '../fixtures.js';

const key: NonceKey = { network: NETWORK, asset: USDC, nonce: nonce(1) };
const meta = { payer: payer.address, validBefore: T0 + 60 };

const backends: Array<[string, () => INonceStorage & { close?: () => Promise<void> }]> = [
    ['json', () => new JsonNonceStorage()],
    ['sqlite', () => new SqliteNonceStorage(':memory:')],
];

describe.each(backends)('ReplayGuard over %s storage', (_name, createStorage) => {
    let storage: INonceStorage & { close?: () => Promise<void> };
    let now: number;
    let guard: ReplayGuard;

    beforeEach(() => {
        storage = createStorage();
        now = T0;
        guard = new ReplayGuard(storage, () => now);
    });

    afterEach(async () => {
        await storage.close?.();
    });

    it('derives a lower-cased id from network, asset and nonce', () => {
        expect(ReplayGuard.idOf({ network: NETWORK, asset: '0xABCDEF0000000000000000000000000000000001', nonce: '0xAB' }))
            .toBe('base-sepolia:0xabcdef0000000000000000000000000000000001:0xab');
    });

    it('grants a reservation to exactly one of concurrent callers', async () => {
        const results = await Promise.all([guard.reserve(key, meta), guard.reserve(key, meta), guard.reserve(key, meta)]);
        expect(results.filter(Boolean)).toHaveLength(1);
    });

    it('treats the same nonce on another asset as distinct', async () => {
        expect(await guard.reserve(key, meta)).toBe(true);
        expect(await guard.reserve({ ...key, asset: '0x4444444444444444444444444444444444444444' }, meta)).toBe(true);
    });

    it('frees a released reservation', async () => {
        await guard.reserve(key, meta);
        await guard.release(key);
        expect(await guard.reserve(key, meta)).toBe(true);
    });

    it('makes a committed nonce permanently unavailable', async () => {
        await guard.reserve(key, meta);
        await guard.commit(key, meta, TX_HASH);
        await guard.release(key);

        expect(await guard.isAccepted(key)).toBe(true);
        expect(await guard.reserve(key, meta)).toBe(false);
    });

    it('records a commit even without a prior reservation', async () => {
        await guard.commit(key, meta, TX_HASH);
        expect(await storage.get(ReplayGuard.idOf(key))).toMatchObject({ status: 'committed', txHash: TX_HASH });
    });

    it('keeps a reverted nonce burned with its signature hash until it expires', async () => {
        await guard.reserve(key, { ...meta, signatureHash: TX_HASH });
        await guard.markReverted(key, TX_HASH);

        expect(await guard.lookup(key)).toMatchObject({ status: 'reverted', txHash: TX_HASH, signatureHash: TX_HASH });
        expect(await guard.isAccepted(key)).toBe(false);
        expect(await guard.pending()).toEqual([]);
        expect(await guard.reserve(key, meta)).toBe(false);

        now = T0 + 61;
        expect(await guard.purgeExpired()).toBe(1);
        expect(await guard.reserve(key, meta)).toBe(true);
    });

    it('lists only reservations that carry a transaction as pending', async () => {
        await guard.reserve(key, meta);
        await guard.reserve({ ...key, nonce: nonce(2) }, meta);
        await guard.attachTransaction(key, TX_HASH);

        const pending = await guard.pending();
        expect(pending.map((r) => r.id)).toEqual([ReplayGuard.idOf(key)]);
        expect(pending[0].txHash).toBe(TX_HASH);
    });

    it('purges expired records but keeps unresolved submissions', async () => {
        await guard.reserve(key, meta);
        await guard.attachTransaction(key, TX_HASH);
        await guard.reserve({ ...key, nonce: nonce(2) }, meta);
        await guard.commit({ ...key, nonce: nonce(3) }, meta);
        await guard.reserve({ ...key, nonce: nonce(4) }, { ...meta, validBefore: T0 + 600 });

        now = T0 + 61;
        expect(await guard.purgeExpired()).toBe(2);
        expect(await guard.isAccepted({ ...key, nonce: nonce(3) })).toBe(false);
        expect(await storage.get(ReplayGuard.idOf(key))).not.toBeNull();
        expect(await storage.get(ReplayGuard.idOf({ ...key, nonce: nonce(4) }))).not.toBeNull();
    });
});
