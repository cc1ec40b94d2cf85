import type { Address, Hex } from 'viem';
import { pino } from 'pino';
import type { INonceRecord, INonceStorage } from '../domain/storage.js';
import { config } from '../config.js';

const logger = pino({ level: config.logLevel });

export interface NonceKey {
    network: string;
    asset: Address;
    nonce: Hex;
}

export interface ReservationMeta {
    payer: Address;
    validBefore: number;
    signatureHash?: Hex;
}

/**
 * At-most-once acceptance of authorization nonces, scoped globally per (network, asset, nonce).
 * Reservations are held across the submit/confirm window; commit makes the rejection permanent.
 */
export class ReplayGuard {
    constructor(
        private storage: INonceStorage,
        private now: () => number = () => Math.floor(Date.now() / 1000)
    ) { }

    static idOf(key: NonceKey): string {
        return `${key.network}:${key.asset.toLowerCase()}:${key.nonce.toLowerCase()}`;
    }

    async reserve(key: NonceKey, meta: ReservationMeta): Promise<boolean> {
        const id = ReplayGuard.idOf(key);
        const won = await this.storage.insertIfAbsent({
            id,
            network: key.network,
            asset: key.asset,
            nonce: key.nonce,
            payer: meta.payer,
            status: 'reserved',
            signatureHash: meta.signatureHash,
            validBefore: meta.validBefore,
            createdAt: this.now(),
        });
        logger.debug({ id, won }, 'Nonce reservation attempted');
        return won;
    }

    async attachTransaction(key: NonceKey, txHash: Hex): Promise<void> {
        await this.storage.update(ReplayGuard.idOf(key), { txHash });
    }

    /** Idempotent. Commits even when the reservation was lost, so a confirmed transfer is never forgotten. */
    async commit(key: NonceKey, meta: ReservationMeta, txHash?: Hex): Promise<void> {
        const id = ReplayGuard.idOf(key);
        const existing = await this.storage.get(id);
        if (!existing) {
            await this.storage.insertIfAbsent({
                id,
                network: key.network,
                asset: key.asset,
                nonce: key.nonce,
                payer: meta.payer,
                status: 'committed',
                txHash,
                validBefore: meta.validBefore,
                createdAt: this.now(),
            });
        }
        await this.storage.update(id, txHash ? { status: 'committed', txHash } : { status: 'committed' });
    }

    async release(key: NonceKey): Promise<void> {
        const id = ReplayGuard.idOf(key);
        const existing = await this.storage.get(id);
        if (existing?.status === 'committed') {
            logger.warn({ id }, 'Refusing to release a committed nonce');
            return;
        }
        await this.storage.delete(id);
    }

    /** Burns the nonce after an on-chain revert; the record is purged once validBefore passes. */
    async markReverted(key: NonceKey, txHash?: Hex): Promise<void> {
        const id = ReplayGuard.idOf(key);
        await this.storage.update(id, txHash ? { status: 'reverted', txHash } : { status: 'reverted' });
        logger.debug({ id }, 'Nonce burned after revert');
    }

    async lookup(key: NonceKey): Promise<INonceRecord | null> {
        return this.storage.get(ReplayGuard.idOf(key));
    }

    async isAccepted(key: NonceKey): Promise<boolean> {
        const record = await this.storage.get(ReplayGuard.idOf(key));
        return record?.status === 'committed';
    }

    /** Reservations with a submitted transaction whose outcome is still unknown. */
    async pending(): Promise<INonceRecord[]> {
        const reserved = await this.storage.listReserved();
        return reserved.filter((r) => r.txHash !== undefined);
    }

    async purgeExpired(): Promise<number> {
        return this.storage.deleteExpired(this.now());
    }
}
