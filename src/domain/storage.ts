import { z } from 'zod';
import type { Address, Hex } from 'viem';

/** `reverted` burns the nonce for the signature that reverted on-chain until its validBefore passes. */
export type NonceStatus = 'reserved' | 'committed' | 'reverted';

export interface INonceRecord {
    id: string; // network:asset:nonce, lower-cased
    network: string;
    asset: Address;
    nonce: Hex;
    payer: Address;
    status: NonceStatus;
    txHash?: Hex;
    /** keccak256 of the authorization signature that claimed the nonce. */
    signatureHash?: Hex;
    validBefore: number;
    createdAt: number;
}

export interface INonceStorage {
    /** Inserts the record unless the id exists. Resolves true for exactly one of any concurrent callers. */
    insertIfAbsent(record: INonceRecord): Promise<boolean>;
    get(id: string): Promise<INonceRecord | null>;
    update(id: string, patch: Partial<Pick<INonceRecord, 'status' | 'txHash'>>): Promise<void>;
    delete(id: string): Promise<void>;
    listReserved(): Promise<INonceRecord[]>;
    /** Drops records whose authorization expired, except reservations still awaiting reconciliation. */
    deleteExpired(now: number): Promise<number>;
}

const hex = z.custom<Hex>((value) => typeof value === 'string' && value.startsWith('0x'));
const address = z.custom<Address>((value) => typeof value === 'string' && value.startsWith('0x'));

/** Shape check for records read back from disk or a database row. */
export const NonceRecordSchema = z.object({
    id: z.string(),
    network: z.string(),
    asset: address,
    nonce: hex,
    payer: address,
    status: z.enum(['reserved', 'committed', 'reverted']),
    txHash: hex.nullish().transform((value) => value ?? undefined),
    signatureHash: hex.nullish().transform((value) => value ?? undefined),
    validBefore: z.number(),
    createdAt: z.number(),
});
