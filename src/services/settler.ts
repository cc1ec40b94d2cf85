import { setTimeout as delay } from 'timers/promises';
import { keccak256, type Hex } from 'viem';
import { pino } from 'pino';
import type { PaymentPayload, PaymentRequirements, SettleErrorReason, SettleResponse, VerifyResponse } from '../domain/types.js';
import type { IChainClient, TxStatus } from '../domain/network.js';
import { ChainUnavailableError, TransactionRejectedError } from '../domain/errors.js';
import { Verifier } from './verifier.js';
import { ReplayGuard, type NonceKey, type ReservationMeta } from './replay_guard.js';
import { config } from '../config.js';

const logger = pino({ level: config.logLevel });

export interface SettlerOptions {
    pollIntervalMs?: number;
    /** Milliseconds since epoch. */
    clock?: () => number;
    sleep?: (ms: number) => Promise<void>;
}

export class Settler {
    private readonly pollIntervalMs: number;
    private readonly clock: () => number;
    private readonly sleep: (ms: number) => Promise<void>;

    constructor(
        private verifier: Verifier,
        private replayGuard: ReplayGuard,
        private chains: ReadonlyMap<string, IChainClient>,
        options: SettlerOptions = {}
    ) {
        this.pollIntervalMs = options.pollIntervalMs ?? 1000;
        this.clock = options.clock ?? Date.now;
        this.sleep = options.sleep ?? ((ms) => delay(ms));
    }

    async settle(requirements: PaymentRequirements, payload: PaymentPayload): Promise<SettleResponse> {
        const { authorization, signature } = payload.payload;
        const network = requirements.network;
        const payer = authorization.from;
        const failed = (errorReason: SettleErrorReason, transaction?: Hex): SettleResponse =>
            transaction ? { success: false, payer, network, errorReason, transaction } : { success: false, payer, network, errorReason };

        // 1. Re-verify: the payload may have been accepted elsewhere since the caller's verify
        let verification: VerifyResponse;
        try {
            verification = await this.verifier.verify(requirements, payload, Math.floor(this.clock() / 1000));
        } catch (error: unknown) {
            if (error instanceof ChainUnavailableError) {
                logger.warn({ network, payer }, 'Chain unavailable during settlement verification');
                return failed('rpc_unavailable');
            }
            throw error;
        }
        if (!verification.isValid) {
            return failed(verification.invalidReason);
        }

        const chain = this.chains.get(network);
        if (!chain) {
            logger.error({ network }, 'No chain client configured for network');
            return failed('rpc_unavailable');
        }

        // 2. Reserve: exactly one concurrent settle for this nonce proceeds
        const key: NonceKey = { network, asset: requirements.asset, nonce: authorization.nonce };
        const signatureHash = keccak256(signature);
        const meta: ReservationMeta = { payer, validBefore: Number(authorization.validBefore), signatureHash };
        if (!(await this.replayGuard.reserve(key, meta))) {
            const existing = await this.replayGuard.lookup(key);
            if (existing?.status === 'reverted' && existing.signatureHash === signatureHash) {
                logger.warn({ id: existing.id, payer }, 'Refusing to resubmit a reverted authorization');
                return failed('tx_reverted', existing.txHash);
            }
            logger.warn({ id: ReplayGuard.idOf(key), payer }, 'Nonce already reserved or accepted');
            return failed('nonce_reused');
        }

        // 3. Submit with the operational signer
        let txHash: Hex;
        try {
            txHash = await chain.submitTransfer(requirements.asset, authorization, signature);
        } catch (error: unknown) {
            await this.replayGuard.release(key);
            const message = error instanceof Error ? error.message : String(error);
            if (error instanceof ChainUnavailableError) {
                logger.warn({ network, payer, error: message }, 'Chain unavailable before submission');
                return failed('rpc_unavailable');
            }
            if (error instanceof TransactionRejectedError) {
                logger.warn({ network, payer, error: message }, 'Transfer rejected at submission');
                return failed('tx_reverted');
            }
            logger.error({ network, payer, error: message }, 'Unexpected submission failure');
            return failed('unexpected_settle_error');
        }
        await this.replayGuard.attachTransaction(key, txHash);

        // 4. Confirm
        const status = await this.waitForOutcome(chain, txHash, requirements.maxTimeoutSeconds);
        switch (status) {
            case 'confirmed':
                await this.replayGuard.commit(key, meta, txHash);
                logger.info({ network, payer, txHash }, 'Settlement confirmed');
                return { success: true, payer, transaction: txHash, network };
            case 'reverted':
                await this.replayGuard.markReverted(key, txHash);
                logger.warn({ network, payer, txHash }, 'Settlement reverted on-chain');
                return failed('tx_reverted', txHash);
            case 'pending':
                // Outcome unknown: the reservation stays until the reconciler resolves it
                logger.warn({ network, payer, txHash }, 'Settlement confirmation timed out');
                return failed('tx_timeout', txHash);
        }
    }

    private async waitForOutcome(chain: IChainClient, txHash: Hex, maxTimeoutSeconds: number): Promise<TxStatus> {
        const deadline = this.clock() + maxTimeoutSeconds * 1000;
        for (;;) {
            try {
                const status = await chain.getTxStatus(txHash);
                if (status !== 'pending') return status;
            } catch (error: unknown) {
                const message = error instanceof Error ? error.message : String(error);
                logger.warn({ txHash, error: message }, 'Transaction status poll failed');
            }
            if (this.clock() >= deadline) return 'pending';
            await this.sleep(this.pollIntervalMs);
        }
    }
}
