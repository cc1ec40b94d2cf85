import { verifyTypedData } from 'viem';
import { pino } from 'pino';
import type { PaymentPayload, PaymentRequirements, VerifyResponse, InvalidReason } from '../domain/types.js';
import type { IChainClient } from '../domain/network.js';
import { TRANSFER_WITH_AUTHORIZATION_TYPES } from '../domain/abi.js';
import { NetworkRegistry } from './network_registry.js';
import { ReplayGuard } from './replay_guard.js';
import { config } from '../config.js';

const logger = pino({ level: config.logLevel });

export interface VerifierOptions {
    /** Forgiven at the start of the validity window only. */
    clockSkewSeconds?: number;
    /** Consult the token contract for balance and on-chain nonce state. */
    checkOnChain?: boolean;
}

/**
 * Side-effect free check of an EIP-3009 authorization against payment requirements.
 * Business-rule failures come back as an invalidReason; only chain RPC faults throw.
 */
export class Verifier {
    private readonly clockSkewSeconds: number;
    private readonly checkOnChain: boolean;

    constructor(
        private registry: NetworkRegistry,
        private replayGuard: ReplayGuard,
        private chains: ReadonlyMap<string, IChainClient> = new Map(),
        options: VerifierOptions = {}
    ) {
        this.clockSkewSeconds = options.clockSkewSeconds ?? 5;
        this.checkOnChain = options.checkOnChain ?? true;
    }

    async verify(requirements: PaymentRequirements, payload: PaymentPayload, now: number): Promise<VerifyResponse> {
        const { authorization, signature } = payload.payload;
        const from = authorization.from;
        const invalid = (invalidReason: InvalidReason): VerifyResponse => {
            logger.info({ payer: from, invalidReason, network: payload.network }, 'Payment verification failed');
            return { isValid: false, invalidReason, payer: from };
        };

        // 1. Scheme
        if (requirements.scheme !== 'exact' || payload.scheme !== 'exact') {
            return invalid('scheme_mismatch');
        }

        // 2. Target chain, token and recipient
        const network = this.registry.get(requirements.network);
        if (payload.network !== requirements.network || !network) {
            return invalid('network_mismatch');
        }
        const asset = this.registry.findAsset(network.network, requirements.asset);
        if (!asset) {
            return invalid('asset_mismatch');
        }
        if (authorization.to.toLowerCase() !== requirements.payTo.toLowerCase()) {
            return invalid('receiver_mismatch');
        }

        // 3. Time window
        const validAfter = BigInt(authorization.validAfter);
        const validBefore = BigInt(authorization.validBefore);
        const current = BigInt(now);
        if (current + BigInt(this.clockSkewSeconds) < validAfter) {
            return invalid('not_yet_valid');
        }
        if (current > validBefore) {
            return invalid('expired');
        }

        // 4. Amount
        const value = BigInt(authorization.value);
        if (value < BigInt(requirements.maxAmountRequired)) {
            return invalid('insufficient_value');
        }

        // 5. EIP-712 signature, bound to token, chain and contract version
        try {
            const valid = await verifyTypedData({
                address: from,
                domain: {
                    name: requirements.extra?.name ?? asset.name,
                    version: requirements.extra?.version ?? asset.version,
                    chainId: network.chainId,
                    verifyingContract: asset.address,
                },
                types: TRANSFER_WITH_AUTHORIZATION_TYPES,
                primaryType: 'TransferWithAuthorization',
                message: {
                    from,
                    to: authorization.to,
                    value,
                    validAfter,
                    validBefore,
                    nonce: authorization.nonce,
                },
                signature,
            });
            if (!valid) {
                return invalid('invalid_signature');
            }
        } catch {
            return invalid('invalid_signature');
        }

        // 6. Replay (read-only; reservation happens at settlement)
        const key = { network: network.network, asset: asset.address, nonce: authorization.nonce };
        if (await this.replayGuard.isAccepted(key)) {
            return invalid('nonce_reused');
        }

        // 7. On-chain state
        const chain = this.chains.get(network.network);
        if (this.checkOnChain && chain) {
            const [used, balance] = await Promise.all([
                chain.isAuthorizationUsed(asset.address, from, authorization.nonce),
                chain.getBalance(from, asset.address),
            ]);
            if (used) {
                return invalid('nonce_reused');
            }
            if (balance < value) {
                return invalid('insufficient_balance');
            }
        }

        logger.debug({ payer: from, network: network.network }, 'Payment verified');
        return { isValid: true, payer: from };
    }
}
