import {
    BaseError,
    ContractFunctionRevertedError,
    ExecutionRevertedError,
    HttpRequestError,
    TimeoutError,
    TransactionReceiptNotFoundError,
    createPublicClient,
    createWalletClient,
    defineChain,
    http,
    type Address,
    type Chain,
    type Hex,
    type PublicClient,
    type WalletClient,
} from 'viem';
import { pino } from 'pino';
import { eip3009Abi } from '../domain/abi.js';
import { ChainUnavailableError, TransactionRejectedError } from '../domain/errors.js';
import type { IChainClient, NetworkEntry, TxStatus } from '../domain/network.js';
import type { Authorization } from '../domain/types.js';
import type { OperationalSigner } from './signer.js';
import type { NetworkRegistry } from './network_registry.js';
import { config } from '../config.js';

const logger = pino({ level: config.logLevel });

/** Sorts a viem failure into the facilitator's fault classes. */
export function classifyChainError(network: string, error: unknown): Error {
    if (error instanceof BaseError) {
        const transport = error.walk((e) => e instanceof HttpRequestError || e instanceof TimeoutError);
        if (transport) {
            return new ChainUnavailableError(network, { cause: error });
        }
        const revert = error.walk((e) => e instanceof ContractFunctionRevertedError || e instanceof ExecutionRevertedError);
        if (revert) {
            return new TransactionRejectedError(network, error.shortMessage, { cause: error });
        }
    }
    return error instanceof Error ? error : new Error(String(error));
}

export function splitSignature(signature: Hex): { v: number; r: Hex; s: Hex } {
    const sig = signature.slice(2);
    if (sig.length !== 130) {
        throw new Error(`Invalid signature length: expected 130 hex chars, got ${sig.length}`);
    }
    const parity = parseInt(sig.slice(128, 130), 16);
    return {
        r: `0x${sig.slice(0, 64)}`,
        s: `0x${sig.slice(64, 128)}`,
        v: parity < 27 ? parity + 27 : parity,
    };
}

export class ViemChainClient implements IChainClient {
    private readonly chain: Chain;
    private readonly publicClient: PublicClient;
    private readonly walletClient: WalletClient;

    constructor(private entry: NetworkEntry, private signer: OperationalSigner) {
        this.chain = defineChain({
            id: entry.chainId,
            name: entry.name,
            nativeCurrency: { name: 'Native', symbol: 'NATIVE', decimals: 18 },
            rpcUrls: { default: { http: [entry.rpcUrl] } },
        });
        const transport = http(entry.rpcUrl);
        this.publicClient = createPublicClient({ chain: this.chain, transport });
        this.walletClient = createWalletClient({ chain: this.chain, transport });
    }

    async submitTransfer(asset: Address, authorization: Authorization, signature: Hex): Promise<Hex> {
        const { v, r, s } = splitSignature(signature);

        try {
            const txHash = await this.walletClient.writeContract({
                account: this.signer.account(),
                chain: this.chain,
                address: asset,
                abi: eip3009Abi,
                functionName: 'transferWithAuthorization',
                args: [
                    authorization.from,
                    authorization.to,
                    BigInt(authorization.value),
                    BigInt(authorization.validAfter),
                    BigInt(authorization.validBefore),
                    authorization.nonce,
                    v,
                    r,
                    s,
                ],
            });
            logger.info({ network: this.entry.network, txHash, from: authorization.from }, 'Submitted transferWithAuthorization');
            return txHash;
        } catch (error: unknown) {
            throw classifyChainError(this.entry.network, error);
        }
    }

    async getTxStatus(txHash: Hex): Promise<TxStatus> {
        try {
            const receipt = await this.publicClient.getTransactionReceipt({ hash: txHash });
            return receipt.status === 'success' ? 'confirmed' : 'reverted';
        } catch (error: unknown) {
            if (error instanceof TransactionReceiptNotFoundError) {
                return 'pending';
            }
            throw classifyChainError(this.entry.network, error);
        }
    }

    async getBalance(address: Address, asset: Address): Promise<bigint> {
        try {
            return await this.publicClient.readContract({
                address: asset,
                abi: eip3009Abi,
                functionName: 'balanceOf',
                args: [address],
            });
        } catch (error: unknown) {
            throw classifyChainError(this.entry.network, error);
        }
    }

    async isAuthorizationUsed(asset: Address, from: Address, nonce: Hex): Promise<boolean> {
        try {
            return await this.publicClient.readContract({
                address: asset,
                abi: eip3009Abi,
                functionName: 'authorizationState',
                args: [from, nonce],
            });
        } catch (error: unknown) {
            throw classifyChainError(this.entry.network, error);
        }
    }
}

/** One client per registered network, built once at startup. */
export function createChainClients(registry: NetworkRegistry, signer: OperationalSigner): ReadonlyMap<string, IChainClient> {
    const clients = new Map<string, IChainClient>();
    for (const entry of registry.list()) {
        clients.set(entry.network, new ViemChainClient(entry, signer));
    }
    return clients;
}
