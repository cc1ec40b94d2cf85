import { privateKeyToAccount } from 'viem/accounts';
import type { Address, Hex } from 'viem';
import type { Authorization, PaymentPayload, PaymentRequirements } from '../src/domain/types.js';
import type { IChainClient, TxStatus } from '../src/domain/network.js';
import { TRANSFER_WITH_AUTHORIZATION_TYPES } from '../src/domain/abi.js';
import { NetworkRegistry, loadCatalogue } from '../src/services/network_registry.js';
import { ReplayGuard } from '../src/services/replay_guard.js';
import { Verifier } from '../src/services/verifier.js';
import { Settler } from '../src/services/settler.js';
import { JsonNonceStorage } from '../src/storage/json.js';

export const NETWORK = 'base-sepolia';
export const CHAIN_ID = 84532;
export const USDC: Address = '0x036cbd53842c5426634e7929541ec2318f3dcf7e';
export const PAY_TO: Address = '0x2222222222222222222222222222222222222222';
export const TX_HASH: Hex = `0x${'ab'.repeat(32)}`;

export const payer = privateKeyToAccount(`0x${'11'.repeat(32)}`);

/** Fixed start time, 2023-11-14T22:13:20Z. */
export const T0_MS = 1_700_000_000_000;
export const T0 = T0_MS / 1000;

export class TestClock {
    constructor(public ms: number = T0_MS) { }

    now = (): number => this.ms;

    seconds(): number {
        return Math.floor(this.ms / 1000);
    }

    advance(ms: number) {
        this.ms += ms;
    }

    sleep = async (ms: number): Promise<void> => {
        this.ms += ms;
    };
}

export function nonce(n: number): Hex {
    return `0x${n.toString(16).padStart(64, '0')}`;
}

export function testRegistry(): NetworkRegistry {
    return NetworkRegistry.fromConfig(loadCatalogue(), { RPC_URL_BASE_SEPOLIA: 'http://127.0.0.1:8545' });
}

export function requirements(overrides: Partial<PaymentRequirements> = {}): PaymentRequirements {
    return {
        scheme: 'exact',
        network: NETWORK,
        maxAmountRequired: '50000',
        resource: 'https://seller.test/feed',
        payTo: PAY_TO,
        maxTimeoutSeconds: 60,
        asset: USDC,
        extra: { name: 'USDC', version: '2' },
        ...overrides,
    };
}

export interface PaymentOptions {
    value?: bigint;
    validAfter?: number;
    validBefore?: number;
    nonce?: Hex;
    to?: Address;
    network?: string;
    signer?: typeof payer;
}

export async function signPayment(options: PaymentOptions = {}): Promise<PaymentPayload> {
    const signer = options.signer ?? payer;
    const validAfter = BigInt(options.validAfter ?? T0 - 5);
    const validBefore = BigInt(options.validBefore ?? T0 + 60);
    const value = options.value ?? 50000n;
    const to = options.to ?? PAY_TO;
    const authNonce = options.nonce ?? nonce(1);

    const signature = await signer.signTypedData({
        domain: { name: 'USDC', version: '2', chainId: CHAIN_ID, verifyingContract: USDC },
        types: TRANSFER_WITH_AUTHORIZATION_TYPES,
        primaryType: 'TransferWithAuthorization',
        message: { from: signer.address, to, value, validAfter, validBefore, nonce: authNonce },
    });
    const authorization: Authorization = {
        from: signer.address,
        to,
        value: value.toString(),
        validAfter: validAfter.toString(),
        validBefore: validBefore.toString(),
        nonce: authNonce,
    };
    return {
        x402Version: 1,
        scheme: 'exact',
        network: options.network ?? NETWORK,
        payload: { signature, authorization },
    };
}

/** In-process stand-in for a token contract reached over RPC. */
export class FakeChain implements IChainClient {
    submissions: Array<{ asset: Address; authorization: Authorization; signature: Hex }> = [];
    statusCalls = 0;
    status: TxStatus = 'confirmed';
    balance = 1_000_000n;
    used = false;
    submitError?: Error;
    statusError?: Error;
    readError?: Error;

    async submitTransfer(asset: Address, authorization: Authorization, signature: Hex): Promise<Hex> {
        if (this.submitError) throw this.submitError;
        this.submissions.push({ asset, authorization, signature });
        return TX_HASH;
    }

    async getTxStatus(_txHash: Hex): Promise<TxStatus> {
        this.statusCalls++;
        if (this.statusError) throw this.statusError;
        return this.status;
    }

    async getBalance(_address: Address, _asset: Address): Promise<bigint> {
        if (this.readError) throw this.readError;
        return this.balance;
    }

    async isAuthorizationUsed(_asset: Address, _from: Address, _nonce: Hex): Promise<boolean> {
        if (this.readError) throw this.readError;
        return this.used;
    }
}

export function buildServices(clock: TestClock = new TestClock(), chain: FakeChain = new FakeChain()) {
    const registry = testRegistry();
    const storage = new JsonNonceStorage();
    const replayGuard = new ReplayGuard(storage, () => clock.seconds());
    const chains = new Map<string, IChainClient>([[NETWORK, chain]]);
    const verifier = new Verifier(registry, replayGuard, chains, { clockSkewSeconds: 5 });
    const settler = new Settler(verifier, replayGuard, chains, {
        pollIntervalMs: 1000,
        clock: clock.now,
        sleep: clock.sleep,
    });
    return { clock, chain, chains, registry, storage, replayGuard, verifier, settler };
}
