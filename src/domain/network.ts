import type { Address, Hex } from 'viem';
import type { Authorization } from './types.js';

export type TxStatus = 'pending' | 'confirmed' | 'reverted';

export interface IChainClient {
    submitTransfer(asset: Address, authorization: Authorization, signature: Hex): Promise<Hex>;
    getTxStatus(txHash: Hex): Promise<TxStatus>;
    getBalance(address: Address, asset: Address): Promise<bigint>;
    isAuthorizationUsed(asset: Address, from: Address, nonce: Hex): Promise<boolean>;
}

export interface AssetEntry {
    address: Address;
    name: string; // EIP-712 domain name
    version: string; // EIP-712 domain version
    decimals: number;
}

export interface NetworkEntry {
    network: string;
    chainId: number;
    name: string;
    rpcUrl: string;
    assets: readonly AssetEntry[];
}
