import type { Address, Hex } from 'viem';

export interface Authorization {
    from: Address;
    to: Address;
    value: string; // BigInt as string
    validAfter: string; // Unix seconds
    validBefore: string; // Unix seconds
    nonce: Hex; // bytes32
}

export interface PaymentPayload {
    x402Version: number;
    scheme: string;
    network: string;
    payload: {
        signature: Hex;
        authorization: Authorization;
    };
}

export interface PaymentRequirements {
    scheme: string;
    network: string;
    maxAmountRequired: string; // BigInt as string
    resource: string;
    description?: string;
    mimeType?: string;
    payTo: Address;
    maxTimeoutSeconds: number;
    asset: Address;
    extra?: {
        name?: string;
        version?: string;
        [key: string]: unknown;
    };
}

export type InvalidReason =
    | 'scheme_mismatch'
    | 'network_mismatch'
    | 'asset_mismatch'
    | 'receiver_mismatch'
    | 'not_yet_valid'
    | 'expired'
    | 'insufficient_value'
    | 'invalid_signature'
    | 'nonce_reused'
    | 'insufficient_balance';

export type SettleErrorReason =
    | InvalidReason
    | 'tx_reverted'
    | 'rpc_unavailable'
    | 'tx_timeout'
    | 'unexpected_settle_error';

export interface VerifyRequest {
    x402Version: number;
    paymentPayload: PaymentPayload;
    paymentRequirements: PaymentRequirements;
}

export type SettleRequest = VerifyRequest;

export type VerifyResponse =
    | { isValid: true; payer: Address }
    | { isValid: false; invalidReason: InvalidReason; payer?: Address };

export type SettleResponse =
    | { success: true; payer: Address; transaction: Hex; network: string }
    | { success: false; errorReason: SettleErrorReason; payer?: Address; transaction?: Hex; network: string };

export interface SupportedKind {
    x402Version: number;
    scheme: 'exact';
    network: string;
    asset: Address;
}

export interface SupportedResponse {
    kinds: SupportedKind[];
}
