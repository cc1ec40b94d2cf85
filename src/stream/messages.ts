import { z } from 'zod';
import type { Address } from 'viem';
import { PaymentPayloadSchema, UintSchema } from '../domain/schemas.js';
import type {
    InvalidReason,
    PaymentPayload,
    PaymentRequirements,
    SettleErrorReason,
    SettleResponse,
    VerifyResponse,
} from '../domain/types.js';
import type { EnvelopeId, EnvelopeNotification, EnvelopeRequest, EnvelopeResponse } from '../domain/envelope.js';

export type StreamState = 'INIT' | 'AWAITING_PAYMENT' | 'ACTIVE' | 'PAUSED' | 'ENDED';

/** What the seller offers; negotiated once per stream and fixed afterwards. */
export interface StreamTerms {
    network: string;
    asset: Address;
    payTo: Address;
    unitSeconds: number;
    pricePerUnit: string;
    resource: string;
    mimeType?: string;
    extra?: { name?: string; version?: string };
}

export interface StreamPolicy {
    /** Fraction of the current unit at which the next slice is required, within [0.3, 0.7]. */
    requireAtFraction: number;
    /** Allowed excess of an authorization window over the unit duration, at most 10s. */
    windowGraceSeconds: number;
    /** Added to the unit duration to form a requirement's expiresAt. */
    requirementGraceSeconds: number;
    heartbeatIntervalMs: number;
    settle: boolean;
}

export type StreamRejectReason =
    | InvalidReason
    | SettleErrorReason
    | 'slice_mismatch'
    | 'payment_in_progress'
    | 'requirement_expired'
    | 'invalid_window';

/** How the buyer may follow up a failed payment. */
export type RetryHint = 'same_authorization' | 'new_authorization' | 'after_reconciliation';

export interface SliceRequirement {
    streamId: string;
    sliceIndex: number;
    /** Unix seconds. */
    expiresAt: number;
    requirements: PaymentRequirements;
}

export interface Heartbeat {
    streamId: string;
    state: StreamState;
    sliceIndex: number;
    prepaidUntilMs: number;
    remainingMs: number;
    nextRequireAtMs: number | null;
}

export type PaymentOutcome =
    | { accepted: true; verify: VerifyResponse; settle?: SettleResponse }
    | { accepted: false; reason: StreamRejectReason; retry: RetryHint; verify?: VerifyResponse; settle?: SettleResponse };

export interface ProcessPaymentEffect {
    kind: 'process_payment';
    requestId: EnvelopeId;
    sliceIndex: number;
    requirements: PaymentRequirements;
    payload: PaymentPayload;
    settle: boolean;
}

export type SessionEffect = ProcessPaymentEffect;

export type SessionInput =
    | { kind: 'request'; request: EnvelopeRequest }
    | { kind: 'payment.result'; requestId: EnvelopeId; sliceIndex: number; outcome: PaymentOutcome }
    | { kind: 'tick' }
    | { kind: 'end'; reason: string };

export type OutboundMessage = EnvelopeResponse | EnvelopeNotification;

export interface Transition {
    outbound: OutboundMessage[];
    effects: SessionEffect[];
}

export const StreamInitParamsSchema = z.object({
    unitSeconds: z.number().int().positive().optional(),
    pricePerUnit: UintSchema.optional(),
    price: UintSchema.optional(),
    network: z.string().optional(),
    asset: z.string().optional(),
    resource: z.string().optional(),
}).default({});

export const StreamPayParamsSchema = z.object({
    streamId: z.string().min(1),
    sliceIndex: z.number().int().nonnegative(),
    paymentPayload: PaymentPayloadSchema,
    verifyOnly: z.boolean().optional(),
});

export const StreamRefParamsSchema = z.object({
    streamId: z.string().min(1),
    reason: z.string().optional(),
});
