import { randomUUID } from 'crypto';
import { ZodError, type ZodTypeAny, type z } from 'zod';
import { pino } from 'pino';
import { ConfigurationError } from '../domain/errors.js';
import { ErrorCodes, fail, ok, type EnvelopeId, type EnvelopeNotification, type EnvelopeRequest } from '../domain/envelope.js';
import type { PaymentRequirements } from '../domain/types.js';
import {
    StreamInitParamsSchema,
    StreamPayParamsSchema,
    StreamRefParamsSchema,
    type Heartbeat,
    type OutboundMessage,
    type PaymentOutcome,
    type RetryHint,
    type SessionInput,
    type SliceRequirement,
    type StreamPolicy,
    type StreamRejectReason,
    type StreamState,
    type StreamTerms,
    type Transition,
} from './messages.js';
import { config } from '../config.js';

const logger = pino({ level: config.logLevel });

const SELLER_ONLY_METHODS = new Set(['stream.require', 'stream.accept', 'stream.reject', 'stream.pause']);
const MAX_WINDOW_GRACE_SECONDS = 10;

interface InFlightPayment {
    requestId: EnvelopeId;
    sliceIndex: number;
    nonce: string;
}

const none = (): Transition => ({ outbound: [], effects: [] });
const reply = (...outbound: OutboundMessage[]): Transition => ({ outbound, effects: [] });

/**
 * Protocol state machine for one metered stream.
 *
 * `handle` consumes one input and returns the messages to send and the
 * payments to process; it never awaits, so a transition table can be driven
 * by feeding synthetic inputs. Payment results come back in as inputs.
 */
export class StreamSession {
    private state: StreamState = 'INIT';
    private streamId = '';
    private sliceIndex = 0;
    private prepaidUntilMs = 0;
    private nextRequireAtMs: number | null = null;
    private pending?: SliceRequirement;
    private inFlight?: InFlightPayment;
    private lastHeartbeatMs = 0;
    private readonly usedNonces = new Set<string>();

    constructor(
        private readonly terms: StreamTerms,
        private readonly policy: StreamPolicy,
        private readonly newId: () => string = randomUUID
    ) {
        StreamSession.validate(terms, policy);
    }

    static validate(terms: StreamTerms, policy: StreamPolicy) {
        if (!Number.isInteger(terms.unitSeconds) || terms.unitSeconds <= 0) {
            throw new ConfigurationError('unitSeconds must be a positive integer');
        }
        if (!/^\d+$/.test(terms.pricePerUnit)) {
            throw new ConfigurationError('pricePerUnit must be an integer amount in the token\'s base units');
        }
        if (policy.requireAtFraction < 0.3 || policy.requireAtFraction > 0.7) {
            throw new ConfigurationError('requireAtFraction must lie within [0.3, 0.7]');
        }
        if (policy.windowGraceSeconds < 0 || policy.windowGraceSeconds > MAX_WINDOW_GRACE_SECONDS) {
            throw new ConfigurationError(`windowGraceSeconds must lie within [0, ${MAX_WINDOW_GRACE_SECONDS}]`);
        }
    }

    get current(): StreamState {
        return this.state;
    }

    get id(): string {
        return this.streamId;
    }

    get index(): number {
        return this.sliceIndex;
    }

    get prepaidUntil(): number {
        return this.prepaidUntilMs;
    }

    get pendingSlice(): SliceRequirement | undefined {
        return this.pending;
    }

    handle(input: SessionInput, now: number): Transition {
        switch (input.kind) {
            case 'request':
                return this.onRequest(input.request, now);
            case 'payment.result':
                return this.onPaymentResult(input.requestId, input.outcome, now);
            case 'tick':
                return this.onTick(now);
            case 'end':
                return this.onSellerEnd(input.reason);
        }
    }

    heartbeat(now: number): Heartbeat {
        return {
            streamId: this.streamId,
            state: this.state,
            sliceIndex: this.sliceIndex,
            prepaidUntilMs: this.prepaidUntilMs,
            remainingMs: Math.max(0, this.prepaidUntilMs - now),
            nextRequireAtMs: this.state === 'ACTIVE' ? this.nextRequireAtMs : null,
        };
    }

    private onRequest(request: EnvelopeRequest, now: number): Transition {
        const { id, method } = request;
        if (this.state === 'ENDED') {
            return reply(fail(id, ErrorCodes.INVALID_STATE, 'Stream has ended'));
        }
        if (SELLER_ONLY_METHODS.has(method)) {
            return reply(fail(id, ErrorCodes.METHOD_NOT_FOUND, `${method} is sent by the seller only`));
        }

        try {
            switch (method) {
                case 'stream.init':
                    return this.onInit(id, parse(StreamInitParamsSchema, request.params), now);
                case 'stream.pay':
                    return this.onPay(id, parse(StreamPayParamsSchema, request.params), now);
                case 'stream.keepalive':
                    return this.onKeepalive(id, parse(StreamRefParamsSchema, request.params), now);
                case 'stream.resume':
                    return this.onResume(id, parse(StreamRefParamsSchema, request.params), now);
                case 'stream.end':
                    return this.onBuyerEnd(id, parse(StreamRefParamsSchema, request.params));
                default:
                    return reply(fail(id, ErrorCodes.METHOD_NOT_FOUND, 'Method not found'));
            }
        } catch (error: unknown) {
            if (error instanceof ZodError) {
                return reply(fail(id, ErrorCodes.INVALID_PARAMS, 'Invalid params', error.flatten()));
            }
            throw error;
        }
    }

    private onInit(id: EnvelopeId, params: z.infer<typeof StreamInitParamsSchema>, now: number): Transition {
        if (this.state !== 'INIT') {
            return reply(fail(id, ErrorCodes.INVALID_STATE, 'Stream already initialised'));
        }

        const offered = {
            unitSeconds: this.terms.unitSeconds,
            pricePerUnit: this.terms.pricePerUnit,
            payTo: this.terms.payTo,
            asset: this.terms.asset,
            network: this.terms.network,
        };
        const proposedPrice = params.pricePerUnit ?? params.price;
        const mismatch =
            (params.unitSeconds !== undefined && params.unitSeconds !== this.terms.unitSeconds) ||
            (proposedPrice !== undefined && BigInt(proposedPrice) !== BigInt(this.terms.pricePerUnit)) ||
            (params.network !== undefined && params.network !== this.terms.network) ||
            (params.asset !== undefined && params.asset.toLowerCase() !== this.terms.asset.toLowerCase());
        if (mismatch) {
            this.state = 'ENDED';
            logger.warn({ proposed: params, offered }, 'Stream terms mismatch');
            return reply(fail(id, ErrorCodes.TERMS_MISMATCH, 'Stream terms mismatch', { expected: offered }));
        }

        this.streamId = this.newId();
        this.state = 'AWAITING_PAYMENT';
        this.lastHeartbeatMs = now;
        logger.info({ streamId: this.streamId, ...offered }, 'Stream accepted');
        return reply(
            ok(id, { method: 'stream.accept', params: { streamId: this.streamId, ...offered } }),
            this.issueRequire(now)
        );
    }

    private onPay(id: EnvelopeId, params: z.infer<typeof StreamPayParamsSchema>, now: number): Transition {
        if (this.state === 'INIT') {
            return reply(fail(id, ErrorCodes.INVALID_STATE, 'Stream not initialised'));
        }
        if (params.streamId !== this.streamId) {
            return reply(fail(id, ErrorCodes.INVALID_PARAMS, 'Unknown streamId'));
        }

        const { authorization } = params.paymentPayload.payload;
        const reject = (invalidReason: StreamRejectReason) =>
            reply(this.rejection(id, params.sliceIndex, invalidReason));

        const pending = this.pending;
        if (!pending || params.sliceIndex !== pending.sliceIndex) {
            return reject('slice_mismatch');
        }
        if (this.inFlight) {
            return reject('payment_in_progress');
        }
        if (Math.floor(now / 1000) > pending.expiresAt) {
            return reject('requirement_expired');
        }
        const window = BigInt(authorization.validBefore) - BigInt(authorization.validAfter);
        if (window > BigInt(this.terms.unitSeconds + this.policy.windowGraceSeconds)) {
            return reject('invalid_window');
        }
        const nonce = authorization.nonce.toLowerCase();
        if (this.usedNonces.has(nonce)) {
            return reject('nonce_reused');
        }

        this.inFlight = { requestId: id, sliceIndex: pending.sliceIndex, nonce };
        return {
            outbound: [],
            effects: [{
                kind: 'process_payment',
                requestId: id,
                sliceIndex: pending.sliceIndex,
                requirements: pending.requirements,
                payload: params.paymentPayload,
                settle: this.policy.settle && !params.verifyOnly,
            }],
        };
    }

    private onPaymentResult(requestId: EnvelopeId, outcome: PaymentOutcome, now: number): Transition {
        if (this.state === 'ENDED') {
            logger.info({ streamId: this.streamId, requestId }, 'Discarding payment result for ended stream');
            return none();
        }
        const inFlight = this.inFlight;
        if (!inFlight || inFlight.requestId !== requestId) {
            logger.warn({ streamId: this.streamId, requestId }, 'Discarding unexpected payment result');
            return none();
        }
        this.inFlight = undefined;

        if (!outcome.accepted) {
            // The same signed authorization must not be presented again once it reached the chain
            if (outcome.reason === 'tx_reverted' || outcome.reason === 'tx_timeout') {
                this.usedNonces.add(inFlight.nonce);
            }
            return reply(this.rejection(requestId, inFlight.sliceIndex, outcome.reason, outcome.retry));
        }

        const unitMs = this.terms.unitSeconds * 1000;
        this.usedNonces.add(inFlight.nonce);
        this.prepaidUntilMs = Math.max(this.prepaidUntilMs, now) + unitMs;
        this.nextRequireAtMs = this.prepaidUntilMs - unitMs + Math.round(this.policy.requireAtFraction * unitMs);
        this.pending = undefined;
        const resumed = this.state === 'PAUSED';
        this.state = 'ACTIVE';
        logger.info({ streamId: this.streamId, sliceIndex: inFlight.sliceIndex, prepaidUntilMs: this.prepaidUntilMs }, 'Slice accepted');

        const outbound: OutboundMessage[] = [
            ok(requestId, {
                method: 'stream.accept',
                params: {
                    streamId: this.streamId,
                    sliceIndex: inFlight.sliceIndex,
                    verify: outcome.verify,
                    settle: outcome.settle ?? null,
                    prepaidUntilMs: this.prepaidUntilMs,
                    nextRequireAtMs: this.nextRequireAtMs,
                },
            }),
        ];
        if (resumed) {
            outbound.push(this.notify('stream.resume', {
                streamId: this.streamId,
                sliceIndex: this.sliceIndex,
                prepaidUntilMs: this.prepaidUntilMs,
            }));
        }
        return { outbound, effects: [] };
    }

    private onTick(now: number): Transition {
        if (this.state === 'INIT' || this.state === 'ENDED') return none();
        const outbound: OutboundMessage[] = [];

        if (this.state === 'ACTIVE' && this.nextRequireAtMs !== null && now >= this.nextRequireAtMs) {
            this.sliceIndex += 1;
            this.state = 'AWAITING_PAYMENT';
            outbound.push(this.issueRequire(now));
        }

        if (this.state === 'AWAITING_PAYMENT') {
            const started = this.prepaidUntilMs > 0;
            const exhausted = started && now >= this.prepaidUntilMs;
            const unpaidExpired = !started && this.pending !== undefined && Math.floor(now / 1000) > this.pending.expiresAt;
            if (exhausted || unpaidExpired) {
                this.state = 'PAUSED';
                logger.info({ streamId: this.streamId, sliceIndex: this.sliceIndex }, 'Stream paused');
                outbound.push(this.notify('stream.pause', {
                    streamId: this.streamId,
                    sliceIndex: this.sliceIndex,
                    reason: exhausted ? 'prepaid_exhausted' : 'requirement_expired',
                }));
            }
        }

        if (now - this.lastHeartbeatMs >= this.policy.heartbeatIntervalMs) {
            this.lastHeartbeatMs = now;
            outbound.push(this.notify('stream.keepalive', this.heartbeat(now)));
        }
        return { outbound, effects: [] };
    }

    private onKeepalive(id: EnvelopeId, params: z.infer<typeof StreamRefParamsSchema>, now: number): Transition {
        if (this.state === 'INIT' || params.streamId !== this.streamId) {
            return reply(fail(id, ErrorCodes.INVALID_PARAMS, 'Unknown streamId'));
        }
        return reply(ok(id, { method: 'stream.keepalive', params: this.heartbeat(now) }));
    }

    private onResume(id: EnvelopeId, params: z.infer<typeof StreamRefParamsSchema>, now: number): Transition {
        if (params.streamId !== this.streamId) {
            return reply(fail(id, ErrorCodes.INVALID_PARAMS, 'Unknown streamId'));
        }
        if (this.state !== 'PAUSED') {
            return reply(fail(id, ErrorCodes.INVALID_STATE, `Cannot resume from ${this.state}`));
        }
        // A lapsed requirement is abandoned in favour of the next slice; only a payment leaves PAUSED
        if (!this.inFlight && (!this.pending || Math.floor(now / 1000) > this.pending.expiresAt)) {
            this.sliceIndex += 1;
            this.pending = this.buildSlice(now);
            logger.info({ streamId: this.streamId, sliceIndex: this.sliceIndex }, 'Reissued requirement on resume');
        }
        return reply(ok(id, { method: 'stream.require', params: this.pending }));
    }

    private onBuyerEnd(id: EnvelopeId, params: z.infer<typeof StreamRefParamsSchema>): Transition {
        if (this.state !== 'INIT' && params.streamId !== this.streamId) {
            return reply(fail(id, ErrorCodes.INVALID_PARAMS, 'Unknown streamId'));
        }
        this.end();
        return reply(ok(id, { method: 'stream.end', params: this.endParams(params.reason ?? 'buyer_end') }));
    }

    private onSellerEnd(reason: string): Transition {
        if (this.state === 'ENDED') return none();
        this.end();
        return reply(this.notify('stream.end', this.endParams(reason)));
    }

    private end() {
        this.state = 'ENDED';
        this.pending = undefined;
        logger.info({ streamId: this.streamId, sliceIndex: this.sliceIndex, inFlight: this.inFlight !== undefined }, 'Stream ended');
    }

    private endParams(reason: string) {
        return {
            streamId: this.streamId,
            sliceIndex: this.sliceIndex,
            prepaidUntilMs: this.prepaidUntilMs,
            reason,
        };
    }

    private issueRequire(now: number): EnvelopeNotification<SliceRequirement> {
        this.pending = this.buildSlice(now);
        return this.notify('stream.require', this.pending);
    }

    private buildSlice(now: number): SliceRequirement {
        const { terms } = this;
        const requirements: PaymentRequirements = {
            scheme: 'exact',
            network: terms.network,
            maxAmountRequired: terms.pricePerUnit,
            resource: terms.resource,
            description: `Slice ${this.sliceIndex}`,
            mimeType: terms.mimeType ?? 'application/octet-stream',
            payTo: terms.payTo,
            maxTimeoutSeconds: terms.unitSeconds + 30,
            asset: terms.asset,
        };
        if (terms.extra) {
            requirements.extra = { ...terms.extra };
        }
        return {
            streamId: this.streamId,
            sliceIndex: this.sliceIndex,
            expiresAt: Math.floor(now / 1000) + terms.unitSeconds + this.policy.requirementGraceSeconds,
            requirements,
        };
    }

    private rejection(id: EnvelopeId, sliceIndex: number, invalidReason: StreamRejectReason, retry?: RetryHint) {
        logger.info({ streamId: this.streamId, sliceIndex, invalidReason }, 'Slice payment rejected');
        const params = retry
            ? { streamId: this.streamId, sliceIndex, invalidReason, retry }
            : { streamId: this.streamId, sliceIndex, invalidReason };
        return ok(id, { method: 'stream.reject', params });
    }

    private notify<P>(method: string, params: P): EnvelopeNotification<P> {
        return { id: this.newId(), method, params };
    }
}

function parse<S extends ZodTypeAny>(schema: S, value: unknown): z.output<S> {
    return schema.parse(value);
}
