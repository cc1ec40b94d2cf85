import { pino } from 'pino';
import { ZodError } from 'zod';
import { VerifyRequestSchema, SettleRequestSchema } from '../domain/schemas.js';
import type { SettleRequest, SettleResponse, SupportedResponse, VerifyRequest, VerifyResponse } from '../domain/types.js';
import { ChainUnavailableError } from '../domain/errors.js';
import { ErrorCodes, fail, ok, parseFrame, type EnvelopeRequest, type EnvelopeResponse } from '../domain/envelope.js';
import { NetworkRegistry } from './network_registry.js';
import { Verifier } from './verifier.js';
import { Settler } from './settler.js';
import { config } from '../config.js';

const logger = pino({ level: config.logLevel });

/**
 * The supported/verify/settle surface shared by the HTTP routes and the
 * message transport, so both answer identically.
 */
export class Facilitator {
    constructor(
        private registry: NetworkRegistry,
        private verifier: Verifier,
        private settler: Settler,
        private clock: () => number = Date.now
    ) { }

    supported(): SupportedResponse {
        return this.registry.supported();
    }

    async verify(request: VerifyRequest): Promise<VerifyResponse> {
        const now = Math.floor(this.clock() / 1000);
        return this.verifier.verify(request.paymentRequirements, request.paymentPayload, now);
    }

    async settle(request: SettleRequest): Promise<SettleResponse> {
        return this.settler.settle(request.paymentRequirements, request.paymentPayload);
    }

    /** Answers one text frame of the message transport. */
    async dispatch(frame: string): Promise<EnvelopeResponse> {
        const parsed = parseFrame(frame);
        if (!parsed.ok) return parsed.response;
        return this.handle(parsed.request);
    }

    async handle(request: EnvelopeRequest): Promise<EnvelopeResponse> {
        const { id, method, params } = request;
        try {
            switch (method) {
                case 'x402.supported':
                    return ok(id, this.supported());
                case 'x402.verify':
                    return ok(id, await this.verify(VerifyRequestSchema.parse(params)));
                case 'x402.settle':
                    return ok(id, await this.settle(SettleRequestSchema.parse(params)));
                default:
                    return fail(id, ErrorCodes.METHOD_NOT_FOUND, 'Method not found');
            }
        } catch (error: unknown) {
            if (error instanceof ZodError) {
                return fail(id, ErrorCodes.INVALID_PARAMS, 'Invalid params', error.flatten());
            }
            if (error instanceof ChainUnavailableError) {
                logger.warn({ id, method, network: error.network }, 'Chain RPC unavailable');
                return fail(id, ErrorCodes.CHAIN_UNAVAILABLE, 'Chain RPC unavailable', { network: error.network });
            }
            const message = error instanceof Error ? error.message : String(error);
            logger.error({ id, method, error: message }, 'Envelope request failed');
            return fail(id, ErrorCodes.INTERNAL_ERROR, 'Internal error');
        }
    }
}
