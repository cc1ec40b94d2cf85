import { pino } from 'pino';
import { ChainUnavailableError } from '../domain/errors.js';
import type { PaymentPayload, PaymentRequirements, SettleErrorReason } from '../domain/types.js';
import { Verifier } from '../services/verifier.js';
import { Settler } from '../services/settler.js';
import type { PaymentOutcome, RetryHint } from './messages.js';
import { config } from '../config.js';

const logger = pino({ level: config.logLevel });

export interface PaymentProcessor {
    process(requirements: PaymentRequirements, payload: PaymentPayload, settle: boolean): Promise<PaymentOutcome>;
}

export function retryHintFor(reason: SettleErrorReason): RetryHint {
    switch (reason) {
        case 'rpc_unavailable':
            return 'same_authorization';
        case 'tx_timeout':
            return 'after_reconciliation';
        default:
            return 'new_authorization';
    }
}

/** Verifies, then settles, one slice payment through the facilitator services. */
export class FacilitatorPaymentProcessor implements PaymentProcessor {
    constructor(
        private verifier: Verifier,
        private settler: Settler,
        private clock: () => number = Date.now
    ) { }

    async process(requirements: PaymentRequirements, payload: PaymentPayload, settle: boolean): Promise<PaymentOutcome> {
        try {
            const verify = await this.verifier.verify(requirements, payload, Math.floor(this.clock() / 1000));
            if (!verify.isValid) {
                return { accepted: false, reason: verify.invalidReason, retry: retryHintFor(verify.invalidReason), verify };
            }
            if (!settle) {
                return { accepted: true, verify };
            }

            const result = await this.settler.settle(requirements, payload);
            if (!result.success) {
                return { accepted: false, reason: result.errorReason, retry: retryHintFor(result.errorReason), verify, settle: result };
            }
            return { accepted: true, verify, settle: result };
        } catch (error: unknown) {
            if (error instanceof ChainUnavailableError) {
                logger.warn({ network: error.network }, 'Chain unavailable while processing slice payment');
                return { accepted: false, reason: 'rpc_unavailable', retry: 'same_authorization' };
            }
            throw error;
        }
    }
}
