import { pino } from 'pino';
import { parseFrame } from '../domain/envelope.js';
import { StreamSession } from './session.js';
import type { PaymentProcessor } from './payments.js';
import type { OutboundMessage, PaymentOutcome, ProcessPaymentEffect, SessionInput } from './messages.js';
import { config } from '../config.js';

const logger = pino({ level: config.logLevel });

export interface StreamActorOptions {
    tickIntervalMs?: number;
    /** Milliseconds since epoch. */
    clock?: () => number;
    /** Called once, after the session has ended. */
    onEnded?: () => void;
}

/**
 * Serialises every input of one session through a queue. Payment effects run
 * outside the queue and report back as `payment.result`, so a slow settlement
 * never holds up ticks or other requests.
 */
export class StreamActor {
    private readonly queue: SessionInput[] = [];
    private readonly inFlight = new Set<Promise<void>>();
    private readonly tickIntervalMs: number;
    private readonly clock: () => number;
    private readonly onEnded?: () => void;
    private draining = false;
    private ended = false;
    private timer?: NodeJS.Timeout;

    constructor(
        private session: StreamSession,
        private processor: PaymentProcessor,
        private send: (message: OutboundMessage) => void,
        options: StreamActorOptions = {}
    ) {
        this.tickIntervalMs = options.tickIntervalMs ?? 1000;
        this.clock = options.clock ?? Date.now;
        this.onEnded = options.onEnded;
    }

    start() {
        if (this.timer) return;
        this.timer = setInterval(() => this.enqueue({ kind: 'tick' }), this.tickIntervalMs);
        this.timer.unref();
    }

    stop(reason: string) {
        this.stopTicking();
        this.enqueue({ kind: 'end', reason });
    }

    /** Accepts one inbound text frame. */
    receive(frame: string) {
        const parsed = parseFrame(frame);
        if (!parsed.ok) {
            this.send(parsed.response);
            return;
        }
        this.enqueue({ kind: 'request', request: parsed.request });
    }

    enqueue(input: SessionInput) {
        this.queue.push(input);
        if (this.draining) return;
        this.draining = true;
        try {
            for (let next = this.queue.shift(); next; next = this.queue.shift()) {
                const { outbound, effects } = this.session.handle(next, this.clock());
                outbound.forEach((message) => this.send(message));
                effects.forEach((effect) => this.run(effect));
            }
        } finally {
            this.draining = false;
        }
        if (this.session.current === 'ENDED' && !this.ended) {
            this.ended = true;
            this.stopTicking();
            this.onEnded?.();
        }
    }

    get ticking(): boolean {
        return this.timer !== undefined;
    }

    private stopTicking() {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = undefined;
        }
    }

    /** Resolves once every payment started so far has reported back. */
    async settled(): Promise<void> {
        while (this.inFlight.size > 0) {
            await Promise.all([...this.inFlight]);
        }
    }

    private run(effect: ProcessPaymentEffect) {
        const { requestId, sliceIndex } = effect;
        const report = (outcome: PaymentOutcome) =>
            this.enqueue({ kind: 'payment.result', requestId, sliceIndex, outcome });

        const task: Promise<void> = this.processor
            .process(effect.requirements, effect.payload, effect.settle)
            .then(report)
            .catch((e: unknown) => {
                logger.error({ requestId, sliceIndex, error: e instanceof Error ? e.message : String(e) }, 'Slice payment processing failed');
                report({ accepted: false, reason: 'unexpected_settle_error', retry: 'new_authorization' });
            })
            .finally(() => {
                this.inFlight.delete(task);
            });
        this.inFlight.add(task);
    }
}
