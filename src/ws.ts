import type { IncomingMessage, Server } from 'http';
import type { Duplex } from 'stream';
import { WebSocket, WebSocketServer, type RawData } from 'ws';
import { pino } from 'pino';
import { ErrorCodes, fail, parseFrame, type EnvelopeId, type EnvelopeResponse } from './domain/envelope.js';
import { Facilitator } from './services/facilitator.js';
import { StreamActor } from './stream/actor.js';
import { StreamSession } from './stream/session.js';
import type { PaymentProcessor } from './stream/payments.js';
import type { OutboundMessage, StreamPolicy, StreamTerms } from './stream/messages.js';
import { config } from './config.js';

const logger = pino({ level: config.logLevel });

export interface StreamEndpoint {
    terms: StreamTerms;
    policy: StreamPolicy;
    processor: PaymentProcessor;
    tickIntervalMs: number;
}

export interface TransportDependencies {
    facilitator: Facilitator;
    /** When absent, `/stream` upgrades are refused. */
    stream?: StreamEndpoint;
}

/**
 * Mounts the message transport on an HTTP server: `/ws` carries the
 * facilitator methods, `/stream` runs one metered session per connection.
 */
export function attachTransport(server: Server, dependencies: TransportDependencies): WebSocketServer {
    const wss = new WebSocketServer({ noServer: true });

    server.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
        const { pathname } = new URL(req.url ?? '/', 'http://localhost');
        const stream = dependencies.stream;
        if (pathname === '/ws') {
            wss.handleUpgrade(req, socket, head, (ws) => serveFacilitator(ws, dependencies.facilitator));
        } else if (pathname === '/stream' && stream) {
            wss.handleUpgrade(req, socket, head, (ws) => serveStream(ws, stream));
        } else {
            socket.destroy();
        }
    });

    return wss;
}

function serveFacilitator(ws: WebSocket, facilitator: Facilitator) {
    const inFlight = new Set<string>();
    logger.info('Facilitator client connected');

    ws.on('message', (data: RawData) => {
        const parsed = parseFrame(frameText(data));
        if (!parsed.ok) {
            reply(ws, parsed.response);
            return;
        }
        const { id } = parsed.request;
        const key = idKey(id);
        if (inFlight.has(key)) {
            reply(ws, fail(id, ErrorCodes.INVALID_REQUEST, 'Duplicate request id in flight'));
            return;
        }
        inFlight.add(key);
        facilitator
            .handle(parsed.request)
            .catch((e: unknown): EnvelopeResponse => {
                logger.error({ id, error: e instanceof Error ? e.message : String(e) }, 'Facilitator request crashed');
                return fail(id, ErrorCodes.INTERNAL_ERROR, 'Internal error');
            })
            .then((response) => reply(ws, response))
            .finally(() => inFlight.delete(key))
            .catch((e: unknown) => {
                logger.error({ id, error: e instanceof Error ? e.message : String(e) }, 'Could not deliver response');
            });
    });
    ws.on('close', () => logger.info('Facilitator client disconnected'));
}

function serveStream(ws: WebSocket, endpoint: StreamEndpoint) {
    const session = new StreamSession(endpoint.terms, endpoint.policy);
    const actor = new StreamActor(session, endpoint.processor, (message) => reply(ws, message), {
        tickIntervalMs: endpoint.tickIntervalMs,
        onEnded: () => ws.close(1000, 'stream ended'),
    });
    actor.start();
    logger.info('Stream client connected');

    ws.on('message', (data: RawData) => actor.receive(frameText(data)));
    ws.on('close', () => {
        actor.stop('connection_closed');
        logger.info({ streamId: session.id }, 'Stream client disconnected');
    });
}

function reply(ws: WebSocket, message: OutboundMessage) {
    if (ws.readyState === WebSocket.OPEN) {
        ws.send(JSON.stringify(message));
    }
}

function idKey(id: EnvelopeId): string {
    return `${typeof id}:${id}`;
}

function frameText(data: RawData): string {
    if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
    if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
    return data.toString('utf8');
}
