import express, { Request, Response } from 'express';
import http from 'http';
import fs from 'fs';
import path from 'path';
import { pathToFileURL } from 'url';
import { ZodError } from 'zod';
import { isAddress } from 'viem';
import { pino } from 'pino';
import { VerifyRequestSchema, SettleRequestSchema } from './domain/schemas.js';
import type { INonceStorage } from './domain/storage.js';
import { ChainUnavailableError, ConfigurationError } from './domain/errors.js';
import { Facilitator } from './services/facilitator.js';
import { NetworkRegistry, loadCatalogue } from './services/network_registry.js';
import { OperationalSigner } from './services/signer.js';
import { createChainClients } from './services/blockchain.js';
import { ReplayGuard } from './services/replay_guard.js';
import { Verifier } from './services/verifier.js';
import { Settler } from './services/settler.js';
import { Reconciler } from './services/reconciler.js';
import { JsonNonceStorage } from './storage/json.js';
import { SqliteNonceStorage } from './storage/sqlite.js';
import { FacilitatorPaymentProcessor } from './stream/payments.js';
import { StreamSession } from './stream/session.js';
import { attachTransport, type StreamEndpoint } from './ws.js';
import { config, rpcUrlsFromEnv } from './config.js';

const logger = pino({
    level: config.logLevel,
});

export function createServer(dependencies: { facilitator: Facilitator }) {
    const { facilitator } = dependencies;
    const app = express();
    app.use(express.json());

    const handleError = (res: Response, error: unknown, route: string) => {
        if (error instanceof ZodError) {
            res.status(400).json({ error: 'invalid_request', issues: error.flatten() });
            return;
        }
        if (error instanceof ChainUnavailableError) {
            logger.warn({ route, network: error.network }, 'Chain RPC unavailable');
            res.status(503).json({ error: 'chain_unavailable', network: error.network });
            return;
        }
        logger.error({ route, error: error instanceof Error ? error.message : String(error) }, 'Request failed');
        res.status(500).json({ error: 'internal_error' });
    };

    app.get('/supported', (_req: Request, res: Response) => {
        res.json(facilitator.supported());
    });

    app.post('/verify', async (req: Request, res: Response) => {
        try {
            res.json(await facilitator.verify(VerifyRequestSchema.parse(req.body)));
        } catch (error: unknown) {
            handleError(res, error, '/verify');
        }
    });

    app.post('/settle', async (req: Request, res: Response) => {
        try {
            res.json(await facilitator.settle(SettleRequestSchema.parse(req.body)));
        } catch (error: unknown) {
            handleError(res, error, '/settle');
        }
    });

    app.get('/verify', (_req: Request, res: Response) => {
        res.json({ endpoint: '/verify', description: 'POST a payment payload and requirements to verify' });
    });

    app.get('/settle', (_req: Request, res: Response) => {
        res.json({ endpoint: '/settle', description: 'POST a verified payment to settle it on-chain' });
    });

    app.get('/health', (_req: Request, res: Response) => {
        res.json({ status: 'ok' });
    });

    return app;
}

/** Stream terms for the `/stream` endpoint; undefined when no payee is configured. */
export function streamEndpointFromConfig(
    registry: NetworkRegistry,
    processor: StreamEndpoint['processor']
): StreamEndpoint | undefined {
    const { stream } = config;
    if (!stream.payTo) {
        logger.warn('STREAM_PAY_TO not set, stream endpoint disabled');
        return undefined;
    }
    if (!isAddress(stream.payTo, { strict: false })) {
        throw new ConfigurationError('STREAM_PAY_TO is not a valid address');
    }
    const network = registry.get(stream.network);
    if (!network) {
        throw new ConfigurationError(`Stream network ${stream.network} has no RPC endpoint configured`);
    }
    const asset = stream.asset ? registry.findAsset(network.network, stream.asset) : network.assets[0];
    if (!asset) {
        throw new ConfigurationError(`Stream asset is not registered on ${network.network}`);
    }

    const endpoint: StreamEndpoint = {
        terms: {
            network: network.network,
            asset: asset.address,
            payTo: stream.payTo,
            unitSeconds: stream.unitSeconds,
            pricePerUnit: stream.pricePerUnit,
            resource: stream.resource,
            extra: { name: asset.name, version: asset.version },
        },
        policy: {
            requireAtFraction: stream.requireAtFraction,
            windowGraceSeconds: stream.windowGraceSeconds,
            requirementGraceSeconds: stream.requirementGraceSeconds,
            heartbeatIntervalMs: stream.heartbeatIntervalMs,
            settle: stream.settle,
        },
        processor,
        tickIntervalMs: stream.tickIntervalMs,
    };
    StreamSession.validate(endpoint.terms, endpoint.policy);
    return endpoint;
}

async function openStorage(): Promise<INonceStorage> {
    if (config.storageType === 'sqlite') {
        logger.info({ path: config.sqliteDbPath }, 'Using SQLite storage');
        const sqliteStorage = new SqliteNonceStorage(config.sqliteDbPath);
        await sqliteStorage.init();
        return sqliteStorage;
    }
    const dataDir = path.dirname(config.jsonStoragePath);
    if (!fs.existsSync(dataDir)) {
        fs.mkdirSync(dataDir, { recursive: true });
    }
    logger.info({ path: config.jsonStoragePath }, 'Using JSON storage');
    return new JsonNonceStorage(config.jsonStoragePath);
}

async function start() {
    const registry = NetworkRegistry.fromConfig(loadCatalogue(), rpcUrlsFromEnv());
    const signer = OperationalSigner.fromPrivateKey(config.operatorPrivateKey);
    const shutdown = (signal: string) => {
        logger.info({ signal }, 'Shutting down');
        signer.dispose();
        process.exit(0);
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    try {
        const chains = createChainClients(registry, signer);
        const replayGuard = new ReplayGuard(await openStorage());
        const verifier = new Verifier(registry, replayGuard, chains, {
            clockSkewSeconds: config.clockSkewSeconds,
            checkOnChain: config.verifyOnChain,
        });
        const settler = new Settler(verifier, replayGuard, chains, { pollIntervalMs: config.settlePollIntervalMs });
        const facilitator = new Facilitator(registry, verifier, settler);

        const reconciler = new Reconciler(replayGuard, chains, config.reconcileIntervalMs);
        reconciler.start();

        const server = http.createServer(createServer({ facilitator }));
        attachTransport(server, {
            facilitator,
            stream: streamEndpointFromConfig(registry, new FacilitatorPaymentProcessor(verifier, settler)),
        });
        server.listen(config.port, () => {
            logger.info({
                port: config.port,
                operator: signer.address,
                networks: registry.list().map((n) => n.network),
            }, 'x402 Facilitator started');
        });
    } catch (error: unknown) {
        signer.dispose();
        throw error;
    }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
    start().catch((error: unknown) => {
        logger.fatal({ error: error instanceof Error ? error.message : String(error) }, 'Failed to start');
        process.exit(1);
    });
}
