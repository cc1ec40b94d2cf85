import dotenv from 'dotenv';
import path from 'path';

dotenv.config();

function parseBool(value: string | undefined, fallback: boolean): boolean {
    if (value === undefined || value === '') return fallback;
    return value === 'true' || value === '1';
}

export const config = {
    port: parseInt(process.env.PORT || '3000', 10),
    logLevel: process.env.LOG_LEVEL || 'info',
    operatorPrivateKey: process.env.OPERATOR_PRIVATE_KEY,
    storageType: process.env.STORAGE_TYPE || 'sqlite',
    sqliteDbPath: process.env.SQLITE_DB_PATH || './facilitator.db',
    jsonStoragePath: path.resolve(process.env.JSON_STORAGE_PATH || './data/reservations.json'),
    reconcileIntervalMs: parseInt(process.env.RECONCILE_INTERVAL_MS || '60000', 10),
    clockSkewSeconds: parseInt(process.env.CLOCK_SKEW_SECONDS || '5', 10),
    verifyOnChain: parseBool(process.env.VERIFY_ONCHAIN, true),
    settlePollIntervalMs: parseInt(process.env.SETTLE_POLL_INTERVAL_MS || '1000', 10),
    stream: {
        network: process.env.STREAM_NETWORK || 'base-sepolia',
        asset: process.env.STREAM_ASSET,
        payTo: process.env.STREAM_PAY_TO,
        unitSeconds: parseInt(process.env.STREAM_UNIT_SECONDS || '60', 10),
        pricePerUnit: process.env.STREAM_PRICE_PER_UNIT || '50000',
        resource: process.env.STREAM_RESOURCE || 'wss://localhost/stream',
        requireAtFraction: parseFloat(process.env.STREAM_REQUIRE_AT_FRACTION || '0.5'),
        windowGraceSeconds: parseInt(process.env.STREAM_WINDOW_GRACE_SECONDS || '10', 10),
        requirementGraceSeconds: parseInt(process.env.STREAM_REQUIREMENT_GRACE_SECONDS || '10', 10),
        tickIntervalMs: parseInt(process.env.STREAM_TICK_INTERVAL_MS || '1000', 10),
        heartbeatIntervalMs: parseInt(process.env.STREAM_HEARTBEAT_INTERVAL_MS || '5000', 10),
        settle: parseBool(process.env.STREAM_SETTLE, true),
    },
};

/** RPC endpoints keyed by the env var a catalogue entry names. */
export function rpcUrlsFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, string> {
    const urls: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
        if (key.startsWith('RPC_URL_') && value) {
            urls[key] = value;
        }
    }
    return urls;
}
