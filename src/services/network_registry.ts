import fs from 'fs';
import { z } from 'zod';
import { isAddress, type Address } from 'viem';
import { pino } from 'pino';
import type { AssetEntry, NetworkEntry } from '../domain/network.js';
import type { SupportedKind, SupportedResponse } from '../domain/types.js';
import { config } from '../config.js';

const logger = pino({ level: config.logLevel });

const CatalogueSchema = z.array(z.object({
    network: z.string().min(1),
    chainId: z.number().int().positive(),
    name: z.string(),
    rpcEnv: z.string().min(1),
    assets: z.array(z.object({
        address: z.custom<Address>((v) => typeof v === 'string' && isAddress(v, { strict: false })),
        name: z.string(),
        version: z.string(),
        decimals: z.number().int().nonnegative(),
    })),
}));

export type NetworkCatalogue = z.infer<typeof CatalogueSchema>;

const CATALOGUE_URL = new URL('../../data/networks.json', import.meta.url);

export function loadCatalogue(file: URL | string = CATALOGUE_URL): NetworkCatalogue {
    return CatalogueSchema.parse(JSON.parse(fs.readFileSync(file, 'utf-8')));
}

/**
 * Networks the facilitator can serve, resolved once at startup.
 * A catalogue network without a configured RPC endpoint is simply unlisted.
 */
export class NetworkRegistry {
    private readonly entries: ReadonlyMap<string, NetworkEntry>;

    private constructor(entries: NetworkEntry[]) {
        this.entries = new Map(entries.map((e) => [e.network, Object.freeze(e)]));
    }

    static fromConfig(catalogue: NetworkCatalogue, rpcUrls: Record<string, string>): NetworkRegistry {
        const active: NetworkEntry[] = [];
        for (const item of catalogue) {
            const rpcUrl = rpcUrls[item.rpcEnv];
            if (!rpcUrl) continue;
            active.push({
                network: item.network,
                chainId: item.chainId,
                name: item.name,
                rpcUrl,
                assets: Object.freeze(item.assets.map((a) => Object.freeze({ ...a }))),
            });
        }
        logger.info({ networks: active.map((e) => e.network) }, 'Network registry built');
        return new NetworkRegistry(active);
    }

    get(network: string): NetworkEntry | undefined {
        return this.entries.get(network);
    }

    findAsset(network: string, asset: string): AssetEntry | undefined {
        const target = asset.toLowerCase();
        return this.entries.get(network)?.assets.find((a) => a.address.toLowerCase() === target);
    }

    list(): NetworkEntry[] {
        return Array.from(this.entries.values());
    }

    supported(): SupportedResponse {
        const kinds: SupportedKind[] = [];
        for (const entry of this.entries.values()) {
            for (const asset of entry.assets) {
                kinds.push({ x402Version: 1, scheme: 'exact', network: entry.network, asset: asset.address });
            }
        }
        return { kinds };
    }
}
