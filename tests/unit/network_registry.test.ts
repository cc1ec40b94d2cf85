import { describe, it, expect } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { ZodError } from 'zod';
import { NetworkRegistry, loadCatalogue } from '../../src/services/network_registry.js';
import { USDC } from '../fixtures.js';

describe('NetworkRegistry', () => {
    const catalogue = loadCatalogue();

    it('lists only networks with a configured RPC endpoint', () => {
        const registry = NetworkRegistry.fromConfig(catalogue, {
            RPC_URL_BASE_SEPOLIA: 'http://127.0.0.1:8545',
            RPC_URL_POLYGON_AMOY: 'http://127.0.0.1:8546',
        });

        expect(registry.list().map((n) => n.network)).toEqual(['base-sepolia', 'polygon-amoy']);
        expect(registry.get('base')).toBeUndefined();
        expect(registry.get('base-sepolia')).toMatchObject({ chainId: 84532, rpcUrl: 'http://127.0.0.1:8545' });
    });

    it('finds assets regardless of address case', () => {
        const registry = NetworkRegistry.fromConfig(catalogue, { RPC_URL_BASE_SEPOLIA: 'http://127.0.0.1:8545' });

        expect(registry.findAsset('base-sepolia', USDC.toUpperCase().replace('0X', '0x'))).toEqual({
            address: USDC,
            name: 'USDC',
            version: '2',
            decimals: 6,
        });
        expect(registry.findAsset('base', USDC)).toBeUndefined();
    });

    it('advertises one exact kind per active asset', () => {
        const registry = NetworkRegistry.fromConfig(catalogue, { RPC_URL_BASE_SEPOLIA: 'http://127.0.0.1:8545' });

        expect(registry.supported()).toEqual({
            kinds: [{ x402Version: 1, scheme: 'exact', network: 'base-sepolia', asset: USDC }],
        });
    });

    it('freezes entries against later mutation', () => {
        const registry = NetworkRegistry.fromConfig(catalogue, { RPC_URL_BASE_SEPOLIA: 'http://127.0.0.1:8545' });
        const entry = registry.get('base-sepolia');

        expect(Object.isFrozen(entry)).toBe(true);
        expect(Object.isFrozen(entry?.assets[0])).toBe(true);
    });

    it('rejects a malformed catalogue', () => {
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'catalogue-'));
        const file = path.join(dir, 'networks.json');
        fs.writeFileSync(file, JSON.stringify([{ network: 'x' }]));
        try {
            expect(() => loadCatalogue(file)).toThrow(ZodError);
        } finally {
            fs.rmSync(dir, { recursive: true, force: true });
        }
    });
});
