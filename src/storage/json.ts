import fs from 'fs';
import path from 'path';
import { pino } from 'pino';
import { z } from 'zod';
import { NonceRecordSchema, type INonceRecord, type INonceStorage } from '../domain/storage.js';
import { config } from '../config.js';

const logger = pino({ level: config.logLevel });

/**
 * Map-backed reservation store, mirrored to a JSON file when a path is given.
 * Check-and-set in insertIfAbsent runs without yielding, so it is atomic on the event loop.
 */
export class JsonNonceStorage implements INonceStorage {
    private records: Map<string, INonceRecord> = new Map();

    constructor(private filePath?: string) {
        this.load();
    }

    private load() {
        if (!this.filePath || !fs.existsSync(this.filePath)) return;
        try {
            const data = z.array(NonceRecordSchema).parse(JSON.parse(fs.readFileSync(this.filePath, 'utf-8')));
            for (const record of data) {
                this.records.set(record.id, record);
            }
        } catch (e: unknown) {
            const message = e instanceof Error ? e.message : String(e);
            logger.error({ path: this.filePath, error: message }, 'Failed to load storage file');
        }
    }

    private saveToFile() {
        if (!this.filePath) return;
        try {
            fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
            const data = Array.from(this.records.values());
            fs.writeFileSync(this.filePath, JSON.stringify(data, null, 2));
        } catch (e: unknown) {
            const message = e instanceof Error ? e.message : String(e);
            logger.error({ path: this.filePath, error: message }, 'Failed to save to storage file');
        }
    }

    async insertIfAbsent(record: INonceRecord): Promise<boolean> {
        if (this.records.has(record.id)) return false;
        this.records.set(record.id, { ...record });
        this.saveToFile();
        return true;
    }

    async get(id: string): Promise<INonceRecord | null> {
        const record = this.records.get(id);
        return record ? { ...record } : null;
    }

    async update(id: string, patch: Partial<Pick<INonceRecord, 'status' | 'txHash'>>): Promise<void> {
        const record = this.records.get(id);
        if (record) {
            Object.assign(record, patch);
            this.saveToFile();
        }
    }

    async delete(id: string): Promise<void> {
        if (this.records.delete(id)) {
            this.saveToFile();
        }
    }

    async listReserved(): Promise<INonceRecord[]> {
        return Array.from(this.records.values())
            .filter((r) => r.status === 'reserved')
            .map((r) => ({ ...r }));
    }

    async deleteExpired(now: number): Promise<number> {
        let removed = 0;
        for (const [id, record] of this.records.entries()) {
            const awaitingReconciliation = record.status === 'reserved' && record.txHash !== undefined;
            if (record.validBefore < now && !awaitingReconciliation) {
                this.records.delete(id);
                removed++;
            }
        }
        if (removed > 0) {
            this.saveToFile();
        }
        return removed;
    }
}
