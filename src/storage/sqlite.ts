import { open, Database } from 'sqlite';
import sqlite3 from 'sqlite3';
import { z } from 'zod';
import { NonceRecordSchema, type INonceRecord, type INonceStorage } from '../domain/storage.js';

export class SqliteNonceStorage implements INonceStorage {
    private db?: Promise<Database>;

    constructor(private dbPath: string) { }

    init(): Promise<Database> {
        if (!this.db) {
            this.db = this.connect();
        }
        return this.db;
    }

    private async connect(): Promise<Database> {
        const db = await open({
            filename: this.dbPath,
            driver: sqlite3.Database
        });

        await db.exec(`
            CREATE TABLE IF NOT EXISTS nonce_reservations (
                id TEXT PRIMARY KEY,
                network TEXT NOT NULL,
                asset TEXT NOT NULL,
                nonce TEXT NOT NULL,
                payer TEXT NOT NULL,
                status TEXT NOT NULL,
                txHash TEXT,
                signatureHash TEXT,
                validBefore INTEGER NOT NULL,
                createdAt INTEGER NOT NULL
            )
        `);
        const columns = z.array(z.object({ name: z.string() })).parse(await db.all('PRAGMA table_info(nonce_reservations)'));
        if (!columns.some((column) => column.name === 'signatureHash')) {
            await db.exec('ALTER TABLE nonce_reservations ADD COLUMN signatureHash TEXT');
        }
        await db.exec('CREATE INDEX IF NOT EXISTS idx_nonce_reservations_status ON nonce_reservations(status)');
        return db;
    }

    async close(): Promise<void> {
        if (this.db) {
            const db = await this.db;
            this.db = undefined;
            await db.close();
        }
    }

    async insertIfAbsent(record: INonceRecord): Promise<boolean> {
        const db = await this.init();
        // The primary key makes the conflicting insert a no-op, so exactly one writer sees a change.
        const result = await db.run(`
            INSERT OR IGNORE INTO nonce_reservations(id, network, asset, nonce, payer, status, txHash, signatureHash, validBefore, createdAt)
            VALUES(?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        `, record.id, record.network, record.asset, record.nonce, record.payer, record.status, record.txHash ?? null,
            record.signatureHash ?? null, record.validBefore, record.createdAt);
        return result.changes === 1;
    }

    async get(id: string): Promise<INonceRecord | null> {
        const db = await this.init();
        const row: unknown = await db.get('SELECT * FROM nonce_reservations WHERE id = ?', id);
        if (!row) return null;
        return NonceRecordSchema.parse(row);
    }

    async update(id: string, patch: Partial<Pick<INonceRecord, 'status' | 'txHash'>>): Promise<void> {
        const db = await this.init();
        if (patch.status !== undefined) {
            await db.run('UPDATE nonce_reservations SET status = ? WHERE id = ?', patch.status, id);
        }
        if (patch.txHash !== undefined) {
            await db.run('UPDATE nonce_reservations SET txHash = ? WHERE id = ?', patch.txHash, id);
        }
    }

    async delete(id: string): Promise<void> {
        const db = await this.init();
        await db.run('DELETE FROM nonce_reservations WHERE id = ?', id);
    }

    async listReserved(): Promise<INonceRecord[]> {
        const db = await this.init();
        const rows: unknown[] = await db.all('SELECT * FROM nonce_reservations WHERE status = ?', 'reserved');
        return rows.map((row) => NonceRecordSchema.parse(row));
    }

    async deleteExpired(now: number): Promise<number> {
        const db = await this.init();
        const result = await db.run(`
            DELETE FROM nonce_reservations
            WHERE validBefore < ? AND NOT (status = 'reserved' AND txHash IS NOT NULL)
        `, now);
        return result.changes ?? 0;
    }
}
