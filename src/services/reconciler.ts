import { pino } from 'pino';
import type { IChainClient } from '../domain/network.js';
import { ReplayGuard } from './replay_guard.js';
import { config } from '../config.js';

const logger = pino({ level: config.logLevel });

export interface ReconcileReport {
    committed: number;
    reverted: number;
    unresolved: number;
    purged: number;
}

/**
 * Resolves reservations left behind by confirmation timeouts, then purges
 * records whose authorization can no longer be presented.
 */
export class Reconciler {
    private timer?: NodeJS.Timeout;
    private running = false;

    constructor(
        private replayGuard: ReplayGuard,
        private chains: ReadonlyMap<string, IChainClient>,
        private intervalMs: number = 60 * 1000
    ) { }

    start() {
        if (this.timer) return;
        this.timer = setInterval(() => {
            this.runOnce().catch((e: unknown) => {
                logger.error({ error: e instanceof Error ? e.message : String(e) }, 'Error during reconciliation');
            });
        }, this.intervalMs);
        this.timer.unref(); // Don't keep the process alive just for this
    }

    stop() {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = undefined;
        }
    }

    async runOnce(): Promise<ReconcileReport> {
        const report: ReconcileReport = { committed: 0, reverted: 0, unresolved: 0, purged: 0 };
        if (this.running) return report;
        this.running = true;
        try {
            for (const record of await this.replayGuard.pending()) {
                const chain = this.chains.get(record.network);
                if (!chain || !record.txHash) {
                    report.unresolved++;
                    continue;
                }
                const key = { network: record.network, asset: record.asset, nonce: record.nonce };
                try {
                    const status = await chain.getTxStatus(record.txHash);
                    if (status === 'confirmed') {
                        await this.replayGuard.commit(key, record, record.txHash);
                        report.committed++;
                    } else if (status === 'reverted') {
                        await this.replayGuard.markReverted(key);
                        report.reverted++;
                    } else {
                        report.unresolved++;
                    }
                } catch (e: unknown) {
                    logger.warn({ id: record.id, error: e instanceof Error ? e.message : String(e) }, 'Could not reconcile reservation');
                    report.unresolved++;
                }
            }
            report.purged = await this.replayGuard.purgeExpired();
            logger.info(report, 'Reconciliation pass finished');
            return report;
        } finally {
            this.running = false;
        }
    }
}
