import { getConfigCacheKey } from '../cache/cache-key.js';
import { ConfigReader, ConfigSnapshot } from '../client/config-reader.js';
import { errorMessage } from '../errors.js';
import { WatchRegistry } from '../registry/watch-registry.js';
import { computeDigest } from '../utils/digest.js';
import { ChangedConfig } from './wire.js';

export interface ReconcileStats {
    notified: number;
    suppressed: number;
    skipped: number;
    failed: number;
}

/**
 * Turns a server change signal into listener calls: re-fetches each changed
 * config and notifies only when its digest differs from the last notified one.
 */
export class Reconciler {
    private readonly registry: WatchRegistry;
    private readonly reader: ConfigReader;

    constructor(registry: WatchRegistry, reader: ConfigReader) {
        this.registry = registry;
        this.reader = reader;
    }

    /** Stops between changes once `signal` is aborted; the listener already running is awaited. */
    public async reconcile(changed: readonly ChangedConfig[], tenant: string, signal?: AbortSignal): Promise<ReconcileStats> {
        const stats: ReconcileStats = { notified: 0, suppressed: 0, skipped: 0, failed: 0 };

        for (const change of changed) {
            if (signal?.aborted) {
                console.log(`[RECONCILE] Aborted with ${changed.length - this.handled(stats)} change(s) left`);
                break;
            }
            const key = getConfigCacheKey(change.dataId, change.group, tenant);
            const entry = this.registry.get(key);
            if (!entry) {
                stats.skipped += 1;
                continue;
            }

            let snapshot: ConfigSnapshot;
            try {
                snapshot = await this.reader.readSnapshot({ dataId: entry.dataId, group: entry.group, tenant: entry.tenant });
            } catch (error) {
                console.error(`[RECONCILE] DataId:[${entry.dataId}] Group:[${entry.group}] fetch failed: ${errorMessage(error)}`);
                stats.failed += 1;
                continue;
            }

            // Digest of the content as the server stores it, never of the decrypted text.
            const digest = computeDigest(snapshot.raw);
            if (digest === entry.lastNotifiedDigest) {
                stats.suppressed += 1;
                continue;
            }

            try {
                await entry.listener(tenant, entry.group, entry.dataId, snapshot.content);
            } catch (error) {
                // Still advanced below: the server would otherwise keep reporting this change every round.
                console.error(`[RECONCILE] Listener for '${key}' threw: ${errorMessage(error)}`);
            }

            const updated = this.registry.update(key, (current) => ({
                ...current,
                content: snapshot.raw,
                digest,
                lastNotifiedDigest: digest,
                initializing: false,
            }));
            stats.notified += 1;
            if (updated) {
                console.log(`[RECONCILE] Notified '${key}' (md5=${digest})`);
            } else {
                console.log(`[RECONCILE] Notified '${key}', watch was cancelled meanwhile`);
            }
        }

        return stats;
    }

    private handled(stats: ReconcileStats): number {
        return stats.notified + stats.suppressed + stats.skipped + stats.failed;
    }
}
