import { cacheKeyOf } from '../cache/cache-key.js';
import { errorMessage, TransientError } from '../errors.js';
import type { ConfigService, Credentials } from '../remote/config-service.js';
import { WatchRegistry } from '../registry/watch-registry.js';
import { Reconciler } from './reconciler.js';
import { ChangedConfig, decodeChangedConfigs, encodeListeningConfigs } from './wire.js';

export interface ShardPollerOptions {
    shardIndex: number;
    registry: WatchRegistry;
    service: ConfigService;
    reconciler: Reconciler;
    credentials: Credentials;
    /** Namespace in effect for reconciliation of this shard's changes. */
    tenant: string;
    debug?: boolean;
}

export type PollOutcome = 'idle' | 'no_change' | 'changed' | 'failed' | 'aborted';

/** One long-poll worker; `poll` is a single round and is driven by a RepeatingTask. */
export class ShardPoller {
    public readonly shardIndex: number;
    private readonly registry: WatchRegistry;
    private readonly service: ConfigService;
    private readonly reconciler: Reconciler;
    private readonly credentials: Credentials;
    private readonly tenant: string;
    private readonly debug: boolean;

    constructor(options: ShardPollerOptions) {
        this.shardIndex = options.shardIndex;
        this.registry = options.registry;
        this.service = options.service;
        this.reconciler = options.reconciler;
        this.credentials = options.credentials;
        this.tenant = options.tenant;
        this.debug = options.debug === true;
    }

    public async poll(signal?: AbortSignal): Promise<PollOutcome> {
        const entries = this.registry.entriesForShard(this.shardIndex);
        if (entries.length === 0) {
            return 'idle';
        }

        const initializing = entries.some((entry) => entry.initializing);
        const payload = encodeListeningConfigs(entries.map((entry) => ({
            dataId: entry.dataId,
            group: entry.group,
            digest: entry.digest,
            tenant: entry.tenant,
        })));

        const initializingKeys = entries.filter((entry) => entry.initializing).map((entry) => cacheKeyOf(entry));
        let response: string;
        try {
            response = await this.service.listen(payload, initializing, this.credentials, signal);
        } catch (error) {
            if (signal?.aborted) {
                return 'aborted';
            }
            if (error instanceof TransientError && error.payload !== undefined && error.payload.trim().length > 0) {
                console.warn(`[LISTEN] Shard ${this.shardIndex}: server answered ${error.statusCode ?? 'error'}, using its changed list`);
                response = error.payload;
            } else {
                console.error(`[LISTEN] Shard ${this.shardIndex}: listen config error: ${errorMessage(error)}`);
                return 'failed';
            }
        }

        if (response.trim().length === 0) {
            if (this.debug) {
                console.log(`[LISTEN] Shard ${this.shardIndex}: no change`);
            }
            this.finishInitializing(initializingKeys);
            return 'no_change';
        }

        let changed: ChangedConfig[];
        try {
            changed = decodeChangedConfigs(response);
        } catch (error) {
            console.error(`[LISTEN] Shard ${this.shardIndex}: ignoring malformed response: ${errorMessage(error)}`);
            return 'failed';
        }

        console.log(`[LISTEN] Shard ${this.shardIndex}: config changed: ${changed.map((c) => `${c.dataId}@${c.group}`).join(', ')}`);
        await this.reconciler.reconcile(changed, this.tenant, signal);
        this.finishInitializing(initializingKeys);
        return 'changed';
    }

    /** The server has now seen these entries once; later rounds may be held. */
    private finishInitializing(keys: readonly string[]): void {
        for (const key of keys) {
            this.registry.update(key, (current) => (current.initializing ? { ...current, initializing: false } : current));
        }
    }
}
