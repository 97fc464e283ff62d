import { ConfigIdentity } from '../cache/cache-key.js';
import { DEFAULT_SHARD_CAPACITY } from '../config/defaults.js';

export type ConfigChangeListener = (
    tenant: string,
    group: string,
    dataId: string,
    content: string
) => void | Promise<void>;

export interface WatchEntry extends ConfigIdentity {
    readonly dataId: string;
    readonly group: string;
    readonly tenant: string;
    readonly appName?: string;
    readonly content: string;
    readonly digest: string;
    /** Digest at the last listener invocation; starts equal to the creation digest. */
    readonly lastNotifiedDigest: string;
    readonly listener: ConfigChangeListener;
    readonly shardIndex: number;
    readonly initializing: boolean;
}

export type RegisterOutcome = 'created' | 're-registered';

/**
 * The watched-config table shared by registration, shard management and pollers.
 * Entries are immutable; every change replaces the record inside one synchronous
 * call, so a read-modify-write never interleaves with another one.
 */
export class WatchRegistry {
    private readonly entries: Map<string, WatchEntry> = new Map();
    public readonly shardCapacity: number;

    constructor(shardCapacity: number = DEFAULT_SHARD_CAPACITY) {
        if (!Number.isInteger(shardCapacity) || shardCapacity <= 0) {
            throw new RangeError(`shardCapacity must be a positive integer, got ${shardCapacity}`);
        }
        this.shardCapacity = shardCapacity;
    }

    public get size(): number {
        return this.entries.size;
    }

    public get(key: string): WatchEntry | undefined {
        return this.entries.get(key);
    }

    public set(key: string, entry: WatchEntry): void {
        this.entries.set(key, entry);
    }

    public remove(key: string): boolean {
        return this.entries.delete(key);
    }

    public has(key: string): boolean {
        return this.entries.has(key);
    }

    public keys(): string[] {
        return Array.from(this.entries.keys());
    }

    public entriesForShard(shardIndex: number): WatchEntry[] {
        const matched: WatchEntry[] = [];
        for (const entry of this.entries.values()) {
            if (entry.shardIndex === shardIndex) {
                matched.push(entry);
            }
        }
        return matched;
    }

    /**
     * Insert-or-touch in one step. A new entry gets its shard index from the
     * registry size at this exact moment, so concurrent registrations near a
     * shard boundary cannot share or skip an index.
     */
    public register(
        key: string,
        create: (shardIndex: number) => WatchEntry,
        reRegister: (existing: WatchEntry) => WatchEntry
    ): RegisterOutcome {
        const existing = this.entries.get(key);
        if (existing) {
            this.entries.set(key, reRegister(existing));
            return 're-registered';
        }
        const shardIndex = Math.floor(this.entries.size / this.shardCapacity);
        this.entries.set(key, create(shardIndex));
        return 'created';
    }

    public update(key: string, fn: (current: WatchEntry) => WatchEntry): WatchEntry | undefined {
        const current = this.entries.get(key);
        if (!current) {
            return undefined;
        }
        const next = fn(current);
        this.entries.set(key, next);
        return next;
    }
}
