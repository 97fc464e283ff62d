import { SCHEDULER_GAP_MS, SCHEDULER_INITIAL_DELAY_MS } from '../config/defaults.js';
import { WatchRegistry } from '../registry/watch-registry.js';
import { RepeatingTaskFn } from '../scheduler/repeating-task.js';
import { TaskGroup } from '../scheduler/task-group.js';

export interface ShardManagerOptions {
    registry: WatchRegistry;
    tasks: TaskGroup;
    /** Builds the round function of the poller serving `shardIndex`. */
    createShardRound: (shardIndex: number) => RepeatingTaskFn;
    initialDelayMs?: number;
    gapMs?: number;
}

export function shardTaskName(shardIndex: number): string {
    return `listen-shard-${shardIndex}`;
}

/**
 * Grows the poller pool with the registry: one long-poll worker per started
 * block of `shardCapacity` watched configs. The pool never shrinks.
 */
export class ShardManager {
    private readonly registry: WatchRegistry;
    private readonly tasks: TaskGroup;
    private readonly createShardRound: (shardIndex: number) => RepeatingTaskFn;
    private readonly initialDelayMs: number;
    private readonly gapMs: number;
    private spawned = 0;

    constructor(options: ShardManagerOptions) {
        this.registry = options.registry;
        this.tasks = options.tasks;
        this.createShardRound = options.createShardRound;
        this.initialDelayMs = options.initialDelayMs ?? SCHEDULER_INITIAL_DELAY_MS;
        this.gapMs = options.gapMs ?? SCHEDULER_GAP_MS;
    }

    public get spawnedShards(): number {
        return this.spawned;
    }

    public tick(): void {
        if (this.tasks.isClosed) {
            return;
        }
        const needed = Math.ceil(this.registry.size / this.registry.shardCapacity);
        if (needed <= this.spawned) {
            return;
        }
        for (let shardIndex = this.spawned; shardIndex < needed; shardIndex += 1) {
            this.tasks.spawn(shardTaskName(shardIndex), this.createShardRound(shardIndex), {
                initialDelayMs: this.initialDelayMs,
                gapMs: this.gapMs,
            });
            console.log(`[SHARD] Spawned long-poll worker for shard ${shardIndex}`);
        }
        this.spawned = needed;
    }
}
