import test from 'node:test';
import assert from 'node:assert/strict';
import { ShardManager, shardTaskName } from './shard-manager.js';
import { WatchEntry, WatchRegistry } from '../registry/watch-registry.js';
import { TaskGroup } from '../scheduler/task-group.js';
import { getConfigCacheKey } from '../cache/cache-key.js';

function registerEntries(registry: WatchRegistry, from: number, to: number): void {
    for (let i = from; i < to; i += 1) {
        const dataId = `app-${i}.properties`;
        registry.register(
            getConfigCacheKey(dataId, 'DEFAULT_GROUP', ''),
            (shardIndex): WatchEntry => ({
                dataId,
                group: 'DEFAULT_GROUP',
                tenant: '',
                content: '',
                digest: 'd',
                lastNotifiedDigest: 'd',
                listener: () => { },
                shardIndex,
                initializing: true,
            }),
            (existing) => existing
        );
    }
}

function createManager(registry: WatchRegistry) {
    const tasks = new TaskGroup();
    const createdFor: number[] = [];
    const manager = new ShardManager({
        registry,
        tasks,
        initialDelayMs: 1000,
        gapMs: 1000,
        createShardRound: (shardIndex) => {
            createdFor.push(shardIndex);
            return () => { };
        },
    });
    return { tasks, manager, createdFor };
}

test('crossing the shard capacity spawns a poller for the next shard', async () => {
    const registry = new WatchRegistry(3000);
    const { tasks, manager, createdFor } = createManager(registry);

    registerEntries(registry, 0, 3000);
    manager.tick();
    assert.equal(manager.spawnedShards, 1);
    assert.equal(tasks.has(shardTaskName(1)), false);

    registerEntries(registry, 3000, 3001);
    manager.tick();
    assert.equal(manager.spawnedShards, 2);
    assert.equal(tasks.has(shardTaskName(1)), true);
    assert.deepEqual(createdFor, [0, 1]);

    const shardIndices = new Set(registry.keys().map((key) => registry.get(key)?.shardIndex));
    assert.deepEqual(Array.from(shardIndices).sort(), [0, 1]);
    await tasks.stopAll();
});

test('tick spawns every missing shard at once and never shrinks', async () => {
    const registry = new WatchRegistry(2);
    const { tasks, manager, createdFor } = createManager(registry);

    manager.tick();
    assert.equal(manager.spawnedShards, 0);

    registerEntries(registry, 0, 5);
    manager.tick();
    assert.deepEqual(createdFor, [0, 1, 2]);
    assert.deepEqual(tasks.names(), ['listen-shard-0', 'listen-shard-1', 'listen-shard-2']);

    for (const key of registry.keys()) {
        registry.remove(key);
    }
    manager.tick();
    assert.equal(manager.spawnedShards, 3);
    assert.equal(tasks.size, 3);
    await tasks.stopAll();
});

test('tick does nothing once the task group is closed', async () => {
    const registry = new WatchRegistry(1);
    const { tasks, manager } = createManager(registry);
    await tasks.stopAll();

    registerEntries(registry, 0, 2);
    manager.tick();
    assert.equal(manager.spawnedShards, 0);
});
