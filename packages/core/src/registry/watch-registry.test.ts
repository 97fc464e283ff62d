import test from 'node:test';
import assert from 'node:assert/strict';
import { WatchEntry, WatchRegistry } from './watch-registry.js';
import { getConfigCacheKey } from '../cache/cache-key.js';

function createEntry(dataId: string, shardIndex: number, overrides: Partial<WatchEntry> = {}): WatchEntry {
    return {
        dataId,
        group: 'G',
        tenant: '',
        content: '',
        digest: 'd0',
        lastNotifiedDigest: 'd0',
        listener: () => { },
        shardIndex,
        initializing: true,
        ...overrides,
    };
}

test('register assigns shard indices from the registry size at insert time', () => {
    const registry = new WatchRegistry(2);
    const indices: number[] = [];
    for (const dataId of ['a', 'b', 'c', 'd', 'e']) {
        registry.register(
            getConfigCacheKey(dataId, 'G', ''),
            (shardIndex) => {
                indices.push(shardIndex);
                return createEntry(dataId, shardIndex);
            },
            (existing) => existing
        );
    }
    assert.deepEqual(indices, [0, 0, 1, 1, 2]);
    assert.equal(registry.size, 5);
});

test('register keeps the first entry and applies the re-register transform', () => {
    const registry = new WatchRegistry();
    const key = getConfigCacheKey('a', 'G', '');
    const first = () => { };
    const second = () => { };

    assert.equal(registry.register(key, (i) => createEntry('a', i, { listener: first, initializing: false }), (e) => e), 'created');
    const outcome = registry.register(
        key,
        (i) => createEntry('a', i, { listener: second }),
        (existing) => ({ ...existing, initializing: true })
    );

    assert.equal(outcome, 're-registered');
    assert.equal(registry.get(key)?.listener, first);
    assert.equal(registry.get(key)?.initializing, true);
    assert.equal(registry.size, 1);
});

test('update replaces the entry and is a no-op for absent keys', () => {
    const registry = new WatchRegistry();
    const key = getConfigCacheKey('a', 'G', '');
    registry.set(key, createEntry('a', 0));

    const updated = registry.update(key, (current) => ({ ...current, content: 'x=1', digest: 'd1' }));
    assert.equal(updated?.content, 'x=1');
    assert.equal(registry.get(key)?.digest, 'd1');

    assert.equal(registry.update('missing@@G@@', (current) => current), undefined);
    assert.equal(registry.has('missing@@G@@'), false);
});

test('entriesForShard filters by shard index and remove drops the key', () => {
    const registry = new WatchRegistry();
    registry.set('a@@G@@', createEntry('a', 0));
    registry.set('b@@G@@', createEntry('b', 1));
    registry.set('c@@G@@', createEntry('c', 1));

    assert.deepEqual(registry.entriesForShard(1).map((entry) => entry.dataId), ['b', 'c']);
    assert.equal(registry.remove('b@@G@@'), true);
    assert.deepEqual(registry.entriesForShard(1).map((entry) => entry.dataId), ['c']);
    assert.deepEqual(registry.keys(), ['a@@G@@', 'c@@G@@']);
});

test('constructor rejects a non-positive shard capacity', () => {
    assert.throws(() => new WatchRegistry(0), RangeError);
});
