import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Reconciler } from './reconciler.js';
import { ConfigReader } from '../client/config-reader.js';
import { FileDiskCache } from '../cache/disk-cache.js';
import { getConfigCacheKey } from '../cache/cache-key.js';
import { KeyManagement } from '../kms/key-management.js';
import { InMemoryConfigService } from '../remote/in-memory-config-service.js';
import { ConfigChangeListener, WatchRegistry } from '../registry/watch-registry.js';
import { computeDigest } from '../utils/digest.js';

const CREDENTIALS = { accessKey: '', secretKey: '' };

function createFixture(keyManagement?: KeyManagement) {
    const cacheDir = fs.mkdtempSync(path.join(os.tmpdir(), 'liveconf-reconcile-test-'));
    const service = new InMemoryConfigService();
    const registry = new WatchRegistry();
    const reader = new ConfigReader({ service, diskCache: new FileDiskCache(), cacheDir, credentials: CREDENTIALS, keyManagement });
    const reconciler = new Reconciler(registry, reader);
    return {
        service,
        registry,
        reconciler,
        cleanup: () => fs.rmSync(cacheDir, { recursive: true, force: true }),
    };
}

function watch(registry: WatchRegistry, dataId: string, group: string, listener: ConfigChangeListener, content = ''): string {
    const key = getConfigCacheKey(dataId, group, '');
    const digest = computeDigest(content);
    registry.register(key, (shardIndex) => ({
        dataId,
        group,
        tenant: '',
        content,
        digest,
        lastNotifiedDigest: digest,
        listener,
        shardIndex,
        initializing: true,
    }), (existing) => existing);
    return key;
}

test('reconcile notifies once per genuine change and updates the entry', async () => {
    const { service, registry, reconciler, cleanup } = createFixture();
    const calls: string[][] = [];
    const key = watch(registry, 'db.properties', 'DEFAULT_GROUP', (tenant, group, dataId, content) => {
        calls.push([tenant, group, dataId, content]);
    });
    await service.publish('db.properties', 'DEFAULT_GROUP', '', 'driver=postgres', CREDENTIALS);

    const first = await reconciler.reconcile([{ dataId: 'db.properties', group: 'DEFAULT_GROUP' }], '');
    const second = await reconciler.reconcile([{ dataId: 'db.properties', group: 'DEFAULT_GROUP' }], '');

    assert.deepEqual(calls, [['', 'DEFAULT_GROUP', 'db.properties', 'driver=postgres']]);
    assert.deepEqual(first, { notified: 1, suppressed: 0, skipped: 0, failed: 0 });
    assert.deepEqual(second, { notified: 0, suppressed: 1, skipped: 0, failed: 0 });

    const entry = registry.get(key);
    assert.equal(entry?.content, 'driver=postgres');
    assert.equal(entry?.digest, computeDigest('driver=postgres'));
    assert.equal(entry?.lastNotifiedDigest, computeDigest('driver=postgres'));
    assert.equal(entry?.initializing, false);
    cleanup();
});

test('reconcile skips pairs that are not watched and keeps going after a fetch failure', async () => {
    const { service, registry, reconciler, cleanup } = createFixture();
    const notified: string[] = [];
    watch(registry, 'missing.yaml', 'G', () => {
        notified.push('missing');
    });
    watch(registry, 'present.yaml', 'G', (_tenant, _group, dataId) => {
        notified.push(dataId);
    });
    await service.publish('present.yaml', 'G', '', 'a: 1', CREDENTIALS);

    const stats = await reconciler.reconcile([
        { dataId: 'unknown.yaml', group: 'G' },
        { dataId: 'missing.yaml', group: 'G' },
        { dataId: 'present.yaml', group: 'G' },
    ], '');

    assert.deepEqual(stats, { notified: 1, suppressed: 0, skipped: 1, failed: 1 });
    assert.deepEqual(notified, ['present.yaml']);
    cleanup();
});

test('a throwing listener is logged and the entry still advances', async () => {
    const { service, registry, reconciler, cleanup } = createFixture();
    let calls = 0;
    const key = watch(registry, 'app.yaml', 'G', () => {
        calls += 1;
        throw new Error('listener failure');
    });
    await service.publish('app.yaml', 'G', '', 'v: 2', CREDENTIALS);

    await reconciler.reconcile([{ dataId: 'app.yaml', group: 'G' }], '');
    await reconciler.reconcile([{ dataId: 'app.yaml', group: 'G' }], '');

    assert.equal(calls, 1);
    assert.equal(registry.get(key)?.lastNotifiedDigest, computeDigest('v: 2'));
    cleanup();
});

test('an entry cancelled while its listener runs is not written back', async () => {
    const { service, registry, reconciler, cleanup } = createFixture();
    const key = watch(registry, 'app.yaml', 'G', async () => {
        registry.remove(key);
    });
    await service.publish('app.yaml', 'G', '', 'v: 3', CREDENTIALS);

    const stats = await reconciler.reconcile([{ dataId: 'app.yaml', group: 'G' }], '');

    assert.equal(stats.notified, 1);
    assert.equal(registry.has(key), false);
    cleanup();
});

test('cipher configs notify with plaintext but keep the server digest', async () => {
    const { service, registry, reconciler, cleanup } = createFixture({
        decrypt: async (ciphertext) => ciphertext.split('').reverse().join(''),
    });
    const received: string[] = [];
    const key = watch(registry, 'cipher-db.properties', 'G', (_tenant, _group, _dataId, content) => {
        received.push(content);
    });
    await service.publish('cipher-db.properties', 'G', '', 'terces', CREDENTIALS);

    const first = await reconciler.reconcile([{ dataId: 'cipher-db.properties', group: 'G' }], '');
    const second = await reconciler.reconcile([{ dataId: 'cipher-db.properties', group: 'G' }], '');

    assert.deepEqual(received, ['secret']);
    assert.deepEqual(first, { notified: 1, suppressed: 0, skipped: 0, failed: 0 });
    assert.deepEqual(second, { notified: 0, suppressed: 1, skipped: 0, failed: 0 });
    const entry = registry.get(key);
    assert.equal(entry?.content, 'terces');
    assert.equal(entry?.digest, computeDigest('terces'));
    assert.equal(entry?.lastNotifiedDigest, computeDigest('terces'));
    cleanup();
});

test('an aborted round stops before the next change', async () => {
    const { service, registry, reconciler, cleanup } = createFixture();
    const controller = new AbortController();
    const notified: string[] = [];
    watch(registry, 'a.yaml', 'G', (_tenant, _group, dataId) => {
        notified.push(dataId);
        controller.abort();
    });
    watch(registry, 'b.yaml', 'G', (_tenant, _group, dataId) => {
        notified.push(dataId);
    });
    await service.publish('a.yaml', 'G', '', 'a: 1', CREDENTIALS);
    await service.publish('b.yaml', 'G', '', 'b: 1', CREDENTIALS);

    const stats = await reconciler.reconcile([
        { dataId: 'a.yaml', group: 'G' },
        { dataId: 'b.yaml', group: 'G' },
    ], '', controller.signal);

    assert.deepEqual(notified, ['a.yaml']);
    assert.deepEqual(stats, { notified: 1, suppressed: 0, skipped: 0, failed: 0 });
    cleanup();
});
