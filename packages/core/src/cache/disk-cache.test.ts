import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { FileDiskCache } from './disk-cache.js';
import { getConfigCacheKey } from './cache-key.js';
import { CacheError } from '../errors.js';

function createTempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), 'liveconf-cache-test-'));
}

test('getConfigCacheKey joins identity fields with @@', () => {
    assert.equal(getConfigCacheKey('db.properties', 'DEFAULT_GROUP', ''), 'db.properties@@DEFAULT_GROUP@@');
    assert.equal(getConfigCacheKey('app', 'G', 'ns-1'), 'app@@G@@ns-1');
});

test('FileDiskCache reads back what it wrote', async () => {
    const dir = createTempDir();
    const cache = new FileDiskCache();
    const key = getConfigCacheKey('db.properties', 'DEFAULT_GROUP', '');

    await cache.write(key, dir, 'driver=mysql');
    assert.equal(await cache.read(key, dir), 'driver=mysql');

    await cache.write(key, dir, '');
    assert.equal(await cache.read(key, dir), '');
    fs.rmSync(dir, { recursive: true, force: true });
});

test('FileDiskCache creates the cache directory on first write', async () => {
    const root = createTempDir();
    const dir = path.join(root, 'nested', 'config');
    const cache = new FileDiskCache();

    await cache.write('a@@b@@', dir, 'x=1');
    assert.equal(fs.existsSync(path.join(dir, FileDiskCache.fileNameForKey('a@@b@@'))), true);
    fs.rmSync(root, { recursive: true, force: true });
});

test('FileDiskCache keeps dataIds with path separators inside the cache directory', async () => {
    const dir = createTempDir();
    const cache = new FileDiskCache();
    const key = getConfigCacheKey('../escape/app.yaml', 'G', '');

    await cache.write(key, dir, 'k: v');
    assert.deepEqual(fs.readdirSync(dir), ['..%2Fescape%2Fapp.yaml%40%40G%40%40']);
    assert.equal(await cache.read(key, dir), 'k: v');
    fs.rmSync(dir, { recursive: true, force: true });
});

test('FileDiskCache read of a missing key throws CacheError', async () => {
    const dir = createTempDir();
    const cache = new FileDiskCache();

    await assert.rejects(cache.read('missing@@G@@', dir), (error: unknown) => {
        assert.ok(error instanceof CacheError);
        assert.equal(error.token, 'E_CACHE');
        assert.match(error.message, /no cached config for 'missing@@G@@'/);
        return true;
    });
    fs.rmSync(dir, { recursive: true, force: true });
});
