import test from 'node:test';
import assert from 'node:assert/strict';
import { InMemoryConfigService } from './in-memory-config-service.js';
import { ForbiddenError, NotFoundError, TransientError } from '../errors.js';
import { encodeListeningConfigs } from '../listen/wire.js';
import { computeDigest } from '../utils/digest.js';

const CREDENTIALS = { accessKey: '', secretKey: '' };

function payloadFor(dataId: string, group: string, content: string, tenant = ''): string {
    return encodeListeningConfigs([{ dataId, group, digest: computeDigest(content), tenant }]);
}

test('get reflects publish and delete', async () => {
    const service = new InMemoryConfigService();
    await service.publish('app.yaml', 'G', '', 'a: 1', CREDENTIALS);
    assert.equal(await service.get('app.yaml', 'G', '', CREDENTIALS), 'a: 1');

    await service.delete('app.yaml', 'G', '', CREDENTIALS);
    await assert.rejects(service.get('app.yaml', 'G', '', CREDENTIALS), NotFoundError);
});

test('forbidden and unreachable states fail with their error classes', async () => {
    const service = new InMemoryConfigService();
    service.forbid('secret.yaml', 'G', '');
    await assert.rejects(service.get('secret.yaml', 'G', '', CREDENTIALS), ForbiddenError);

    service.setUnreachable(true);
    await assert.rejects(service.publish('app.yaml', 'G', '', 'a: 1', CREDENTIALS), TransientError);
    await assert.rejects(service.listen('', false, CREDENTIALS), TransientError);
});

test('listen answers at once with the configs whose digest differs', async () => {
    const service = new InMemoryConfigService({ holdMs: 1000 });
    await service.publish('a.yaml', 'G', 'ns-1', 'a: 2', CREDENTIALS);

    const response = await service.listen(payloadFor('a.yaml', 'G', 'a: 1', 'ns-1'), false, CREDENTIALS);
    assert.equal(response, 'a.yaml%02G%02ns-1%01');
});

test('an initializing listen returns without holding', async () => {
    const service = new InMemoryConfigService({ holdMs: 1000 });
    const startedAt = Date.now();

    assert.equal(await service.listen(payloadFor('a.yaml', 'G', ''), true, CREDENTIALS), '');
    assert.ok(Date.now() - startedAt < 500);
});

test('a held listen wakes up when a listed config is published', async () => {
    const service = new InMemoryConfigService({ holdMs: 1000 });
    const pending = service.listen(payloadFor('b.yaml', 'G', ''), false, CREDENTIALS);
    await service.publish('b.yaml', 'G', '', 'b: 1', CREDENTIALS);

    assert.equal(await pending, 'b.yaml%02G%01');
    assert.deepEqual(service.listenCalls.map((call) => call.initializing), [false]);
});

test('a held listen returns empty when its window elapses', async () => {
    const service = new InMemoryConfigService({ holdMs: 10 });
    assert.equal(await service.listen(payloadFor('c.yaml', 'G', ''), false, CREDENTIALS), '');
});

test('search pages through matches in publish order', async () => {
    const service = new InMemoryConfigService();
    await service.publish('order.yaml', 'G', '', 'o', CREDENTIALS);
    await service.publish('user.yaml', 'G', '', 'u', CREDENTIALS, { appName: 'accounts', type: 'yaml' });
    await service.publish('user.yaml', 'G', 'ns-2', 'other tenant', CREDENTIALS);

    const blur = await service.search({ dataId: '*.yaml', group: '' }, 2, 1, 'blur', '', CREDENTIALS);
    assert.equal(blur.totalCount, 2);
    assert.equal(blur.pagesAvailable, 2);
    assert.deepEqual(blur.pageItems.map((item) => [item.dataId, item.appName, item.type]), [['user.yaml', 'accounts', 'yaml']]);

    const accurate = await service.search({ dataId: 'user', group: 'G' }, 1, 10, 'accurate', '', CREDENTIALS);
    assert.equal(accurate.totalCount, 0);
});
