import test from 'node:test';
import assert from 'node:assert/strict';
import { decodeChangedConfigs, encodeListeningConfigs } from './wire.js';
import { ProtocolError, ValidationError } from '../errors.js';

test('encodeListeningConfigs omits the tenant field for the default namespace', () => {
    const payload = encodeListeningConfigs([
        { dataId: 'db.properties', group: 'DEFAULT_GROUP', digest: 'abc', tenant: '' },
    ]);
    assert.equal(payload, 'db.properties\u0002DEFAULT_GROUP\u0002abc\u0001');
});

test('encodeListeningConfigs appends the tenant and concatenates entries', () => {
    const payload = encodeListeningConfigs([
        { dataId: 'a', group: 'G', digest: 'd1', tenant: 'ns' },
        { dataId: 'b', group: 'G', digest: 'd2', tenant: '' },
    ]);
    assert.equal(payload, 'a\u0002G\u0002d1\u0002ns\u0001b\u0002G\u0002d2\u0001');
});

test('encodeListeningConfigs returns an empty payload for no entries', () => {
    assert.equal(encodeListeningConfigs([]), '');
});

test('encodeListeningConfigs rejects fields containing separators', () => {
    assert.throws(
        () => encodeListeningConfigs([{ dataId: 'bad\u0001id', group: 'G', digest: 'd', tenant: '' }]),
        (error: unknown) => error instanceof ValidationError && /dataId contains a reserved/.test(error.message)
    );
});

test('decodeChangedConfigs parses the url-encoded server response', () => {
    const changed = decodeChangedConfigs('db.properties%02DEFAULT_GROUP%01app.yaml%02G%02ns-1%01\n');
    assert.deepEqual(changed, [
        { dataId: 'db.properties', group: 'DEFAULT_GROUP' },
        { dataId: 'app.yaml', group: 'G', tenant: 'ns-1' },
    ]);
});

test('decodeChangedConfigs accepts raw separators and decodes escaped fields', () => {
    const changed = decodeChangedConfigs('my%20app\u0002G\u0001');
    assert.deepEqual(changed, [{ dataId: 'my app', group: 'G' }]);
});

test('decodeChangedConfigs returns nothing for a blank response', () => {
    assert.deepEqual(decodeChangedConfigs('   '), []);
});

test('decodeChangedConfigs throws ProtocolError for an entry without a group', () => {
    assert.throws(
        () => decodeChangedConfigs('orphan%01'),
        (error: unknown) => error instanceof ProtocolError && error.message === "malformed changed-config entry 'orphan'"
    );
});
