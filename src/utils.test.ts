import * as assert from 'node:assert';
import { test } from 'node:test';

import { describeError, parseDuration } from './utils';

test('[utils] parses durations', () => {
    assert.strictEqual(parseDuration('5m'), 300_000);
    assert.strictEqual(parseDuration('1h30m'), 5_400_000);
    assert.strictEqual(parseDuration('1.5s'), 1500);
    assert.strictEqual(parseDuration('300ms'), 300);
    assert.strictEqual(parseDuration('2000us'), 2);
    assert.strictEqual(parseDuration('0'), 0);
    assert.strictEqual(parseDuration('-2s'), -2000);
});

test('[utils] rejects malformed durations', () => {
    assert.strictEqual(parseDuration(''), undefined);
    assert.strictEqual(parseDuration('5'), undefined);
    assert.strictEqual(parseDuration('5 minutes'), undefined);
    assert.strictEqual(parseDuration('m'), undefined);
    assert.strictEqual(parseDuration('1d'), undefined);
});

test('[utils] describes an error with its cause chain', () => {
    const err = new Error('failed to perform request', {
        cause: new Error('fetch failed', { cause: new Error('connect ECONNREFUSED') }),
    });

    assert.strictEqual(describeError(err), 'failed to perform request: fetch failed: connect ECONNREFUSED');
    assert.strictEqual(describeError('plain'), 'plain');
    assert.strictEqual(describeError(undefined), 'Unknown error');
});
