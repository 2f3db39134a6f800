import * as assert from 'node:assert';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { mock, test } from 'node:test';

import { setupCLI } from './cli';
import { createServerMock, respondWith } from './mocks';

function createStreams(input: string) {
    return {
        readInput: mock.fn(() => Promise.resolve(input)),
        writeOutput: mock.fn((_text: string) => {}),
    };
}

test('[cli] check prints the versions as JSON', async () => {
    const server = await createServerMock(respondWith({ body: 'hello' }));
    try {
        const streams = createStreams(JSON.stringify({ source: { url: server.url } }));
        await setupCLI(streams).parseAsync(['node', 'http-version-resource', 'check']);

        assert.strictEqual(streams.writeOutput.mock.callCount(), 1);
        assert.deepStrictEqual(streams.writeOutput.mock.calls[0].arguments, [
            '[{"sha1":"aaf4c61ddcc5e8a2dabede0f3b482cd9aea9434d"}]',
        ]);
    } finally {
        await server.close();
    }
});

test('[cli] check keeps the previous version first', async () => {
    const server = await createServerMock(respondWith({ body: 'hello', headers: { ETag: '"v2"' } }));
    try {
        const streams = createStreams(JSON.stringify({ source: { url: server.url }, version: { etag: '"v1"' } }));
        await setupCLI(streams).parseAsync(['node', 'http-version-resource', 'check']);

        assert.deepStrictEqual(streams.writeOutput.mock.calls[0].arguments, ['[{"etag":"\\"v1\\""},{"etag":"\\"v2\\""}]']);
    } finally {
        await server.close();
    }
});

test('[cli] check keeps the hash of a version that carries both keys', async () => {
    const server = await createServerMock(respondWith({ body: 'hello' }));
    try {
        const version = { etag: '"v1"', sha1: 'aaf4c61ddcc5e8a2dabede0f3b482cd9aea9434d' };
        const streams = createStreams(JSON.stringify({ source: { url: server.url }, version }));
        await setupCLI(streams).parseAsync(['node', 'http-version-resource', 'check']);

        assert.deepStrictEqual(JSON.parse(streams.writeOutput.mock.calls[0].arguments[0]), [version]);
    } finally {
        await server.close();
    }
});

test('[cli] in downloads into the destination directory', async () => {
    const server = await createServerMock(respondWith({ body: 'hello', headers: { 'Content-Type': 'text/plain' } }));
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'http-version-resource-cli-'));
    try {
        const streams = createStreams(JSON.stringify({ source: { url: server.url }, version: {} }));
        await setupCLI(streams).parseAsync(['node', 'http-version-resource', 'in', dir]);

        assert.deepStrictEqual(JSON.parse(streams.writeOutput.mock.calls[0].arguments[0]), {
            version: { sha1: 'aaf4c61ddcc5e8a2dabede0f3b482cd9aea9434d' },
            metadata: [{ name: 'content-type', value: 'text/plain' }],
        });
        assert.strictEqual(fs.readFileSync(path.join(dir, 'downloaded'), 'utf8'), 'hello');
    } finally {
        await server.close();
        fs.rmSync(dir, { recursive: true, force: true });
    }
});

test('[cli] check fails on a bad timeout without touching the network', async () => {
    const server = await createServerMock(respondWith({ body: 'hello' }));
    try {
        const streams = createStreams(JSON.stringify({ source: { url: server.url, timeout: 'forever' } }));

        await assert.rejects(setupCLI(streams).parseAsync(['node', 'http-version-resource', 'check']), {
            name: 'ConfigurationError',
            message: 'failed to parse timeout "forever"',
        });
        assert.strictEqual(server.requests.length, 0);
        assert.strictEqual(streams.writeOutput.mock.callCount(), 0);
    } finally {
        await server.close();
    }
});

test('[cli] out always fails', async () => {
    const streams = createStreams(JSON.stringify({ source: { url: 'http://example.test/' }, params: {} }));

    await assert.rejects(setupCLI(streams).parseAsync(['node', 'http-version-resource', 'out', '/tmp/source']), {
        name: 'UnimplementedError',
        message: 'not implemented: this resource cannot publish',
    });
    assert.strictEqual(streams.readInput.mock.callCount(), 1);
    assert.strictEqual(streams.writeOutput.mock.callCount(), 0);
});
