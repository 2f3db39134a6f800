import * as crypto from 'crypto';
import { Readable, Transform, TransformCallback } from 'stream';
import { NetworkError, RequestConstructionError } from './errors';
import { ResourceDescriptor } from './types';

/**
 * A single HTTP response. `body` can be read once; whoever holds the snapshot
 * either consumes it or calls `discard()`.
 */
export interface ResponseSnapshot {
    status: number;
    headers: Headers;
    body: Readable;
    signal: AbortSignal;
    timeoutMs: number;
}

/**
 * Performs one GET per call against a resource descriptor.
 * Fails fast: no retries, the timeout spans the whole exchange including the body.
 */
export class HttpFetcher {
    constructor(private readonly descriptor: ResourceDescriptor) {}

    buildRequest(ifNoneMatch?: string): { url: URL; headers: Headers } {
        let url: URL;
        try {
            url = new URL(this.descriptor.url);
        } catch (e) {
            throw new RequestConstructionError(`failed to create request for "${this.descriptor.url}"`, { cause: e });
        }
        if (url.protocol !== 'http:' && url.protocol !== 'https:') {
            throw new RequestConstructionError(`unsupported protocol "${url.protocol}" in "${this.descriptor.url}"`);
        }

        const headers = new Headers();
        try {
            for (const [name, values] of Object.entries(this.descriptor.headers)) {
                for (const value of values) {
                    headers.append(name, value);
                }
            }
        } catch (e) {
            throw new RequestConstructionError('failed to apply source headers', { cause: e });
        }

        if (ifNoneMatch) {
            headers.append('If-None-Match', ifNoneMatch);
        }

        const auth = this.descriptor.basicAuth;
        if (auth) {
            const credentials = Buffer.from(`${auth.user}:${auth.password}`, 'utf8').toString('base64');
            headers.set('Authorization', `Basic ${credentials}`);
        }

        return { url, headers };
    }

    async fetch(ifNoneMatch?: string): Promise<ResponseSnapshot> {
        const { url, headers } = this.buildRequest(ifNoneMatch);
        const { timeoutMs } = this.descriptor;
        const signal = AbortSignal.timeout(timeoutMs);

        let response: Response;
        try {
            response = await fetch(url, { method: 'GET', headers, signal });
        } catch (e) {
            throw networkFailure(e, signal, timeoutMs, `failed to perform request to ${url.href}`);
        }

        const body = response.body ? Readable.fromWeb(response.body) : Readable.from([]);

        if (response.status >= 400) {
            body.destroy();
            throw new NetworkError(`request to ${url.href} failed: ${response.status} ${response.statusText}`.trim(), response.status);
        }

        return {
            status: response.status,
            headers: response.headers,
            body,
            signal,
            timeoutMs,
        };
    }
}

/**
 * Releases a body that will not be read.
 */
export function discard(snapshot: ResponseSnapshot): void {
    snapshot.body.destroy();
}

/**
 * Maps a transport failure to a NetworkError, naming the timeout when it fired.
 */
export function networkFailure(err: unknown, signal: AbortSignal, timeoutMs: number, action: string): NetworkError {
    if (signal.aborted) {
        return new NetworkError(`${action}: timed out after ${timeoutMs}ms`, undefined, { cause: err });
    }
    return new NetworkError(action, undefined, { cause: err });
}

/**
 * Pass-through stream that feeds every chunk into a hash on its way to the next sink.
 */
export class DigestStream extends Transform {
    private readonly hash: crypto.Hash;
    private result?: string;

    constructor(algorithm = 'sha1') {
        super();
        this.hash = crypto.createHash(algorithm);
    }

    _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
        this.hash.update(chunk);
        callback(null, chunk);
    }

    /**
     * Hex digest of everything that passed through. Only valid once the stream has ended.
     */
    digest(): string {
        if (this.result === undefined) {
            this.result = this.hash.digest('hex');
        }
        return this.result;
    }
}

/**
 * Computes the SHA-1 of a response body without keeping it.
 */
export async function computeBodyHash(snapshot: ResponseSnapshot): Promise<string> {
    const hash = crypto.createHash('sha1');
    try {
        for await (const chunk of snapshot.body) {
            hash.update(chunk);
        }
    } catch (e) {
        throw networkFailure(e, snapshot.signal, snapshot.timeoutMs, 'failed to hash response contents');
    }
    return hash.digest('hex');
}
