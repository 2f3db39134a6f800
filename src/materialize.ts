import * as fs from 'fs';
import * as path from 'path';
import { pipeline } from 'stream/promises';
import { IntegrityMismatchError, StorageError } from './errors';
import { DigestStream, discard, HttpFetcher, networkFailure } from './network';
import { InResult, ResourceDescriptor, VersionRecord } from './types';

export const DownloadFileName = 'downloaded';

/**
 * Downloads the resource into `<destinationDir>/downloaded` and proves it is the expected version.
 * The body is written and hashed in the same pass. On any failure the file must not be trusted;
 * on a content mismatch it is removed.
 */
export async function materialize(
    descriptor: ResourceDescriptor,
    expected: VersionRecord,
    destinationDir: string,
    fetcher: HttpFetcher = new HttpFetcher(descriptor),
): Promise<InResult> {
    console.error(`[IN] Fetching ${descriptor.url}...`);
    const snapshot = await fetcher.fetch();

    const observed: VersionRecord = {};
    const etag = snapshot.headers.get('ETag') ?? '';
    if (expected.etag !== undefined && expected.etag !== etag) {
        discard(snapshot);
        throw new IntegrityMismatchError('etag', expected.etag, etag);
    }
    if (etag) {
        observed.etag = etag;
    }

    const targetPath = path.join(destinationDir, DownloadFileName);
    try {
        if (!fs.existsSync(destinationDir)) {
            fs.mkdirSync(destinationDir, { recursive: true });
        }
    } catch (e) {
        discard(snapshot);
        throw new StorageError(`failed to create destination directory ${destinationDir}`, { cause: e });
    }

    const digest = new DigestStream('sha1');
    const output = fs.createWriteStream(targetPath);

    // pipeline() tears every stream down with the first error, so remember which side failed first.
    const failure: { side?: 'body' | 'output' } = {};
    snapshot.body.once('error', () => {
        failure.side ??= 'body';
    });
    output.once('error', () => {
        failure.side ??= 'output';
    });

    try {
        await pipeline(snapshot.body, digest, output);
    } catch (e) {
        if (snapshot.signal.aborted) {
            throw networkFailure(e, snapshot.signal, snapshot.timeoutMs, 'failed to write out download');
        }
        if (failure.side === 'output') {
            throw new StorageError(`failed to write out download to ${targetPath}`, { cause: e });
        }
        throw networkFailure(e, snapshot.signal, snapshot.timeoutMs, 'failed to read response body');
    }

    const sha1 = digest.digest();
    if (expected.sha1 !== undefined && expected.sha1 !== sha1) {
        fs.rmSync(targetPath, { force: true });
        throw new IntegrityMismatchError('sha1', expected.sha1, sha1);
    }
    observed.sha1 = sha1;

    console.error(`[IN] ✅ Saved ${path.relative(process.cwd(), targetPath) || targetPath} (sha1: ${sha1}${etag ? `, etag: ${etag}` : ''})`);

    return {
        version: observed,
        metadata: [{ name: 'content-type', value: snapshot.headers.get('Content-Type') ?? '' }],
    };
}
