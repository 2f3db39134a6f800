import { computeBodyHash, discard, HttpFetcher } from './network';
import { ResourceDescriptor, Version } from './types';
import { describeVersion } from './version';

/**
 * Resolves which versions the caller should now consider known, oldest first.
 * The previous version is always kept; a new one is appended only when the
 * resource changed.
 */
export async function checkVersions(
    descriptor: ResourceDescriptor,
    previous: Version,
    fetcher: HttpFetcher = new HttpFetcher(descriptor),
): Promise<Version[]> {
    const versions: Version[] = previous.kind === 'unknown' ? [] : [previous];
    const previousEtag = previous.kind === 'etag' ? previous.etag : undefined;
    const previousHash = previous.kind === 'unknown' ? undefined : previous.sha1;

    console.error(`[CHECK] Checking ${descriptor.url} (${describeVersion(previous)})...`);
    const snapshot = await fetcher.fetch(previousEtag);

    if (snapshot.status === 304) {
        discard(snapshot);
        console.error(`[CHECK] ⚡ Not modified.`);
        return versions;
    }

    // Once the server advertises a tag, identity is the tag, whatever the previous version was.
    const etag = snapshot.headers.get('ETag');
    if (etag) {
        discard(snapshot);
        // Some servers ignore If-None-Match and answer 200 with the same tag.
        if (etag === previousEtag) {
            console.error(`[CHECK] ⚡ ETag unchanged: ${etag}`);
            return versions;
        }

        console.error(`[CHECK] ✅ New ETag: ${etag}`);
        versions.push({ kind: 'etag', etag });
        return versions;
    }

    const sha1 = await computeBodyHash(snapshot);
    if (sha1 === previousHash) {
        console.error(`[CHECK] ⚡ Content unchanged: ${sha1}`);
        return versions;
    }

    console.error(`[CHECK] ✅ New content hash: ${sha1}`);
    versions.push({ kind: 'sha1', sha1 });
    return versions;
}
