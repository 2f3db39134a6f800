import { ConfigurationError } from './errors';
import { Version, VersionRecord } from './types';
import { isRecord } from './utils';

const sha1Pattern = /^[0-9a-f]{40}$/;

export const unknownVersion: Version = { kind: 'unknown' };

function readKey(record: Record<string, unknown>, key: 'etag' | 'sha1'): string | undefined {
    const value = record[key];
    return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * Validates a version record from the payload. Empty or non-string values count as absent.
 */
export function parseVersionRecord(raw: unknown): VersionRecord {
    if (raw === undefined || raw === null) return {};
    if (!isRecord(raw)) {
        throw new ConfigurationError(`version must be a mapping, got ${Array.isArray(raw) ? 'array' : typeof raw}`);
    }

    const record: VersionRecord = {};
    const etag = readKey(raw, 'etag');
    const sha1 = readKey(raw, 'sha1');

    if (etag !== undefined) record.etag = etag;
    if (sha1 !== undefined) {
        const normalized = sha1.toLowerCase();
        if (!sha1Pattern.test(normalized)) {
            throw new ConfigurationError(`version sha1 "${sha1}" is not a 40 character hex digest`);
        }
        record.sha1 = normalized;
    }

    return record;
}

/**
 * Narrows a record to its identity. A tag wins over a hash when both are present;
 * the hash then rides along on the tag version.
 */
export function toVersion(record: VersionRecord): Version {
    if (record.etag !== undefined) {
        return record.sha1 !== undefined
            ? { kind: 'etag', etag: record.etag, sha1: record.sha1 }
            : { kind: 'etag', etag: record.etag };
    }
    if (record.sha1 !== undefined) return { kind: 'sha1', sha1: record.sha1 };
    return unknownVersion;
}

export function toRecord(version: Version): VersionRecord {
    switch (version.kind) {
        case 'etag':
            return version.sha1 !== undefined ? { etag: version.etag, sha1: version.sha1 } : { etag: version.etag };
        case 'sha1':
            return { sha1: version.sha1 };
        case 'unknown':
            return {};
    }
}

export function describeVersion(version: Version): string {
    switch (version.kind) {
        case 'etag':
            return `etag ${version.etag}`;
        case 'sha1':
            return `sha1 ${version.sha1}`;
        case 'unknown':
            return 'no previous version';
    }
}
