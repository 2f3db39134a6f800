export interface BasicAuthConfig {
    user: string;
    password: string;
}

/**
 * Resource source as it arrives in the payload.
 */
export interface SourceConfig {
    url?: string;
    timeout?: string;
    headers?: Record<string, string | string[]>;
    basic_auth?: BasicAuthConfig;
}

export interface ResourceDescriptor {
    url: string;
    timeoutMs: number;
    headers: Record<string, string[]>;
    basicAuth?: BasicAuthConfig;
}

/**
 * Version as it travels on the wire. A version found by check has one key,
 * `in` reports both when the server sent a tag.
 */
export interface VersionRecord {
    etag?: string;
    sha1?: string;
}

/**
 * A known version. Check only ever produces one identity per version; an `etag`
 * version may also carry the content hash it was seen with, which is kept and
 * compared when the server stops sending tags.
 */
export type Version =
    | { kind: 'etag'; etag: string; sha1?: string }
    | { kind: 'sha1'; sha1: string }
    | { kind: 'unknown' };

export interface MetadataEntry {
    name: string;
    value: string;
}

export interface InResult {
    version: VersionRecord;
    metadata: MetadataEntry[];
}

export interface CheckPayload {
    source: SourceConfig;
    version?: VersionRecord;
}

export interface InPayload extends CheckPayload {
    params?: Record<string, unknown>;
}
