export class ResourceError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Malformed source or version in the payload. */
export class ConfigurationError extends ResourceError {}

/** The request could not be assembled (bad URL, unsupported scheme). */
export class RequestConstructionError extends ResourceError {}

/** Transport failure, timeout or an HTTP failure status. */
export class NetworkError extends ResourceError {
    constructor(message: string, public readonly status?: number, options?: { cause?: unknown }) {
        super(message, options);
    }
}

export class IntegrityMismatchError extends ResourceError {
    constructor(
        public readonly field: 'etag' | 'sha1',
        public readonly expected: string,
        public readonly actual: string,
    ) {
        super(field === 'etag'
            ? `unexpected ETag "${actual}", expected "${expected}"`
            : `unexpected SHA1 content hash "${actual}", expected "${expected}"`);
    }
}

export class StorageError extends ResourceError {}

export class UnimplementedError extends ResourceError {}
