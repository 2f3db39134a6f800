import * as dotenv from 'dotenv';
import * as yaml from 'yaml';
import { ConfigurationError } from './errors';
import { BasicAuthConfig, InPayload, ResourceDescriptor, SourceConfig } from './types';
import { isRecord, parseDuration } from './utils';
import { parseVersionRecord } from './version';

const DefaultTimeout = '5m';
const DefaultTimeoutMs = 5 * 60 * 1000;
// Node timers cannot wait longer than a signed 32-bit number of milliseconds.
const MaxTimeoutMs = 2 ** 31 - 1;

export interface RuntimeConfig {
    defaultTimeoutMs: number;
}

/**
 * Loads `.env` (or HTTP_RESOURCE_ENV_PATH) and resolves process-level defaults.
 * Priority: 1. ENV Variables -> 2. Built-in defaults
 */
export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
    dotenv.config({ path: env.HTTP_RESOURCE_ENV_PATH, quiet: true });

    const timeout = env.HTTP_RESOURCE_DEFAULT_TIMEOUT || DefaultTimeout;
    return { defaultTimeoutMs: parseTimeout(timeout, 'HTTP_RESOURCE_DEFAULT_TIMEOUT') };
}

/**
 * Converts a duration into the whole number of milliseconds a timer accepts,
 * rounding sub-millisecond parts up.
 */
function parseTimeout(text: string, name: string): number {
    const parsed = parseDuration(text);
    if (parsed === undefined) {
        throw new ConfigurationError(`failed to parse ${name} "${text}"`);
    }
    if (parsed <= 0) {
        throw new ConfigurationError(`${name} "${text}" must be positive`);
    }

    // Drop floating point noise below a nanosecond before rounding up, so 1.1s stays 1100ms.
    const timeoutMs = Math.ceil(Math.round(parsed * 1e6) / 1e6);
    if (timeoutMs > MaxTimeoutMs) {
        throw new ConfigurationError(`${name} "${text}" exceeds the maximum of ${MaxTimeoutMs}ms`);
    }

    return timeoutMs;
}

/**
 * Parses the stdin payload. JSON is accepted as the YAML subset it is.
 */
export function parsePayload(text: string): InPayload {
    let parsed: unknown;
    try {
        parsed = yaml.parse(text);
    } catch (e) {
        throw new ConfigurationError('failed to parse payload', { cause: e });
    }

    if (!isRecord(parsed)) {
        throw new ConfigurationError('payload must be a mapping with a "source" key');
    }
    if (!isRecord(parsed.source)) {
        throw new ConfigurationError('payload is missing the "source" mapping');
    }

    const payload: InPayload = {
        source: parseSource(parsed.source),
        version: parseVersionRecord(parsed.version),
    };
    if (isRecord(parsed.params)) {
        payload.params = parsed.params;
    }

    return payload;
}

function parseSource(raw: Record<string, unknown>): SourceConfig {
    const source: SourceConfig = {};

    if (raw.url !== undefined) {
        if (typeof raw.url !== 'string') throw new ConfigurationError('source.url must be a string');
        source.url = raw.url;
    }

    if (raw.timeout !== undefined && raw.timeout !== null && raw.timeout !== '') {
        if (typeof raw.timeout !== 'string') throw new ConfigurationError('source.timeout must be a duration string');
        source.timeout = raw.timeout;
    }

    if (raw.headers !== undefined && raw.headers !== null) {
        if (!isRecord(raw.headers)) throw new ConfigurationError('source.headers must be a mapping');
        const headers: Record<string, string | string[]> = {};
        for (const [name, value] of Object.entries(raw.headers)) {
            if (typeof value === 'string') {
                headers[name] = value;
            } else if (Array.isArray(value) && value.every((v): v is string => typeof v === 'string')) {
                headers[name] = value;
            } else {
                throw new ConfigurationError(`source.headers.${name} must be a string or a list of strings`);
            }
        }
        source.headers = headers;
    }

    if (raw.basic_auth !== undefined && raw.basic_auth !== null) {
        source.basic_auth = parseBasicAuth(raw.basic_auth);
    }

    return source;
}

function parseBasicAuth(raw: unknown): BasicAuthConfig {
    if (!isRecord(raw)) throw new ConfigurationError('source.basic_auth must be a mapping');

    const { user, password } = raw;
    if (typeof user !== 'string' || (password !== undefined && typeof password !== 'string')) {
        throw new ConfigurationError('source.basic_auth needs a string "user" and "password"');
    }

    return { user, password: password ?? '' };
}

/**
 * Turns a payload source into the immutable descriptor the fetcher works from.
 */
export function resolveDescriptor(source: SourceConfig, runtime: RuntimeConfig = { defaultTimeoutMs: DefaultTimeoutMs }): ResourceDescriptor {
    if (!source.url) {
        throw new ConfigurationError('source.url is required');
    }

    const timeoutMs = source.timeout ? parseTimeout(source.timeout, 'timeout') : runtime.defaultTimeoutMs;

    const headers: Record<string, string[]> = {};
    for (const [name, value] of Object.entries(source.headers ?? {})) {
        headers[name] = typeof value === 'string' ? [value] : [...value];
    }

    return Object.freeze({
        url: source.url,
        timeoutMs,
        headers,
        basicAuth: source.basic_auth ? { ...source.basic_auth } : undefined,
    });
}
