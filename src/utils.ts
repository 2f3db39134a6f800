const unitMs: Record<string, number> = {
    'ns': 1e-6,
    'us': 1e-3,
    'µs': 1e-3,
    'μs': 1e-3,
    'ms': 1,
    's': 1000,
    'm': 60 * 1000,
    'h': 60 * 60 * 1000
};

const segmentPattern = /^(\d+(?:\.\d*)?|\.\d+)(ns|us|µs|μs|ms|s|m|h)/;

/**
 * Parses a duration such as `300ms`, `1.5s` or `1h30m` into milliseconds.
 * A bare `0` is accepted; any other number needs a unit.
 * Returns undefined when the text is not a valid duration.
 */
export function parseDuration(text: string): number | undefined {
    let rest = text.trim();
    let sign = 1;
    if (rest.startsWith('-') || rest.startsWith('+')) {
        sign = rest.startsWith('-') ? -1 : 1;
        rest = rest.substring(1);
    }

    if (rest === '0') return 0;
    if (rest === '') return undefined;

    let total = 0;
    while (rest.length > 0) {
        const match = segmentPattern.exec(rest);
        if (!match) return undefined;

        total += parseFloat(match[1]) * unitMs[match[2]];
        rest = rest.substring(match[0].length);
    }

    return sign * total;
}

/**
 * Renders an error with its `cause` chain, e.g. `failed to perform request: fetch failed: ECONNREFUSED`.
 */
export function describeError(err: unknown): string {
    const parts: string[] = [];
    const seen = new Set<unknown>();
    let current: unknown = err;

    while (current !== undefined && current !== null && !seen.has(current)) {
        seen.add(current);
        if (current instanceof Error) {
            parts.push(current.message);
            current = current.cause;
        } else {
            parts.push(String(current));
            break;
        }
    }

    return parts.filter(Boolean).join(': ') || 'Unknown error';
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
