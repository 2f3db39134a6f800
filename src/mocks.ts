import * as http from 'http';

import { resolveDescriptor } from './config';
import { ResourceDescriptor, SourceConfig } from './types';

export interface RecordedRequest {
    method?: string;
    url?: string;
    headers: http.IncomingHttpHeaders;
    rawHeaders: string[];
}

export interface ServerMock {
    url: string;
    requests: RecordedRequest[];
    close: () => Promise<void>;
}

export type RequestHandler = (req: http.IncomingMessage, res: http.ServerResponse) => void;

/**
 * Starts an HTTP server on an ephemeral loopback port and records every request it receives.
 */
export async function createServerMock(handler: RequestHandler): Promise<ServerMock> {
    const requests: RecordedRequest[] = [];
    const server = http.createServer((req, res) => {
        requests.push({ method: req.method, url: req.url, headers: req.headers, rawHeaders: req.rawHeaders });
        handler(req, res);
    });

    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') {
        throw new Error(`Unexpected server address: ${String(address)}`);
    }

    return {
        url: `http://127.0.0.1:${address.port}/resource`,
        requests,
        close: () =>
            new Promise<void>((resolve, reject) => {
                server.closeAllConnections();
                server.close((err) => (err ? reject(err) : resolve()));
            }),
    };
}

export interface StaticResponse {
    status?: number;
    body?: string;
    headers?: Record<string, string>;
}

/**
 * Handler that always answers with the same response, or 304 when `If-None-Match` equals `notModifiedFor`.
 */
export function respondWith({ status = 200, body = '', headers = {} }: StaticResponse, notModifiedFor?: string): RequestHandler {
    return (req, res) => {
        if (notModifiedFor !== undefined && req.headers['if-none-match'] === notModifiedFor) {
            res.writeHead(304);
            res.end();
            return;
        }
        res.writeHead(status, headers);
        res.end(body);
    };
}

export function createDescriptor(url: string, source: SourceConfig = {}): ResourceDescriptor {
    return resolveDescriptor({ ...source, url });
}
