/**
 * Streamable HTTP transport helpers: content negotiation, origin validation
 * and the two response encodings (JSON and a finite event stream).
 */

import { randomUUID } from 'node:crypto';
import type { IncomingHttpHeaders } from 'node:http';
import type { Logger } from '../../util/logger';
import type { JSONRPCResponse } from './types';

export const EVENT_STREAM = 'text/event-stream';
export const APPLICATION_JSON = 'application/json';

const LOCAL_HOSTS = ['localhost', '127.0.0.1', '[::1]'];

export interface OriginPolicy {
    // Origins allowed for non-local hosts. Undefined: allow anything and warn.
    allowedOrigins?: string[];
}

export interface Negotiation {
    originAllowed: boolean;
    acceptsEventStream: boolean;
    acceptsJson: boolean;
}

const headerValue = (value: string | string[] | undefined): string | undefined =>
    Array.isArray(value) ? value.join(', ') : value;

/**
 * Split a comma separated allow-list. Blank input means no list.
 */
export function parseAllowedOrigins(raw: string | undefined): string[] | undefined {
    const origins = (raw ?? '')
        .split(',')
        .map((origin) => origin.trim())
        .filter(Boolean);
    return origins.length ? origins : undefined;
}

/**
 * DNS rebinding guard. Local hosts always pass; others must present an allowed Origin
 * when an allow-list is configured.
 */
export function validateOrigin(headers: IncomingHttpHeaders, policy: OriginPolicy, log?: Logger): boolean {
    const host = headerValue(headers.host) ?? 'localhost';
    if (LOCAL_HOSTS.some((local) => host.startsWith(local))) return true;

    const origin = headerValue(headers.origin);
    if (policy.allowedOrigins) {
        return origin !== undefined && policy.allowedOrigins.includes(origin);
    }

    log?.warn(`No origin allow-list configured, allowing request from origin: ${origin}, host: ${host}`);
    return true;
}

const accepts = (headers: IncomingHttpHeaders, type: string) => (headerValue(headers.accept) ?? '').includes(type);

/** Event-stream mode wins whenever the client accepts it. */
export const acceptsEventStream = (headers: IncomingHttpHeaders) => accepts(headers, EVENT_STREAM);

export function negotiate(headers: IncomingHttpHeaders, policy: OriginPolicy, log?: Logger): Negotiation {
    return {
        originAllowed: validateOrigin(headers, policy, log),
        acceptsEventStream: acceptsEventStream(headers),
        acceptsJson: accepts(headers, APPLICATION_JSON),
    };
}

/**
 * One response is sent as is, several as an array in order.
 */
export function encodeJson(responses: JSONRPCResponse[]): JSONRPCResponse | JSONRPCResponse[] {
    return responses.length === 1 ? responses[0] : responses;
}

export const eventFrame = (data: unknown, id: string = randomUUID()) => `id: ${id}\ndata: ${JSON.stringify(data)}\n\n`;

/**
 * One event per response, then the stream ends.
 */
export function* encodeEventStream(responses: JSONRPCResponse[], newId: () => string = randomUUID): Generator<string> {
    for (const response of responses) {
        yield eventFrame(response, newId());
    }
}

// Server-initiated stream opened by GET: a single empty event
export const EMPTY_STREAM_FRAME = 'data: {}\n\n';
