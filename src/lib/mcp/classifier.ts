/**
 * JSON-RPC message classification
 * Splits a POST body into requests (which get exactly one response each) and everything else.
 */

import type { JSONRPCRequest } from './types';

export interface Classified {
    messages: unknown[];
    requests: JSONRPCRequest[];
    notifications: unknown[]; // notifications, client responses and anything unrecognised
}

const isObject = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * A single message or a batch, as one list.
 */
export function toMessageList(body: unknown): unknown[] {
    return Array.isArray(body) ? body : [body];
}

/**
 * A request carries a non-empty string `method` and an `id` member, whatever its value.
 */
export function isRequest(message: unknown): message is JSONRPCRequest {
    if (!isObject(message)) return false;
    const { method } = message;
    return typeof method === 'string' && method.length > 0 && 'id' in message;
}

/**
 * Bodies the endpoint accepts at all: a JSON object or an array.
 */
export function isMessagePayload(body: unknown): body is Record<string, unknown> | unknown[] {
    return Array.isArray(body) || isObject(body);
}

export function classify(body: unknown): Classified {
    const messages = toMessageList(body);
    const requests: JSONRPCRequest[] = [];
    const notifications: unknown[] = [];
    for (const message of messages) {
        if (isRequest(message)) {
            requests.push(message);
        } else {
            notifications.push(message);
        }
    }
    return { messages, requests, notifications };
}

export const hasRequests = (classified: Classified) => classified.requests.length > 0;
