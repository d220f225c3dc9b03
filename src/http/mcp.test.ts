import { deepStrictEqual, ok, strictEqual } from 'node:assert/strict';
import { describe, test } from 'node:test';
import { type PlaceRecord, PlacesRequestError, type PlacesSearch } from '../controller/places/client';
import type { OriginPolicy } from '../lib/mcp';
import { createLogger, LogLevel } from '../util/logger';
import { buildApp } from './server';

const log = createLogger('test.http.mcp', LogLevel.EMERGENCY, { log: () => {}, error: () => {} });

const laksa: PlaceRecord = { name: 'Laksa House', address: '3 Example Lane', priceLevel: 'PRICE_LEVEL_MODERATE', rating: '4.6' };

class FakePlaces implements PlacesSearch {
    calls: { query: string; apiKey: string }[] = [];

    async searchText(query: string, apiKey: string) {
        this.calls.push({ query, apiKey });
        if (query === 'fail') throw new PlacesRequestError('HTTP 500: Internal Server Error');
        return query === 'laksa' ? [laksa] : [];
    }
}

async function setup(originPolicy: OriginPolicy = {}) {
    const places = new FakePlaces();
    const { app, deps } = await buildApp({ places, fallbackApiKey: () => 'env-key', originPolicy, log });
    return { app, deps, places };
}

const initialize = { jsonrpc: '2.0', id: 1, method: 'initialize', params: { protocolVersion: '2025-03-26', capabilities: {} } };
const notification = { jsonrpc: '2.0', method: 'notifications/initialized' };
const json = { accept: 'application/json' };
const stream = { accept: 'application/json, text/event-stream' };

// "id: <uuid>\ndata: <json>\n\n" frames, in order
function parseFrames(payload: string): { id: string; data: unknown }[] {
    const frames = payload.split('\n\n').filter(Boolean);
    return frames.map((frame) => {
        const match = /^id: ([0-9a-f-]{36})\ndata: (.*)$/.exec(frame);
        ok(match, `not an event frame: ${frame}`);
        return { id: match[1], data: JSON.parse(match[2]) };
    });
}

describe('POST /mcp', () => {
    test('initialize returns server info and a session header', async () => {
        const { app, deps } = await setup();
        const response = await app.inject({ method: 'POST', url: '/mcp', headers: json, payload: initialize });

        strictEqual(response.statusCode, 200);
        ok(response.headers['content-type']?.toString().startsWith('application/json'));
        deepStrictEqual(response.json(), {
            jsonrpc: '2.0',
            id: 1,
            result: {
                protocolVersion: '2025-03-26',
                capabilities: { tools: {} },
                serverInfo: { name: 'Singapore Restaurant Locator', version: '1.0.0' },
            },
        });

        const sessionId = response.headers['mcp-session-id'];
        strictEqual(typeof sessionId, 'string');
        strictEqual(deps.sessions.has(String(sessionId)), true);
    });

    test('initialize never reissues a session id', async () => {
        const { app } = await setup();
        const first = await app.inject({ method: 'POST', url: '/mcp', headers: json, payload: initialize });
        const second = await app.inject({ method: 'POST', url: '/mcp', headers: json, payload: initialize });

        ok(first.headers['mcp-session-id']);
        ok(second.headers['mcp-session-id']);
        ok(first.headers['mcp-session-id'] !== second.headers['mcp-session-id']);
    });

    test('one initialize and one notification yield one response and a session header', async () => {
        const { app } = await setup();
        const response = await app.inject({ method: 'POST', url: '/mcp', headers: json, payload: [initialize, notification] });

        strictEqual(response.statusCode, 200);
        strictEqual(response.json().id, 1);
        ok(response.headers['mcp-session-id']);
    });

    test('notifications only: 202 with no body', async () => {
        const { app, deps } = await setup();
        const response = await app.inject({
            method: 'POST',
            url: '/mcp',
            headers: json,
            payload: [notification, { jsonrpc: '2.0', id: 9, result: {} }],
        });

        strictEqual(response.statusCode, 202);
        strictEqual(response.payload, '');
        strictEqual(response.headers['mcp-session-id'], undefined);
        strictEqual(deps.sessions.size, 0);
    });

    test('a request with an object id is answered with that id', async () => {
        const { app } = await setup();
        const response = await app.inject({
            method: 'POST',
            url: '/mcp',
            headers: json,
            payload: { jsonrpc: '2.0', id: { n: 1 }, method: 'tools/list' },
        });

        strictEqual(response.statusCode, 200);
        const body = response.json();
        deepStrictEqual(body.id, { n: 1 });
        deepStrictEqual(
            body.result.tools.map((tool: { name: string }) => tool.name),
            ['search_restaurants'],
        );
    });

    test('a batch gets exactly one response per request, in order', async () => {
        const { app } = await setup();
        const response = await app.inject({
            method: 'POST',
            url: '/mcp',
            headers: json,
            payload: [
                { jsonrpc: '2.0', id: 'a', method: 'tools/list' },
                notification,
                { jsonrpc: '2.0', id: null, method: 'ping' },
                { jsonrpc: '2.0', method: 'notifications/cancelled', params: {} },
                { jsonrpc: '2.0', id: 3, method: 'tools/call', params: { name: 'search_restaurants', arguments: { query: 'laksa' } } },
            ],
        });

        const body = response.json();
        ok(Array.isArray(body));
        deepStrictEqual(
            body.map((entry: { id: unknown }) => entry.id),
            ['a', null, 3],
        );
        strictEqual(response.headers['mcp-session-id'], undefined);
    });

    test('tools/list advertises search_restaurants with one required string field', async () => {
        const { app } = await setup();
        const response = await app.inject({ method: 'POST', url: '/mcp', headers: json, payload: { jsonrpc: '2.0', id: 2, method: 'tools/list' } });

        const [tool] = response.json().result.tools;
        strictEqual(tool.name, 'search_restaurants');
        deepStrictEqual(tool.inputSchema.required, ['query']);
        deepStrictEqual(Object.keys(tool.inputSchema.properties), ['query']);
        strictEqual(tool.inputSchema.properties.query.type, 'string');
    });

    test('tools/call renders the places found', async () => {
        const { app, places } = await setup();
        const response = await app.inject({
            method: 'POST',
            url: '/mcp',
            headers: json,
            payload: { jsonrpc: '2.0', id: 3, method: 'tools/call', params: { name: 'search_restaurants', arguments: { query: 'laksa' } } },
        });

        deepStrictEqual(response.json(), {
            jsonrpc: '2.0',
            id: 3,
            result: {
                content: [
                    {
                        type: 'text',
                        text: '1. Laksa House\n   Address: 3 Example Lane\n   Price Level: PRICE_LEVEL_MODERATE\n   Rating: 4.6\n',
                    },
                ],
            },
        });
        deepStrictEqual(places.calls, [{ query: 'laksa', apiKey: 'env-key' }]);
    });

    test('tools/call with no places is the no-results text, not an error', async () => {
        const { app } = await setup();
        const response = await app.inject({
            method: 'POST',
            url: '/mcp',
            headers: json,
            payload: { jsonrpc: '2.0', id: 4, method: 'tools/call', params: { name: 'search_restaurants', arguments: { query: 'snow crab' } } },
        });

        deepStrictEqual(response.json(), {
            jsonrpc: '2.0',
            id: 4,
            result: { content: [{ type: 'text', text: 'No places found for your query.' }] },
        });
    });

    test('tools/call without a query searches for an empty string', async () => {
        const { app, places } = await setup();
        const response = await app.inject({
            method: 'POST',
            url: '/mcp',
            headers: json,
            payload: { jsonrpc: '2.0', id: 5, method: 'tools/call', params: { name: 'search_restaurants' } },
        });

        strictEqual(response.statusCode, 200);
        deepStrictEqual(response.json().result.content, [{ type: 'text', text: 'No places found for your query.' }]);
        deepStrictEqual(places.calls, [{ query: '', apiKey: 'env-key' }]);
    });

    test('an unknown tool is -32601', async () => {
        const { app } = await setup();
        const response = await app.inject({
            method: 'POST',
            url: '/mcp',
            headers: json,
            payload: { jsonrpc: '2.0', id: 6, method: 'tools/call', params: { name: 'book_table', arguments: {} } },
        });

        deepStrictEqual(response.json(), { jsonrpc: '2.0', id: 6, error: { code: -32601, message: 'Unknown tool: book_table' } });
    });

    test('a failing search does not abort the batch', async () => {
        const { app } = await setup();
        const response = await app.inject({
            method: 'POST',
            url: '/mcp',
            headers: json,
            payload: [
                { jsonrpc: '2.0', id: 1, method: 'tools/call', params: { name: 'search_restaurants', arguments: { query: 'fail' } } },
                { jsonrpc: '2.0', id: 2, method: 'tools/list' },
            ],
        });

        const [failed, listed] = response.json();
        deepStrictEqual(failed, {
            jsonrpc: '2.0',
            id: 1,
            error: { code: -32603, message: 'API request failed: HTTP 500: Internal Server Error' },
        });
        strictEqual(listed.id, 2);
        ok(listed.result);
    });

    test('query parameters configure the api key', async () => {
        const { app, deps, places } = await setup();
        await app.inject({
            method: 'POST',
            url: '/mcp?apiKey=test-secret&server.port=8080',
            headers: json,
            payload: { jsonrpc: '2.0', id: 1, method: 'tools/call', params: { name: 'search_restaurants', arguments: { query: 'laksa' } } },
        });

        deepStrictEqual(places.calls, [{ query: 'laksa', apiKey: 'test-secret' }]);
        deepStrictEqual(deps.config.snapshot(), { apiKey: 'test-secret', server: { port: '8080' } });
    });

    test('a query value may contain a question mark', async () => {
        const { app, deps, places } = await setup();
        await app.inject({
            method: 'POST',
            url: '/mcp?apiKey=ab?cd&server.port=1',
            headers: json,
            payload: { jsonrpc: '2.0', id: 1, method: 'tools/call', params: { name: 'search_restaurants', arguments: { query: 'laksa' } } },
        });

        deepStrictEqual(places.calls, [{ query: 'laksa', apiKey: 'ab?cd' }]);
        deepStrictEqual(deps.config.snapshot(), { apiKey: 'ab?cd', server: { port: '1' } });
    });

    test('a session keeps the config of its creation', async () => {
        const { app, deps } = await setup();
        const response = await app.inject({ method: 'POST', url: '/mcp?apiKey=first', headers: json, payload: initialize });
        await app.inject({ method: 'POST', url: '/mcp?apiKey=second', headers: json, payload: notification });

        deepStrictEqual(deps.sessions.get(String(response.headers['mcp-session-id']))?.config, { apiKey: 'first' });
        deepStrictEqual(deps.config.snapshot(), { apiKey: 'second' });
    });

    test('event-stream mode sends one frame per response', async () => {
        const { app } = await setup();
        const response = await app.inject({
            method: 'POST',
            url: '/mcp',
            headers: stream,
            payload: [initialize, notification, { jsonrpc: '2.0', id: 2, method: 'tools/list' }],
        });

        strictEqual(response.statusCode, 200);
        strictEqual(response.headers['content-type'], 'text/event-stream');
        strictEqual(response.headers['cache-control'], 'no-cache');
        ok(response.headers['mcp-session-id']);

        const frames = parseFrames(response.payload);
        deepStrictEqual(
            frames.map((frame) => (typeof frame.data === 'object' && frame.data !== null && 'id' in frame.data ? frame.data.id : undefined)),
            [1, 2],
        );
        ok(frames[0].id !== frames[1].id);
    });

    test('a single request in event-stream mode is one frame', async () => {
        const { app } = await setup();
        const response = await app.inject({
            method: 'POST',
            url: '/mcp',
            headers: { accept: 'text/event-stream' },
            payload: { jsonrpc: '2.0', id: 7, method: 'nope' },
        });

        deepStrictEqual(
            parseFrames(response.payload).map((frame) => frame.data),
            [{ jsonrpc: '2.0', id: 7, error: { code: -32601, message: 'Unknown method: nope' } }],
        );
    });

    test('invalid JSON is a 400', async () => {
        const { app } = await setup();
        const response = await app.inject({
            method: 'POST',
            url: '/mcp',
            headers: { ...json, 'content-type': 'application/json' },
            payload: '{"jsonrpc": "2.0", "id": 1,',
        });

        strictEqual(response.statusCode, 400);
        deepStrictEqual(response.json(), { error: 'Bad Request', message: 'Invalid JSON', statusCode: 400 });
    });

    test('a JSON scalar is a 400', async () => {
        const { app } = await setup();
        const response = await app.inject({
            method: 'POST',
            url: '/mcp',
            headers: { ...json, 'content-type': 'application/json' },
            payload: '42',
        });

        strictEqual(response.statusCode, 400);
    });

    test('any content type is read as JSON', async () => {
        const { app } = await setup();
        const response = await app.inject({
            method: 'POST',
            url: '/mcp',
            headers: { ...json, 'content-type': 'text/plain' },
            payload: JSON.stringify({ jsonrpc: '2.0', id: 8, method: 'tools/list' }),
        });

        strictEqual(response.statusCode, 200);
        strictEqual(response.json().id, 8);
    });
});

describe('origin validation', () => {
    const policy = { allowedOrigins: ['https://app.example'] };

    test('a foreign origin is a 403, before the body is read', async () => {
        const { app } = await setup(policy);
        const response = await app.inject({
            method: 'POST',
            url: '/mcp',
            headers: { host: 'mcp.example', origin: 'https://evil.example', 'content-type': 'application/json' },
            payload: 'not json',
        });

        strictEqual(response.statusCode, 403);
        deepStrictEqual(response.json(), { error: 'Forbidden', message: 'Invalid origin', statusCode: 403 });
    });

    test('an allowed origin passes', async () => {
        const { app } = await setup(policy);
        const response = await app.inject({
            method: 'POST',
            url: '/mcp',
            headers: { ...json, host: 'mcp.example', origin: 'https://app.example' },
            payload: { jsonrpc: '2.0', id: 1, method: 'tools/list' },
        });

        strictEqual(response.statusCode, 200);
    });

    test('a local host passes whatever the origin', async () => {
        const { app } = await setup(policy);
        const response = await app.inject({
            method: 'GET',
            url: '/mcp',
            headers: { host: 'localhost:8000', origin: 'https://evil.example', accept: 'text/event-stream' },
        });

        strictEqual(response.statusCode, 200);
    });

    test('GET and DELETE are guarded too', async () => {
        const { app } = await setup(policy);
        const headers = { host: 'mcp.example', origin: 'https://evil.example', accept: 'text/event-stream' };

        strictEqual((await app.inject({ method: 'GET', url: '/mcp', headers })).statusCode, 403);
        strictEqual((await app.inject({ method: 'DELETE', url: '/mcp', headers })).statusCode, 403);
    });
});

describe('GET /mcp', () => {
    test('opens a stream with a single empty event', async () => {
        const { app } = await setup();
        const response = await app.inject({ method: 'GET', url: '/mcp', headers: { accept: 'text/event-stream' } });

        strictEqual(response.statusCode, 200);
        strictEqual(response.headers['content-type'], 'text/event-stream');
        strictEqual(response.payload, 'data: {}\n\n');
    });

    test('without event-stream support is a 405', async () => {
        const { app } = await setup();
        const response = await app.inject({ method: 'GET', url: '/mcp', headers: json });

        strictEqual(response.statusCode, 405);
        deepStrictEqual(response.json(), { error: 'Method Not Allowed', message: 'Method Not Allowed', statusCode: 405 });
    });
});

describe('DELETE /mcp', () => {
    test('deletes a session once', async () => {
        const { app, deps } = await setup();
        const init = await app.inject({ method: 'POST', url: '/mcp', headers: json, payload: initialize });
        const headers = { 'mcp-session-id': String(init.headers['mcp-session-id']) };

        strictEqual((await app.inject({ method: 'DELETE', url: '/mcp', headers })).statusCode, 200);
        strictEqual(deps.sessions.size, 0);
        strictEqual((await app.inject({ method: 'DELETE', url: '/mcp', headers })).statusCode, 404);
    });

    test('an unknown session is a 404', async () => {
        const { app } = await setup();
        const response = await app.inject({ method: 'DELETE', url: '/mcp', headers: { 'mcp-session-id': 'never-issued' } });
        strictEqual(response.statusCode, 404);
    });

    test('a missing header is a 404', async () => {
        const { app } = await setup();
        strictEqual((await app.inject({ method: 'DELETE', url: '/mcp' })).statusCode, 404);
    });
});
