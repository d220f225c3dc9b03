import { deepStrictEqual, ok, strictEqual } from 'node:assert/strict';
import { after, describe, test } from 'node:test';
import { app, deps } from './app';

describe('app', () => {
    after(() => app.close());

    test('instance is exported and is a Fastify instance', () => {
        ok(app.inject, 'app.inject should be defined (Fastify method)');
        strictEqual(typeof app.listen, 'function');
    });

    test('GET /health returns ok status', async () => {
        const response = await app.inject({ method: 'GET', url: '/health' });

        strictEqual(response.statusCode, 200);
        const json = response.json();
        strictEqual(json.status, 'ok');
        strictEqual(json.sessions, deps.sessions.size);
    });

    test('serves the restaurant search tool', async () => {
        const response = await app.inject({
            method: 'POST',
            url: '/mcp',
            headers: { accept: 'application/json' },
            payload: { jsonrpc: '2.0', id: 1, method: 'tools/list' },
        });

        strictEqual(response.statusCode, 200);
        deepStrictEqual(
            response.json().result.tools.map((tool: { name: string }) => tool.name),
            ['search_restaurants'],
        );
    });
});
