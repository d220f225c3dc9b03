import { deepStrictEqual, strictEqual } from 'node:assert/strict';
import { describe, test } from 'node:test';
import { classify, hasRequests, isMessagePayload, isRequest, toMessageList } from './classifier';

describe('isRequest', () => {
    test('needs a method and an id', () => {
        strictEqual(isRequest({ jsonrpc: '2.0', id: 1, method: 'tools/list' }), true);
        strictEqual(isRequest({ jsonrpc: '2.0', id: 'abc', method: 'initialize' }), true);
    });

    test('accepts a null id', () => {
        strictEqual(isRequest({ id: null, method: 'tools/list' }), true);
    });

    test('accepts any id value', () => {
        strictEqual(isRequest({ id: { n: 1 }, method: 'tools/list' }), true);
        strictEqual(isRequest({ id: true, method: 'tools/list' }), true);
        strictEqual(isRequest({ id: [1], method: 'tools/list' }), true);
    });

    test('rejects notifications and responses', () => {
        strictEqual(isRequest({ jsonrpc: '2.0', method: 'notifications/initialized' }), false);
        strictEqual(isRequest({ jsonrpc: '2.0', id: 1, result: {} }), false);
    });

    test('rejects an empty or non-string method', () => {
        strictEqual(isRequest({ id: 1, method: '' }), false);
        strictEqual(isRequest({ id: 1, method: 42 }), false);
    });

    test('rejects non-objects', () => {
        strictEqual(isRequest(null), false);
        strictEqual(isRequest('initialize'), false);
        strictEqual(isRequest([{ id: 1, method: 'initialize' }]), false);
    });
});

describe('classify', () => {
    test('wraps a single message', () => {
        const message = { id: 1, method: 'tools/list' };
        deepStrictEqual(toMessageList(message), [message]);
        deepStrictEqual(classify(message).requests, [message]);
    });

    test('splits a batch in order', () => {
        const batch = [
            { id: 1, method: 'initialize' },
            { method: 'notifications/initialized' },
            { id: 2, method: 'tools/list' },
            'noise',
        ];
        const { messages, requests, notifications } = classify(batch);

        strictEqual(messages.length, 4);
        deepStrictEqual(
            requests.map((r) => r.id),
            [1, 2],
        );
        deepStrictEqual(notifications, [{ method: 'notifications/initialized' }, 'noise']);
    });

    test('an empty batch has no requests', () => {
        deepStrictEqual(classify([]).requests, []);
        strictEqual(hasRequests(classify([])), false);
    });

    test('a batch of object ids keeps every request', () => {
        const batch = [
            { id: { n: 1 }, method: 'tools/list' },
            { id: false, method: 'tools/list' },
        ];
        const classified = classify(batch);

        strictEqual(hasRequests(classified), true);
        deepStrictEqual(
            classified.requests.map((r) => r.id),
            [{ n: 1 }, false],
        );
        deepStrictEqual(classified.notifications, []);
    });
});

describe('isMessagePayload', () => {
    test('accepts objects and arrays only', () => {
        strictEqual(isMessagePayload({}), true);
        strictEqual(isMessagePayload([]), true);
        strictEqual(isMessagePayload(null), false);
        strictEqual(isMessagePayload(42), false);
        strictEqual(isMessagePayload('text'), false);
    });
});
