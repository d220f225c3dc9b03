import { equal, ok } from 'node:assert/strict';
import * as fs from 'node:fs';
import { resolve } from 'node:path';
import { describe, mock, test } from 'node:test';

import { Env } from './env';
import { createLogger, LogLevel } from './logger';

function withEnv(fn: () => void) {
    const save = { ...process.env };
    try {
        fn();
    } finally {
        for (const key of Object.keys(process.env)) {
            if (!(key in save)) delete process.env[key];
        }
        Object.assign(process.env, save);
    }
}

describe('env', () => {
    test('cover env defaults', () => {
        withEnv(() => {
            delete process.env.NODE_ENV;
            delete process.env.DOT_ENV_FILE;
            delete process.env.APP_NAME;
            delete process.env.LOG_ADD_TIME;
            delete process.env.LOG_LEVEL;
            delete process.env.LOG_FORMAT;

            Env.init();
            equal(process.env.NODE_ENV, 'development');
            ok(process.env.DOT_ENV_FILE?.endsWith('.env.development'));
            equal(process.env.APP_NAME, Env.pkg.name);
            equal(process.env.LOG_ADD_TIME, 'false');
            equal(process.env.LOG_LEVEL, 'INFO');
            ok(process.env.LOG_FORMAT === 'line' || process.env.LOG_FORMAT === 'json');
        });
    });

    test('print info even if logger elevated', (t) => {
        const fn = mock.fn();
        const log = createLogger(t.name, LogLevel.EMERGENCY, { log: fn, error: fn });
        Env.print(log);
        equal(fn.mock.calls.length, 1);
        equal(log.level, LogLevel.EMERGENCY);
    });

    test('get Env vars with defaults, min, max', () => {
        withEnv(() => {
            process.env.TEST_INT = '123';
            process.env.TEST_STR = 'hello';
            process.env.TEST_BOOL = 'TRUE';
            process.env.TEST_NAN = 'lots';

            equal(Env.get('TEST_INT', 0), 123);
            equal(Env.get('TEST_INT', 0, 100), 123);
            equal(Env.get('TEST_INT', 0, 200, 400), 200);
            equal(Env.get('TEST_NAN', 42), 42);
            equal(Env.get('NO_EXIST', 42), 42);

            equal(Env.get('TEST_STR', 'def'), 'hello');
            equal(Env.get('TEST_STR', 'def', 'zz'), 'zz');
            equal(Env.get('TEST_STR', 'def', 'aa', 'bb'), 'bb');
            equal(Env.get('NO_EXIST', 'def'), 'def');

            equal(Env.get('TEST_BOOL', false), true);
            equal(Env.get('NO_EXIST', true), true);
        });
    });

    test('port defaults to 8000 and stays in range', () => {
        withEnv(() => {
            delete process.env.PORT;
            equal(Env.port, 8000);
            process.env.PORT = '70000';
            equal(Env.port, 65535);
        });
    });

    test('load .env file without overriding the environment', () => {
        withEnv(() => {
            process.env.DOT_ENV_FILE = resolve(Env.__dirname, 'src/util/__mocks__/test.env');
            process.env.TEST_STR_ZZ = 'from-env';
            ok(fs.existsSync(process.env.DOT_ENV_FILE));

            Env.init();
            equal(Env.get('TEST_INT_ZZ', 0), 123);
            equal(Env.get('TEST_STR_ZZ', 'def'), 'from-env');
        });
    });

    test('package info', () => {
        ok(Env.pkg.name.length > 0);
        ok(/^\d+\.\d+\.\d+/.test(Env.appVersion));
        ok(Env.runtimeVer >= 20);
    });
});
