import * as fs from 'node:fs';
import * as os from 'node:os';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parseEnv } from 'node:util';
import { z } from 'zod';
import { createLogger, hookConsole, isDebuggerAttached, LogLevel } from './logger';

type EnvValue = string | number | boolean;

const packageSchema = z.object({
    name: z.string().default('app'),
    version: z.string().default('0.0.0'),
});

type PackageInfo = z.infer<typeof packageSchema>;

export class Env {
    static get runtimeVer() {
        return parseFloat(process.versions.node);
    }
    static get __dirname() {
        return resolve(dirname(fileURLToPath(import.meta.url)), '../..');
    }

    private static _pkg?: PackageInfo;
    static get pkg(): PackageInfo {
        return (Env._pkg ??= packageSchema.parse(
            JSON.parse(fs.readFileSync(resolve(Env.__dirname, 'package.json'), 'utf8')),
        ));
    }
    static get appName() {
        return Env.get('APP_NAME', Env.pkg.name);
    }
    static get appVersion() {
        return Env.pkg.version;
    }
    static get hostname() {
        return Env.get('HOSTNAME', os.hostname());
    }
    static get nodeEnv() {
        return Env.get('NODE_ENV', 'development');
    }
    static get port() {
        return Env.get('PORT', 8000, 1, 65535);
    }
    static get host() {
        return Env.get('HOST', '0.0.0.0');
    }
    static get placesApiKey() {
        return Env.get('GOOGLE_PLACES_API_KEY', '');
    }

    /**
     * Constructor: setup environment and hook console.
     */
    constructor() {
        console.assert(Env.runtimeVer >= 20, 'NodeJS version 20+ required');
        Env.init();
        process.title = Env.appName;
        hookConsole();
    }

    /**
     * Load variables from the .env file of the current NODE_ENV and set defaults.
     * Values already in the environment win over the file.
     */
    static init() {
        const { env, argv } = process;

        env.NODE_ENV ??= Env.nodeEnv;

        const filename = env.DOT_ENV_FILE ? resolve(env.DOT_ENV_FILE) : resolve(`.env.${env.NODE_ENV}`);
        env.DOT_ENV_FILE ??= filename;

        if (fs.existsSync(filename)) {
            const parsed = parseEnv(fs.readFileSync(filename, 'utf8'));
            const entries = Object.entries(parsed).filter(([key]) => env[key] === undefined);
            for (const [key, value] of entries) {
                env[key] = String(value);
            }
            console.log(`Loaded .env file: ${filename} with ${entries.length} vars`);
        }

        env.APP_NAME ??= Env.pkg.name;
        env.HOSTNAME ??= Env.hostname;
        env.LOG_ADD_TIME ??= 'false';
        env.LOG_LEVEL ??= 'INFO';
        env.LOG_FORMAT ??= argv.includes('--json') ? 'json' : 'line';
    }

    /**
     * Get environment variable with type casting and validation.
     *
     * @param key - The environment variable key.
     * @param def - The default value if the key is not found.
     * @param min - The minimum value for numeric keys.
     * @param max - The maximum value for numeric keys.
     * @returns The value of the environment variable or the default value.
     */
    static get(key: string, def: string, min?: string, max?: string): string;
    static get(key: string, def: number, min?: number, max?: number): number;
    static get(key: string, def: boolean): boolean;
    static get(key: string, def: EnvValue, min?: EnvValue, max?: EnvValue): EnvValue {
        const raw = process.env[key];
        switch (typeof def) {
            case 'boolean': {
                if (raw === undefined) return def;
                const val = raw.toLowerCase();
                return val === 'true' || val === '1';
            }
            case 'number': {
                let rc = raw === undefined || raw === '' ? def : Number(raw);
                if (Number.isNaN(rc)) rc = def;
                if (typeof min === 'number' && rc < min) rc = min;
                if (typeof max === 'number' && rc > max) rc = max;
                return rc;
            }
            default: {
                let rc = raw ?? def;
                if (typeof min === 'string' && min && rc < min) rc = min;
                if (typeof max === 'string' && max && rc > max) rc = max;
                return rc;
            }
        }
    }

    static print(log = createLogger()) {
        const save = log.conf.level;
        log.conf.level = LogLevel.INFO;
        const { appName, appVersion, hostname, runtimeVer, nodeEnv, __dirname } = Env;
        log.info(`
-----------------
app: ${appName}, version: ${appVersion},
host: ${hostname}, node: ${runtimeVer}, pid: ${process.pid},
NODE_ENV: ${nodeEnv}, cwd: ${process.cwd()}, dirname: ${__dirname},
logLevel: ${LogLevel[save]}, isDebugging: ${isDebuggerAttached()}
-----------------`);
        log.conf.level = save;
    }
}

// Create and export singleton instance
export const env = new Env();
