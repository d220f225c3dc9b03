// !!! DO NOT IMPORT env HERE: env.ts depends on this module !!!

import inspector from 'node:inspector';
import path from 'node:path';
import { format, styleText } from 'node:util';

/**
 * Logger is a drop-in replacement for the console:
 * - batched async output to stdout/stderr (see SpeedStd)
 * - RFC5424 levels: nothing below the configured level is formatted
 * - JSON output with context, or colored line output for humans
 * - scoped child loggers ("app.mcp", "app.places")
 *
 * Environment:
 * LOG_LEVEL     minimum level, a number 0-7 or a name ("INFO", "debug", "warn"). Default INFO.
 * LOG_NAME      logger scope. Default: the process id.
 * LOG_FORMAT    "json" or "line". Default json, or line when a debugger is attached.
 * LOG_ADD_TIME  "true" to add a timestamp. Default false.
 * APP_NAME      app name included in JSON entries.
 */

export enum LogLevel {
    EMERGENCY = 0,
    ALERT = 1,
    CRITICAL = 2,
    ERROR = 3,
    WARNING = 4,
    NOTICE = 5,
    INFO = 6,
    DEBUG = 7,
}

type Color = Parameters<typeof styleText>[0];
export type LogFn = (...params: unknown[]) => void;
export type Formatter = (this: LoggerConf, lvl: LogLevel, fn: LogFn, color: Color, ...params: unknown[]) => void;
export interface Transport {
    log: LogFn;
    error: LogFn;
}

export interface LoggerOptions {
    scope?: string;
    level?: LogLevel | string;
    addTime?: boolean;
    formatter?: Formatter | 'json' | 'line';
    app?: string;
}

const registrar = new Map<string, Logger>();

export class LoggerConf {
    level: LogLevel;
    readonly scope: string;
    readonly addTime: boolean;
    readonly formatter: Formatter;
    readonly app: string;

    constructor({
        scope = LoggerConf._defScope(),
        level = process.env.LOG_LEVEL ?? LogLevel.INFO,
        addTime = (process.env.LOG_ADD_TIME ?? 'false').toLowerCase() === 'true',
        formatter = (process.env.LOG_FORMAT ?? (isDebuggerAttached() ? 'line' : 'json')).toLowerCase() === 'json'
            ? 'json'
            : 'line',
        app = process.env.APP_NAME ?? path.basename(process.execPath),
    }: LoggerOptions = {}) {
        this.scope = scope;
        this.level = LoggerConf.normalizeLevel(level);
        this.addTime = addTime;
        this.formatter = formatter === 'json' ? jsonFn : formatter === 'line' ? lineFn : formatter;
        this.app = app;
    }

    private static _defScope() {
        const name = process.env.LOG_NAME ?? process.env.LOGNAME;
        return name || String(process.pid);
    }

    /** Accepts 0-7, a LogLevel name, or an alias used by other logging libraries. */
    static normalizeLevel(level: LogLevel | number | string): LogLevel {
        if (typeof level === 'number') {
            return level >= LogLevel.EMERGENCY && level <= LogLevel.DEBUG ? level : LogLevel.INFO;
        }
        const name = (LoggerConf.ALIASES[level.toLowerCase()] ?? level).toUpperCase();
        const asNumber = Number(name);
        if (Number.isInteger(asNumber) && asNumber >= LogLevel.EMERGENCY && asNumber <= LogLevel.DEBUG) {
            return asNumber;
        }
        const found = Object.entries(LogLevel).find(([key]) => key === name);
        return found && typeof found[1] === 'number' ? found[1] : LogLevel.INFO;
    }

    static readonly ALIASES: Record<string, string> = {
        warn: 'WARNING',
        informational: 'INFO',
        log: 'INFO',
        verbose: 'DEBUG',
        silly: 'DEBUG',
        trace: 'DEBUG',
    };
}

export interface Logger extends Transport {
    readonly warn: LogFn;
    readonly info: LogFn;
    readonly debug: LogFn;
    readonly trace: LogFn;
    readonly notice: LogFn;
    readonly warning: LogFn;
    readonly alert: LogFn;
    readonly crit: LogFn;
    readonly critical: LogFn;
    readonly emerg: LogFn;
    readonly assert: (condition?: boolean, ...data: unknown[]) => void;
    readonly conf: LoggerConf;
    level: LogLevel;
    scoped(name: string, level?: LogLevel): Logger;
}

let _attached: boolean | undefined;
export function isDebuggerAttached() {
    return (_attached ??= typeof process.debugPort === 'number' && process.debugPort !== 0 && typeof inspector.url() === 'string');
}

function jsonFn(this: LoggerConf, lvl: LogLevel, fn: LogFn, _color: Color, ...params: unknown[]) {
    if (lvl <= this.level) {
        fn({
            message: format(...params),
            ctx: this.scope,
            level: LogLevel[lvl],
            type: lvl <= LogLevel.ERROR ? 'err' : 'out',
            // biome-ignore lint/style/useNamingConvention: common log format
            process_id: process.pid,
            // biome-ignore lint/style/useNamingConvention: common log format
            app_name: this.app,
            ...(this.addTime && { timestamp: new Date().toISOString() }),
        });
    }
}

function lineFn(this: LoggerConf, lvl: LogLevel, fn: LogFn, color: Color, ...params: unknown[]) {
    if (lvl <= this.level) {
        const time = this.addTime ? `${new Date().toISOString()} ` : '';
        const scope = this.scope ? `[${this.scope}] ` : '';
        fn(styleText(color, `${time}${scope}${format(...params)}`));
    }
}

class AssertError extends Error {
    override name = 'AssertError';
}

/**
 * Creates (or returns the registered) logger for a scope.
 * A second call with the same scope updates the level and returns the same instance.
 * @param scope logger name (defaults to LOG_NAME or process info)
 * @param level minimum level (defaults to LOG_LEVEL)
 * @param base output transport (defaults to a batched stdout/stderr writer)
 */
export function createLogger(scope?: string, level?: LogLevel | string, base?: Transport, options: LoggerOptions = {}): Logger {
    const conf = new LoggerConf({ ...options, scope: scope ?? options.scope, level: level ?? options.level });
    const existing = registrar.get(conf.scope);
    if (existing) {
        existing.level = conf.level;
        return existing;
    }

    // the plain console is easier to follow in a debugger than the batched writer
    const out: Transport = base ?? (isDebuggerAttached() ? console : new SpeedStd());
    if (typeof out.log !== 'function' || typeof out.error !== 'function') {
        throw new TypeError('Base logger must have log and error methods');
    }
    const bind = (lvl: LogLevel, fn: LogFn, color: Color): LogFn => conf.formatter.bind(conf, lvl, fn, color);

    const created: Logger = {
        log: bind(LogLevel.INFO, out.log, 'blue'),
        error: bind(LogLevel.ERROR, out.error, 'red'),
        warn: bind(LogLevel.WARNING, out.log, 'yellow'),
        info: bind(LogLevel.INFO, out.log, 'blue'),
        debug: bind(LogLevel.DEBUG, out.log, 'grey'),
        trace: bind(LogLevel.DEBUG, out.log, 'grey'),
        emerg: bind(LogLevel.EMERGENCY, out.error, 'red'),
        alert: bind(LogLevel.ALERT, out.error, 'red'),
        crit: bind(LogLevel.CRITICAL, out.error, 'red'),
        critical: bind(LogLevel.CRITICAL, out.error, 'red'),
        warning: bind(LogLevel.WARNING, out.log, 'yellow'),
        notice: bind(LogLevel.NOTICE, out.log, 'blue'),
        assert(condition?: boolean, ...data: unknown[]) {
            if (!condition) throw new AssertError(data.length > 0 ? format(...data) : 'Assertion failed');
        },
        conf,
        get level() {
            return conf.level;
        },
        set level(lv: LogLevel) {
            conf.level = LoggerConf.normalizeLevel(lv);
        },
        scoped(sub: string, lvl?: LogLevel) {
            return createLogger(`${conf.scope}.${sub}`, lvl, out);
        },
    };

    registrar.set(conf.scope, created);
    return created;
}

/**
 * SpeedStd batches log lines and writes them on a short timer, in the manner of pino's
 * async destination. Consecutive entries for the same stream are joined into one write.
 */
export class SpeedStd implements Transport {
    protected groups: { err: boolean; lines: unknown[] }[] = [];
    protected timer: NodeJS.Timeout | undefined;
    readonly log: LogFn = (entry) => this._push(false, entry);
    readonly error: LogFn = (entry) => this._push(true, entry);

    constructor(
        protected stdout: NodeJS.WritableStream = process.stdout,
        protected stderr: NodeJS.WritableStream = process.stderr,
        protected interval = 50,
        protected flushMax = 100,
    ) {}

    private _push(err: boolean, entry: unknown): void {
        const last = this.groups.at(-1);
        if (last && last.err === err) {
            last.lines.push(entry);
        } else {
            this.groups.push({ err, lines: [entry] });
        }
        this.timer ??= setInterval(() => this.flush(), this.interval);
        if (this.groups.length >= this.flushMax) {
            this.flush();
        }
    }

    flush() {
        if (!this.groups.length) {
            clearInterval(this.timer);
            this.timer = undefined;
            return;
        }
        for (let group = this.groups.shift(); group; group = this.groups.shift()) {
            const stream = group.err ? this.stderr : this.stdout;
            const text = group.lines.map((v) => (typeof v === 'string' ? v : JSON.stringify(v))).join('\n');
            stream.write(`${text}\n`);
        }
    }
}

// Global logger, flushed on exit
export const logger = (() => {
    const speedy = new SpeedStd();
    process.on('exit', () => speedy.flush());
    return createLogger(undefined, undefined, speedy);
})();

const consoleHooks = ['debug', 'trace', 'log', 'info', 'warn', 'error'] as const;
const saved: Partial<Record<(typeof consoleHooks)[number], LogFn>> = {};
let hooked = false;

/**
 * Routes the global console through a logger. Hooks only once per process;
 * the returned function restores the original console methods.
 */
export function hookConsole(target: Logger = logger) {
    if (!hooked) {
        for (const key of consoleHooks) {
            saved[key] = console[key];
            console[key] = target[key];
        }
        hooked = true;
    }
    return function unhook() {
        if (hooked) {
            for (const key of consoleHooks) {
                const fn = saved[key];
                if (fn) console[key] = fn;
            }
            hooked = false;
        }
    };
}
