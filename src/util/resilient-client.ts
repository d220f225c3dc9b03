/**
 * @file A resilient fetch client with retry logic, timeout and abort.
 * The client adds default headers and a bearer token, if provided.
 *
 * - Exponential backoff with jitter between tries
 * - One timeout for the whole call, retries included (0 = none)
 * - Non-2xx responses reject with an ErrorEx carrying the HTTP status as errno
 */

import { ErrorEx } from './error';
import { isDebuggerAttached } from './logger';
import { sleep } from './sleep';

export type ResponseReader = 'json' | 'text';

export class ClientOptions {
    readonly maxTries: number = 5; // max number of failures before giving up
    readonly baseDelay: number = 100; // initial delay between retries
    readonly maxDelay: number = 10000; // max delay between retries
    readonly timeout: number = isDebuggerAttached() ? 0 : 60000; // 0 = no timeout in debug mode
    readonly afterFn: ResponseReader = 'json'; // how the response body is read
    readonly defaultHeaders: Record<string, string> = {};
    readonly bearerToken?: string; // when set adds an Authorization: Bearer <token> header
    readonly userAgent?: string; // when set adds a User-Agent header

    constructor(opts?: Readonly<Partial<ClientOptions>>) {
        if (opts) {
            Object.assign(this, opts);
        }
        this.defaultHeaders = {
            'Accept-Encoding': 'gzip, deflate, br',
            Accept: this.afterFn === 'text' ? 'text/plain, text/html' : 'application/json',
            ...(this.userAgent ? { 'User-Agent': this.userAgent } : {}),
            ...this.defaultHeaders,
        };
    }
}

/**
 * A promise with backoff state, a timer and an abort signal.
 * Composition rather than a Promise subclass.
 */
export class PromiseRetry<T> implements PromiseLike<T> {
    private readonly _created = Date.now();
    private _timer: NodeJS.Timeout | undefined;
    private _failures = 0;
    private _lastReason = '';
    private readonly _ctl = new AbortController();

    // withResolvers pattern in composition
    resolve!: (value: T | PromiseLike<T>) => void;
    reject!: (reason?: unknown) => void;
    readonly promise: Promise<T>;

    constructor(
        private readonly _opts: ClientOptions,
        extSignal?: AbortSignal,
    ) {
        if (extSignal?.aborted) {
            this._ctl.abort(extSignal.reason ?? 'Aborted');
        } else {
            extSignal?.addEventListener('abort', () => this.abort(String(extSignal.reason ?? 'Aborted')), { once: true });
        }

        this.promise = new Promise<T>((resolve, reject) => {
            this.resolve = (value) => {
                this.clearTimeout();
                if (this.signal.aborted) {
                    reject(new ErrorEx(String(this.signal.reason)));
                } else {
                    resolve(value);
                }
            };
            this.reject = (reason) => {
                this.clearTimeout();
                reject(reason);
            };
        });

        if (this._opts.timeout) {
            this._timer = setTimeout(() => {
                this._timer = undefined;
                this.abort('Timeout');
            }, this._opts.timeout);
        }
    }

    markFailure(reason = ''): number {
        this._lastReason = reason;
        return ++this._failures;
    }

    // delay before the next try
    nextDelay(): number {
        const exponentialDelay = Math.min(this._opts.baseDelay * 2 ** this._failures, this._opts.maxDelay);
        const jitter = Math.random() * 0.1 * exponentialDelay;
        return exponentialDelay + jitter;
    }

    clearTimeout() {
        if (this._timer) {
            clearTimeout(this._timer);
            this._timer = undefined;
        }
    }

    abort(reason = 'Aborted') {
        this._lastReason = reason;
        this._ctl.abort(reason);
        this.clearTimeout();
    }

    get state() {
        return {
            failures: this._failures,
            created: this._created,
            aborted: this._ctl.signal.aborted,
            reason: this._ctl.signal.aborted ? String(this._ctl.signal.reason) : this._lastReason,
        };
    }

    get failed(): boolean {
        const { timeout, maxTries } = this._opts;
        return this._failures >= maxTries || (timeout > 0 && Date.now() > this._created + timeout) || this.signal.aborted;
    }

    get signal(): AbortSignal {
        return this._ctl.signal;
    }

    // biome-ignore lint/suspicious/noThenProperty: composition
    then<TResult1 = T, TResult2 = never>(
        onfulfilled?: ((value: T) => TResult1 | PromiseLike<TResult1>) | undefined | null,
        onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | undefined | null,
    ): Promise<TResult1 | TResult2> {
        return this.promise.then(onfulfilled, onrejected);
    }

    catch<TResult = never>(onrejected?: ((reason: unknown) => TResult | PromiseLike<TResult>) | undefined | null): Promise<T | TResult> {
        return this.promise.catch(onrejected);
    }

    finally(onfinally?: (() => void) | undefined | null): Promise<T> {
        return this.promise.finally(onfinally);
    }
}

/**
 * A resilient fetch client with retry logic, timeout and abort.
 */
export class ResilientClient {
    private readonly _opt: ClientOptions;

    /**
     * @param baseURL - The base URL for the service.
     * @param options - Configuration for the client.
     */
    constructor(
        private readonly _baseURL: string,
        options?: Readonly<Partial<ClientOptions>>,
    ) {
        this._opt = new ClientOptions(options);
    }

    /**
     * Makes a request to an endpoint with retry logic.
     * The body is read as configured by `afterFn`; the caller validates its shape.
     * Fetch is aborted when reaching the timeout.
     */
    fetch(input: string, init: RequestInit = {}): PromiseRetry<unknown> {
        const uri = new URL(input, this._baseURL).href;
        const retry = new PromiseRetry<unknown>(this._opt, init.signal ?? undefined);

        const headers = new Headers(this._opt.defaultHeaders);
        new Headers(init.headers).forEach((value, key) => headers.set(key, value));
        if (init.body && !headers.has('Content-Type') && this._opt.afterFn === 'json') {
            headers.set('Content-Type', 'application/json');
        }
        if (this._opt.bearerToken && !headers.has('Authorization')) {
            headers.set('Authorization', `Bearer ${this._opt.bearerToken}`);
        }

        this._run(uri, { ...init, headers, signal: retry.signal }, retry).catch((e) => retry.reject(new ErrorEx(e)));
        return retry;
    }

    private async _run(uri: string, init: RequestInit, retry: PromiseRetry<unknown>): Promise<void> {
        let err: ErrorEx | undefined;
        try {
            do {
                if (err) await sleep(retry.nextDelay());
                try {
                    const res = await fetch(uri, init);
                    if (!res.ok) {
                        throw new ErrorEx(`HTTP ${res.status}: ${res.statusText}`, res.status, res.statusText);
                    }
                    const data: unknown = this._opt.afterFn === 'text' ? await res.text() : await res.json();
                    if (retry.signal.aborted) {
                        throw new ErrorEx(String(retry.signal.reason));
                    }
                    retry.resolve(data);
                    return;
                } catch (e) {
                    err = e instanceof ErrorEx ? e : retry.signal.aborted ? new ErrorEx(String(retry.signal.reason)) : new ErrorEx(e);
                    retry.markFailure(err.message);
                }
            } while (!retry.failed);
            retry.reject(err);
        } finally {
            retry.clearTimeout();
        }
    }
}
