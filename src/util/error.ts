import { warn } from 'node:console';

/**
 * ErrorEx is the base for the project's errors: it behaves like a native Error,
 * keeps `instanceof` working for subclasses and serializes with JSON.stringify.
 *
 * Usage:
 *   class PlacesError extends ErrorEx {}   -- no constructor needed --
 *   throw new PlacesError(err);            -- wraps another error (keeps stack/code)
 *   throw new PlacesError('bad key');
 */
export class ErrorEx extends Error {
    constructor(
        err: unknown, // catch "e" is unknown
        public readonly errno?: number,
        public readonly code?: string,
    ) {
        super(
            typeof err === 'string'
                ? err
                : typeof err === 'object' && err !== null && 'message' in err
                  ? String(err.message)
                  : 'Unknown error',
        );

        try {
            if (typeof err === 'object' && err !== null) Object.assign(this, err);
            if (typeof errno === 'number') this.errno = errno;
            if (typeof code === 'string') this.code = code;
            this.name = new.target.name;
            Object.setPrototypeOf(this, new.target.prototype);
        } catch (e) {
            // stack may be read-only
            warn(new.target.name, e);
        }
    }

    /**
     * Show just the name and message in console output.
     */
    [Symbol.for('nodejs.util.inspect.custom')](): string {
        return `[${this.name}] ${this.message}`;
    }
}

/**
 * An error that maps to an HTTP status. Picked up by the Fastify error handler,
 * which reads `statusCode` the same way it does for Fastify's own errors.
 *
 *   throw new HttpError(403, 'Invalid origin');
 */
export class HttpError extends ErrorEx {
    constructor(
        public readonly statusCode: number,
        message: string,
    ) {
        super(message, statusCode);
    }
}

/** Short text for an unknown thrown value, for log lines and error messages. */
export function errorMessage(err: unknown): string {
    if (err instanceof Error) return err.message;
    return typeof err === 'string' ? err : String(err);
}
