//
// Graceful termination: callbacks registered with atExit() run last-in-first-out on
// SIGTERM/SIGINT, bounded by AT_TERMINATE_TIMEOUT (ms). The first registration also
// installs handlers that log and exit on an uncaught exception or unhandled rejection.
//

export type AtExit = (sig?: NodeJS.Signals) => void | Promise<void>;
const cbs: AtExit[] = [];

function makeExitHandler(code: number, sig: NodeJS.Signals) {
    return async () => {
        console.warn(`Exiting on ${sig}...`);

        setTimeout(() => {
            console.warn(`Exiting on ${sig} timeout. Killing process.`);
            process.exit(code);
        }, Number(process.env.AT_TERMINATE_TIMEOUT) || 1000).unref();

        const waiting: Promise<void>[] = [];
        for (let cb = cbs.pop(); cb; cb = cbs.pop()) {
            try {
                const rc = cb(sig);
                if (rc instanceof Promise) waiting.push(rc);
            } catch (e) {
                console.warn(`atExit error in '${cb.name}': ${e}`);
            }
        }

        await Promise.allSettled(waiting);
        process.exit(code);
    };
}

function makeErrorHandler(reason: string) {
    return (err: unknown) => {
        console.error(reason, err instanceof Error ? (err.stack ?? err.message) : err);
        process.exit(9);
    };
}

/**
 * Register a termination callback. Returns a function that removes it again.
 */
export function atExit(cb: AtExit) {
    if (!cbs.length) {
        process.once('uncaughtException', makeErrorHandler('Unexpected Error'));
        process.once('unhandledRejection', makeErrorHandler('Unhandled Promise'));
        process.once('SIGTERM', makeExitHandler(0, 'SIGTERM'));
        process.once('SIGINT', makeExitHandler(0, 'SIGINT'));
    }

    cbs.push(cb);
    return () => {
        const n = cbs.indexOf(cb);
        if (n >= 0) cbs.splice(n, 1);
        return n >= 0;
    };
}
