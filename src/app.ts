import { fileURLToPath } from 'node:url';
import { buildApp, startServer } from './http/server';
import { atExit, Env, logger } from './util';

// Create and configure Fastify app
export const { app, deps } = await buildApp({ log: logger.scoped('mcp') });

// Auto-start server when run directly (not imported)
if (fileURLToPath(import.meta.url) === process.argv[1]) {
    Env.print(logger);

    const ttl = Env.get('MCP_SESSION_TTL_MS', 0, 0);
    if (ttl > 0) {
        atExit(deps.sessions.startSweeper(ttl));
        logger.info(`Idle sessions expire after ${ttl} ms`);
    }
    atExit(() => app.close());

    try {
        await startServer(app, logger);
    } catch (err) {
        logger.error('Error starting server:', err);
        process.exit(1);
    }
}
