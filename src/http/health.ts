import type { FastifyInstance } from 'fastify';
import type { SessionStore } from '../lib/mcp';

/**
 * Register health check endpoint
 * Returns status, timestamp and the number of open MCP sessions
 */
export async function registerHealthRoute(app: FastifyInstance, sessions: SessionStore) {
    app.get('/health', async () => ({
        status: 'ok',
        timestamp: new Date().toISOString(),
        sessions: sessions.size,
    }));
}
