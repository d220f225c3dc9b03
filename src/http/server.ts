import Fastify, { type FastifyInstance } from 'fastify';
import { createToolRegistry, type ToolDeps } from '../controller/tools';
import { ConfigStore, MCPServer, type OriginPolicy, parseAllowedOrigins, SessionStore, type ToolRegistry } from '../lib/mcp';
import { Env } from '../util/env';
import { HttpError } from '../util/error';
import { createLogger, type Logger } from '../util/logger';
import { fromHumanBytes } from '../util/text';
import { registerHealthRoute } from './health';
import { type MCPRouteDeps, registerMCPRoute } from './mcp';
import { registerSecurityPlugins } from './security';

export const SERVER_INFO = {
    name: 'Singapore Restaurant Locator',
    version: '1.0.0',
};

/**
 * Create and configure Fastify server instance
 */
export function createServer() {
    const app = Fastify({
        logger: false, // logging goes through util/logger
        bodyLimit: fromHumanBytes(Env.get('MAX_BODY_SIZE', '10mb')),
    });

    // Every body is JSON-RPC, whatever Content-Type the client sent
    app.removeAllContentTypeParsers();
    app.addContentTypeParser('*', { parseAs: 'string' }, (_req, body, done) => {
        try {
            const text = typeof body === 'string' ? body : body.toString();
            done(null, JSON.parse(text));
        } catch {
            done(new HttpError(400, 'Invalid JSON'), undefined);
        }
    });

    return app;
}

export interface AppDeps extends MCPRouteDeps {
    tools: ToolRegistry;
}

export interface AppOptions extends ToolDeps {
    tools?: ToolRegistry;
    sessions?: SessionStore;
    config?: ConfigStore;
    originPolicy?: OriginPolicy;
    log?: Logger;
}

/**
 * Wire the stores, the tool registry and the dispatcher. Anything not given is created
 * from the environment.
 */
export function createDeps(opts: AppOptions = {}): AppDeps {
    const log = opts.log ?? createLogger('mcp');
    const tools = opts.tools ?? createToolRegistry(opts);
    const sessions = opts.sessions ?? new SessionStore();
    const config = opts.config ?? new ConfigStore();
    const originPolicy = opts.originPolicy ?? { allowedOrigins: parseAllowedOrigins(Env.get('MCP_ALLOWED_ORIGINS', '')) };
    const server = new MCPServer({ info: SERVER_INFO, tools, sessions, config, log });
    return { server, tools, sessions, config, originPolicy, log };
}

/**
 * Register all routes and plugins
 */
export async function registerRoutes(app: FastifyInstance, deps: AppDeps) {
    // Register security plugins FIRST (order matters!)
    await registerSecurityPlugins(app);

    await registerHealthRoute(app, deps.sessions);
    await registerMCPRoute(app, deps);
}

/**
 * A ready to use app: server, plugins, routes and their dependencies.
 */
export async function buildApp(opts: AppOptions = {}) {
    const app = createServer();
    const deps = createDeps(opts);
    await registerRoutes(app, deps);
    return { app, deps };
}

/**
 * Start HTTP server
 */
export async function startServer(app: FastifyInstance, log: Logger, port = Env.port, host = Env.host) {
    await app.listen({ port, host });
    log.info(`Server listening on http://${host}:${port}`);
    log.info(`MCP endpoint: http://${host}:${port}/mcp`);
}
