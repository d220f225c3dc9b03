import { STATUS_CODES } from 'node:http';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import type { FastifyInstance } from 'fastify';
import { Env } from '../util/env';
import { errorMessage } from '../util/error';
import { createLogger } from '../util/logger';

const log = createLogger('http');

/**
 * Register Helmet security headers plugin
 * Sets security-related HTTP headers (CSP, HSTS, X-Frame-Options, etc.)
 */
async function registerHelmet(app: FastifyInstance) {
    await app.register(helmet, {
        contentSecurityPolicy: {
            directives: {
                defaultSrc: ["'none'"],
            },
        },
        hsts: {
            maxAge: 31536000,
            includeSubDomains: true,
        },
        frameguard: {
            action: 'deny',
        },
    });
}

/**
 * Register CORS plugin
 * CORS_ALLOWED_ORIGINS: comma-separated list of origins, or "*" for all (default)
 *
 * MCP clients in a browser need:
 * - Mcp-Session-Id exposed, to read the session id of an initialize response
 * - mcp-session-id allowed, to send it back
 */
async function registerCors(app: FastifyInstance) {
    const allowedOrigins = Env.get('CORS_ALLOWED_ORIGINS', '*');
    const origin = allowedOrigins === '*' ? true : allowedOrigins.split(',').map((o) => o.trim());

    await app.register(cors, {
        origin,
        credentials: true,
        methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
        allowedHeaders: ['Content-Type', 'Authorization', 'Accept', 'mcp-session-id'],
        exposedHeaders: ['Mcp-Session-Id'],
        maxAge: 86400,
    });
}

/**
 * Register rate limiting plugin
 * - RATE_LIMIT_WINDOW_MS: time window in milliseconds (default: 15 minutes)
 * - RATE_LIMIT_MAX_REQUESTS: maximum requests per window and client (default: 100)
 */
async function registerRateLimit(app: FastifyInstance) {
    await app.register(rateLimit, {
        max: Env.get('RATE_LIMIT_MAX_REQUESTS', 100, 1),
        timeWindow: Env.get('RATE_LIMIT_WINDOW_MS', 15 * 60 * 1000, 1),
    });
}

/**
 * Error responses are `{ error, message, statusCode }`. Server errors add the stack trace in development.
 * HttpError and Fastify's own errors carry a statusCode; anything else is a 500.
 */
function registerErrorHandler(app: FastifyInstance) {
    app.setErrorHandler((error: unknown, request, reply) => {
        const statusCode = statusOf(error);
        const message = errorMessage(error) || 'Internal Server Error';

        if (statusCode >= 500) {
            log.error(`${request.method} ${request.url} failed:`, error);
        } else {
            log.debug(`${request.method} ${request.url} -> ${statusCode} ${message}`);
        }

        const response: Record<string, unknown> = {
            error: STATUS_CODES[statusCode] ?? 'Error',
            message,
            statusCode,
        };
        if (statusCode >= 500 && Env.nodeEnv === 'development' && error instanceof Error && error.stack) {
            response.stack = error.stack;
        }

        return reply.status(statusCode).send(response);
    });
}

function statusOf(error: unknown): number {
    if (typeof error === 'object' && error !== null && 'statusCode' in error) {
        const { statusCode } = error;
        if (typeof statusCode === 'number' && statusCode >= 400 && statusCode < 600) return statusCode;
    }
    return 500;
}

/**
 * Register all security plugins:
 * 1. Helmet (security headers)
 * 2. CORS (handle cross-origin requests)
 * 3. Rate limiting (prevent abuse)
 * 4. Error handler (secure error responses)
 *
 * Body size is limited in server.ts via Fastify options.
 * Origin validation for /mcp lives with the route (see mcp.ts).
 */
export async function registerSecurityPlugins(app: FastifyInstance) {
    await Promise.all([registerHelmet(app), registerCors(app), registerRateLimit(app)]);

    // Register error handler (must be done after plugins)
    registerErrorHandler(app);
}
