/**
 * MCP (Model Context Protocol) HTTP endpoint
 * Streamable HTTP transport: JSON-RPC 2.0 over POST, answered as JSON or as a finite event stream.
 */

import { Readable } from 'node:stream';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import {
    type ConfigStore,
    classify,
    EMPTY_STREAM_FRAME,
    EVENT_STREAM,
    encodeEventStream,
    encodeJson,
    hasRequests,
    isMessagePayload,
    type MCPServer,
    type Negotiation,
    negotiate,
    type OriginPolicy,
    SESSION_HEADER,
    type SessionStore,
} from '../lib/mcp';
import { HttpError } from '../util/error';
import type { Logger } from '../util/logger';

declare module 'fastify' {
    interface FastifyRequest {
        // set by the onRequest hook of the /mcp routes
        negotiation: Negotiation | null;
    }
}

export interface MCPRouteDeps {
    server: MCPServer;
    sessions: SessionStore;
    config: ConfigStore;
    originPolicy: OriginPolicy;
    log: Logger;
}

const sessionHeader = (request: FastifyRequest): string | undefined => {
    const value = request.headers[SESSION_HEADER.toLowerCase()];
    return Array.isArray(value) ? value[0] : value || undefined;
};

const streamHeaders = (reply: FastifyReply) => reply.header('Content-Type', EVENT_STREAM).header('Cache-Control', 'no-cache');

/**
 * Register MCP endpoint
 *
 * POST /mcp
 * {
 *   "jsonrpc": "2.0",
 *   "id": 1,
 *   "method": "tools/list"
 * }
 *
 * Response 200:
 * {
 *   "jsonrpc": "2.0",
 *   "id": 1,
 *   "result": {
 *     "tools": [...]
 *   }
 * }
 */
export async function registerMCPRoute(app: FastifyInstance, { server, sessions, config, originPolicy, log }: MCPRouteDeps) {
    app.decorateRequest('negotiation', null);

    // Runs before the body is parsed: a bad origin is rejected even with a malformed body
    const onRequest = [
        async (request: FastifyRequest) => {
            request.negotiation = negotiate(request.headers, originPolicy, log);
            if (!request.negotiation.originAllowed) {
                throw new HttpError(403, 'Invalid origin');
            }
        },
        async (request: FastifyRequest) => {
            const start = request.url.indexOf('?');
            const query = start < 0 ? '' : request.url.slice(start + 1);
            const keys = config.mergeQuery(query);
            if (keys.length) log.debug(`Config updated: ${keys.join(', ')}`);
        },
    ];

    // POST /mcp - JSON-RPC requests, notifications and batches
    app.post('/mcp', { onRequest }, async (request, reply) => {
        const body = request.body;
        if (!isMessagePayload(body)) {
            throw new HttpError(400, 'Invalid JSON');
        }

        const classified = classify(body);
        if (!hasRequests(classified)) {
            return reply.code(202).send();
        }

        const { responses, sessionId } = await server.handleBatch(classified.requests, sessionHeader(request));
        if (sessionId) {
            reply.header(SESSION_HEADER, sessionId);
        }

        if (request.negotiation?.acceptsEventStream) {
            return streamHeaders(reply).send(Readable.from(encodeEventStream(responses)));
        }
        return reply.type('application/json').send(encodeJson(responses));
    });

    // GET /mcp - server-initiated stream, a single empty event
    app.get('/mcp', { onRequest }, async (request, reply) => {
        if (!request.negotiation?.acceptsEventStream) {
            throw new HttpError(405, 'Method Not Allowed');
        }
        return streamHeaders(reply).send(Readable.from([EMPTY_STREAM_FRAME]));
    });

    // DELETE /mcp - terminate the session named by Mcp-Session-Id
    app.delete('/mcp', { onRequest }, async (request, reply) => {
        const sessionId = sessionHeader(request);
        const removed = sessionId !== undefined && sessions.delete(sessionId);
        if (removed) log.info(`Session deleted: ${sessionId}`);
        return reply.code(removed ? 200 : 404).send();
    });
}
