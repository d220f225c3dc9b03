/**
 * MCP method dispatcher
 * Answers every JSON-RPC request of a batch in input order. A failure while handling
 * one request becomes an error response for that request only.
 */

import type { Logger } from '../../util/logger';
import type { ConfigStore } from './query-config';
import type { SessionStore } from './session';
import { describeIssues, type ToolRegistry } from './tools';
import {
    ErrorCode,
    errorOf,
    type InitializeResult,
    initializeParamsSchema,
    type JSONRPCRequest,
    type JSONRPCResponse,
    type ListToolsResult,
    MCP_PROTOCOL_VERSION,
    McpError,
    resultOf,
    type ServerInfo,
    type ToolCallParams,
    toolCallParamsSchema,
} from './types';

/**
 * A request narrowed to what the dispatcher knows how to handle.
 */
export type Dispatch =
    | { kind: 'initialize'; id: JSONRPCRequest['id'] }
    | { kind: 'tools/list'; id: JSONRPCRequest['id'] }
    | { kind: 'tools/call'; id: JSONRPCRequest['id']; params: ToolCallParams }
    | { kind: 'invalid'; id: JSONRPCRequest['id']; detail: string }
    | { kind: 'unknown'; id: JSONRPCRequest['id']; method: string };

export interface MCPServerDeps {
    info: ServerInfo;
    tools: ToolRegistry;
    sessions: SessionStore;
    config: ConfigStore;
    log: Logger;
}

export interface BatchResult {
    responses: JSONRPCResponse[];
    // id of the last session created by an `initialize` in the batch
    sessionId?: string;
}

/**
 * Narrow a request by method, validating params where the method defines them.
 */
export function parseDispatch({ id, method, params }: JSONRPCRequest): Dispatch {
    switch (method) {
        case 'initialize': {
            const parsed = initializeParamsSchema.optional().safeParse(params ?? undefined);
            return parsed.success ? { kind: 'initialize', id } : { kind: 'invalid', id, detail: describeIssues(parsed.error, 'params') };
        }
        case 'tools/list':
            return { kind: 'tools/list', id };
        case 'tools/call': {
            const parsed = toolCallParamsSchema.safeParse(params);
            return parsed.success
                ? { kind: 'tools/call', id, params: parsed.data }
                : { kind: 'invalid', id, detail: describeIssues(parsed.error, 'params') };
        }
        default:
            return { kind: 'unknown', id, method };
    }
}

export class MCPServer {
    constructor(private readonly _deps: MCPServerDeps) {}

    get info(): ServerInfo {
        return this._deps.info;
    }

    /**
     * Answer the requests of one POST body. `sessionId` is the session named by the
     * client, if any: a known session is marked active, an unknown one is only logged.
     */
    async handleBatch(requests: JSONRPCRequest[], sessionId?: string): Promise<BatchResult> {
        const { sessions, log } = this._deps;
        if (sessionId && !sessions.get(sessionId)) {
            log.debug(`Unknown session: ${sessionId}`);
        }

        const result: BatchResult = { responses: [] };
        for (const request of requests) {
            result.responses.push(await this._handleRequest(request, result));
        }
        return result;
    }

    private async _handleRequest(request: JSONRPCRequest, batch: BatchResult): Promise<JSONRPCResponse> {
        const dispatch = parseDispatch(request);
        try {
            switch (dispatch.kind) {
                case 'initialize':
                    return resultOf(dispatch.id, this._initialize(batch));
                case 'tools/list':
                    return resultOf(dispatch.id, this._listTools());
                case 'tools/call':
                    return resultOf(dispatch.id, await this._callTool(dispatch.params));
                case 'invalid':
                    return errorOf(dispatch.id, ErrorCode.INVALID_PARAMS, `Invalid params: ${dispatch.detail}`);
                case 'unknown':
                    return errorOf(dispatch.id, ErrorCode.METHOD_NOT_FOUND, `Unknown method: ${dispatch.method}`);
                default: {
                    const unreachable: never = dispatch;
                    throw new McpError(ErrorCode.INTERNAL_ERROR, `Unhandled dispatch: ${JSON.stringify(unreachable)}`);
                }
            }
        } catch (err) {
            if (err instanceof McpError) {
                return errorOf(dispatch.id, err.rpcCode, err.message);
            }
            this._deps.log.error(`${request.method} failed:`, err);
            return errorOf(dispatch.id, ErrorCode.INTERNAL_ERROR, err instanceof Error ? err.message : String(err));
        }
    }

    private _initialize(batch: BatchResult): InitializeResult {
        const { sessions, config, info, log } = this._deps;
        const session = sessions.create(config.snapshot());
        batch.sessionId = session.sessionId;
        log.info(`Session created: ${session.sessionId}`);
        return {
            protocolVersion: MCP_PROTOCOL_VERSION,
            capabilities: { tools: {} },
            serverInfo: { ...info },
        };
    }

    private _listTools(): ListToolsResult {
        return { tools: this._deps.tools.list() };
    }

    private _callTool({ name, arguments: args = {} }: ToolCallParams) {
        const { tools, config, log } = this._deps;
        return tools.call(name, args, { config: config.snapshot(), log });
    }
}
