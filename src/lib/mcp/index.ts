/**
 * MCP (Model Context Protocol) over Streamable HTTP
 *
 * A small, transport-agnostic core:
 *  - classifier: splits a POST body into requests and notifications
 *  - server: dispatches initialize, tools/list and tools/call
 *  - tools: tool registry with a three-way outcome (error, empty, records)
 *  - transport: content negotiation, origin validation and response encoding
 *  - session / query-config: the two stores the dispatcher is given
 *
 * Not implemented: resources, prompts, sampling, completions, server-initiated
 * notifications (GET opens a stream with a single empty event).
 */

export { classify, hasRequests, isMessagePayload, isRequest, toMessageList } from './classifier';
export type { ConfigValue, QueryConfig } from './query-config';
export { ConfigStore, cloneConfig, parseQueryConfig } from './query-config';
export type { BatchResult, Dispatch, MCPServerDeps } from './server';
export { MCPServer, parseDispatch } from './server';
export type { SessionData } from './session';
export { SessionStore } from './session';
export type { Tool, ToolContext, ToolOutcome } from './tools';
export { outcomeToResult, renderRecords, textResult, ToolRegistry } from './tools';
export type { Negotiation, OriginPolicy } from './transport';
export {
    acceptsEventStream,
    EMPTY_STREAM_FRAME,
    encodeEventStream,
    encodeJson,
    EVENT_STREAM,
    negotiate,
    parseAllowedOrigins,
    validateOrigin,
} from './transport';
export type { JSONRPCRequest, JSONRPCResponse, ServerInfo, ToolDefinition, ToolResult } from './types';
export { ErrorCode, MCP_PROTOCOL_VERSION, McpError, SESSION_HEADER } from './types';
