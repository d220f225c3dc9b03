/**
 * MCP (Model Context Protocol) types and validation schemas
 * Schemas are the source of truth where a shape arrives from the wire;
 * types for what the server emits are declared directly.
 */

import { z } from 'zod';
import { ErrorEx } from '../../util/error';

// Constants
export const JSONRPC_VERSION = '2.0';
export const MCP_PROTOCOL_VERSION = '2025-03-26';
export const SESSION_HEADER = 'Mcp-Session-Id';

// Error codes
export enum ErrorCode {
    PARSE_ERROR = -32700,
    INVALID_REQUEST = -32600,
    METHOD_NOT_FOUND = -32601,
    INVALID_PARAMS = -32602,
    INTERNAL_ERROR = -32603,
}

// JSON-RPC base types
// echoed back as received: JSON-RPC asks for a string, number or null, but any value still gets its response
export type RequestId = unknown;

export interface JSONRPCRequest {
    jsonrpc?: string;
    id: RequestId;
    method: string;
    params?: unknown;
}

export interface JSONRPCErrorObject {
    code: ErrorCode;
    message: string;
    data?: unknown;
}

export interface JSONRPCResult<R = unknown> {
    jsonrpc: typeof JSONRPC_VERSION;
    id: RequestId;
    result: R;
}

export interface JSONRPCError {
    jsonrpc: typeof JSONRPC_VERSION;
    id: RequestId;
    error: JSONRPCErrorObject;
}

export type JSONRPCResponse = JSONRPCResult | JSONRPCError;

export const resultOf = <R>(id: RequestId, result: R): JSONRPCResult<R> => ({ jsonrpc: JSONRPC_VERSION, id, result });

export const errorOf = (id: RequestId, code: ErrorCode, message: string): JSONRPCError => ({
    jsonrpc: JSONRPC_VERSION,
    id,
    error: { code, message },
});

// Validation schemas for MCP request params
export const serverInfoSchema = z.object({
    name: z.string(),
    version: z.string(),
});

export type ServerInfo = z.infer<typeof serverInfoSchema>;

// every field is optional: initialize never fails for a missing handshake detail
export const initializeParamsSchema = z
    .object({
        protocolVersion: z.string().optional(),
        capabilities: z.record(z.unknown()).optional(),
        clientInfo: serverInfoSchema.partial().passthrough().optional(),
    })
    .passthrough();

export const toolCallParamsSchema = z
    .object({
        name: z.string(),
        arguments: z.record(z.unknown()).optional(),
    })
    .passthrough();

export type ToolCallParams = z.infer<typeof toolCallParamsSchema>;

// Result shapes
export interface InitializeResult {
    protocolVersion: string;
    capabilities: { tools: Record<string, never> };
    serverInfo: ServerInfo;
}

export interface ToolDefinition {
    name: string;
    description: string;
    inputSchema: {
        type: 'object';
        properties: Record<string, { type: string; description?: string }>;
        required?: string[];
    };
}

export interface TextContent {
    type: 'text';
    text: string;
}

export interface ToolResult {
    content: TextContent[];
}

export interface ListToolsResult {
    tools: ToolDefinition[];
}

/**
 * McpError - error raised inside the protocol layer with a JSON-RPC code.
 * The dispatcher turns it into an error response for the request being handled.
 *
 *   throw new McpError(ErrorCode.INVALID_PARAMS, 'Invalid params: name is required');
 */
export class McpError extends ErrorEx {
    constructor(
        public readonly rpcCode: ErrorCode,
        message: string,
    ) {
        super(message, rpcCode);
    }
}
