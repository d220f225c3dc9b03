/**
 * MCP tool registry
 * A tool declares its wire definition, an argument schema and an invoke function that
 * reports one of three outcomes. The registry maps outcomes onto `tools/call` results.
 */

import type { z } from 'zod';
import type { Logger } from '../../util/logger';
import type { QueryConfig } from './query-config';
import { ErrorCode, McpError, type ToolDefinition, type ToolResult } from './types';

/**
 * What a tool invocation produced:
 *  - error: the call failed, reported to the client as an internal error
 *  - empty: nothing matched, reported as a plain text result
 *  - records: a numbered list rendered by the tool's `render`
 */
export type ToolOutcome<R> =
    | { kind: 'error'; message: string }
    | { kind: 'empty'; message: string }
    | { kind: 'records'; records: R[] };

export interface ToolContext {
    config: QueryConfig; // config snapshot taken when the call was dispatched
    log: Logger;
}

export interface Tool<A = unknown, R = unknown> {
    definition: ToolDefinition;
    argsSchema: z.ZodType<A, z.ZodTypeDef, unknown>;
    invoke(args: A, ctx: ToolContext): Promise<ToolOutcome<R>>;
    render(record: R): string;
}

export const textResult = (text: string): ToolResult => ({ content: [{ type: 'text', text }] });

/**
 * Number records from 1, each entry ends in a newline and entries are separated by one more.
 */
export function renderRecords<R>(records: R[], render: (record: R) => string): string {
    return records.map((record, i) => `${i + 1}. ${render(record)}`).join('\n');
}

/**
 * Convert an outcome into a `tools/call` result, raising McpError for the error outcome.
 */
export function outcomeToResult<R>(outcome: ToolOutcome<R>, render: (record: R) => string): ToolResult {
    switch (outcome.kind) {
        case 'error':
            throw new McpError(ErrorCode.INTERNAL_ERROR, outcome.message);
        case 'empty':
            return textResult(outcome.message);
        case 'records':
            return textResult(renderRecords(outcome.records, render));
        default: {
            const unreachable: never = outcome;
            throw new McpError(ErrorCode.INTERNAL_ERROR, `Unknown outcome: ${JSON.stringify(unreachable)}`);
        }
    }
}

/**
 * Reduce a zod failure to one line: "<path>: <message>" for each issue.
 * Issues on the value itself are labelled with `root`, when given.
 */
export function describeIssues(error: z.ZodError, root?: string): string {
    return error.issues
        .map((issue) => {
            const path = issue.path.length ? issue.path.join('.') : root;
            return path ? `${path}: ${issue.message}` : issue.message;
        })
        .join('; ');
}

// A registered tool with its argument and record types erased
interface Registration {
    definition: ToolDefinition;
    call(args: Record<string, unknown>, ctx: ToolContext): Promise<ToolResult>;
}

export class ToolRegistry {
    private _tools = new Map<string, Registration>();

    /**
     * Register a tool. A later registration under the same name replaces the earlier one.
     */
    register<A, R>(tool: Tool<A, R>): this {
        this._tools.set(tool.definition.name, {
            definition: tool.definition,
            call: async (args, ctx) => {
                const parsed = tool.argsSchema.safeParse(args);
                if (!parsed.success) {
                    throw new McpError(ErrorCode.INVALID_PARAMS, `Invalid params: ${describeIssues(parsed.error, 'arguments')}`);
                }
                const outcome = await tool.invoke(parsed.data, ctx);
                return outcomeToResult(outcome, (record) => tool.render(record));
            },
        });
        return this;
    }

    has(name: string): boolean {
        return this._tools.has(name);
    }

    get size(): number {
        return this._tools.size;
    }

    /** Definitions in registration order. */
    list(): ToolDefinition[] {
        return Array.from(this._tools.values(), (registration) => registration.definition);
    }

    /**
     * Validate arguments, run the tool and convert its outcome.
     * Throws McpError for an unknown tool, invalid arguments or an error outcome.
     */
    async call(name: string, args: Record<string, unknown>, ctx: ToolContext): Promise<ToolResult> {
        const registration = this._tools.get(name);
        if (!registration) {
            throw new McpError(ErrorCode.METHOD_NOT_FOUND, `Unknown tool: ${name}`);
        }
        return registration.call(args, ctx);
    }
}
