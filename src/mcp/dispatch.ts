/**
 * Tool Dispatch
 *
 * Runs a tool from the table and shapes the MCP result. Operation errors
 * become structured failure payloads the agent can act on (`isError: true`);
 * anything else is an internal error.
 */

import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { GraphOperationError } from '@/core';
import { logToolCall, logToolError, logToolFailure } from '@/utils/logger';
import { toolTable } from './tools';
import type { Tool, ToolContext } from './types';

/**
 * JSON body of a failed call: message, error type, tool name and any
 * candidates or suggestions the error carries.
 */
export interface FailurePayload {
  error: string;
  type: string;
  tool: string;
  [detail: string]: unknown;
}

const graphOnly = z.object({ graph: z.string().optional() });

function textResult(value: unknown, isError = false): CallToolResult {
  const result: CallToolResult = {
    content: [{ type: 'text' as const, text: JSON.stringify(value, null, 2) }]
  };
  if (isError) result.isError = true;
  return result;
}

export function toFailurePayload(tool: string, error: GraphOperationError | z.ZodError): FailurePayload {
  if (error instanceof GraphOperationError) {
    return { error: error.message, type: error.type, tool, ...error.details() };
  }

  const issues = error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
  return { error: `Invalid arguments: ${issues.join('; ')}`, type: 'INVALID_INPUT', tool };
}

export async function runTool(tool: Tool, args: unknown, ctx: ToolContext): Promise<CallToolResult> {
  const target = graphOnly.safeParse(args);
  logToolCall(tool.name, target.success ? target.data.graph : undefined);

  try {
    return textResult(await tool.execute(args, ctx));
  } catch (error) {
    if (error instanceof GraphOperationError || error instanceof z.ZodError) {
      const payload = toFailurePayload(tool.name, error);
      logToolFailure(payload.type, payload.error);
      return textResult(payload, true);
    }

    const cause = error instanceof Error ? error : new Error(String(error));
    logToolError(tool.name, cause);
    throw new McpError(ErrorCode.InternalError, `${tool.name} failed: ${cause.message}`);
  }
}

/**
 * Dispatch by name.
 * @throws McpError(MethodNotFound) for an unknown tool
 */
export function callTool(name: string, args: unknown, ctx: ToolContext): Promise<CallToolResult> {
  const tool = toolTable.get(name);
  if (!tool) {
    return Promise.reject(new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`));
  }
  return runTool(tool, args, ctx);
}
