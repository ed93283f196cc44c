/**
 * MCP Tool Types
 *
 * A tool is one row of the dispatch table: a name, a description for the
 * agent, a zod input schema and a handler that receives parsed arguments.
 */

import type { z } from 'zod';
import type { AnalysisOptions, SessionStore } from '@/core';

/**
 * Dependencies every tool handler receives.
 */
export interface ToolContext {
  store: SessionStore;
  analysis: AnalysisOptions;
}

export interface ToolDefinition<T extends z.ZodObject> {
  name: string;
  description: string;
  schema: T;
  handler: (args: z.infer<T>, ctx: ToolContext) => Promise<unknown>;
}

/**
 * Tool with its argument type erased, so tools with different schemas share
 * one table. `execute` validates before calling the handler.
 */
export interface Tool {
  name: string;
  description: string;
  schema: z.ZodObject;
  execute: (args: unknown, ctx: ToolContext) => Promise<unknown>;
}

export function defineTool<T extends z.ZodObject>(definition: ToolDefinition<T>): Tool {
  const { name, description, schema, handler } = definition;
  return {
    name,
    description,
    schema,
    execute: (args, ctx) => handler(schema.parse(args), ctx)
  };
}
