/**
 * Schema fragments and helpers shared by tool definitions.
 */

import { z } from 'zod';
import { DEFAULT_GRAPH, type GraphSession } from '@/core';
import type { ToolContext } from '../types';

export const graphArg = z
  .string()
  .min(1)
  .optional()
  .describe(`Graph name (default: "${DEFAULT_GRAPH}")`);

export const labelArg = z.string().min(1);

export const propertiesArg = z.record(z.string(), z.unknown()).optional().describe('Arbitrary key/value data');

export const topNArg = z.number().int().positive().optional().describe('Limit to the top N results');

/**
 * Run `operation` on the named session (created on first use) under its lock.
 */
export function inSession<T>(
  ctx: ToolContext,
  graph: string | undefined,
  operation: (session: GraphSession) => T | Promise<T>
): Promise<T> {
  const session = ctx.store.getOrCreate(graph ?? DEFAULT_GRAPH);
  return session.run(async () => operation(session));
}
