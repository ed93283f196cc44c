/**
 * Logger
 *
 * Semantic logging for graph tool calls:
 * - TOOL: one line per call, with the target graph
 * - Action lines beneath it for what changed or was substituted
 *
 * Design principles:
 * - Action-oriented verbs (Added, Removed, Resolved)
 * - Clear visual hierarchy with minimal nesting
 * - Show what matters, hide implementation details
 */

import type { ResolvedLabel } from '@/core/operations/types';
import { c } from './colors';

// ═══════════════════════════════════════════════════════════════════════════════
// Formatting Utilities
// ═══════════════════════════════════════════════════════════════════════════════

/** Format current time as [HH:MM:SS] */
export function formatTime(now: Date = new Date()): string {
  const hours = String(now.getHours()).padStart(2, '0');
  const minutes = String(now.getMinutes()).padStart(2, '0');
  const seconds = String(now.getSeconds()).padStart(2, '0');
  return `[${hours}:${minutes}:${seconds}]`;
}

/** Truncate text to max length with ellipsis */
export function truncate(text: string, maxLength: number): string {
  // Normalize whitespace (collapse newlines and multiple spaces)
  const normalized = text.replace(/\s+/g, ' ').trim();
  if (normalized.length <= maxLength) return normalized;
  return `${normalized.slice(0, maxLength - 3)}...`;
}

/** "1 node", "3 edges" */
export function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

/** Indent string for continuation lines (matches timestamp width) */
const INDENT = '           '; // 11 chars to align with [HH:MM:SS] + space

// ═══════════════════════════════════════════════════════════════════════════════
// Tool Calls
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Log the start of a tool call.
 */
export function logToolCall(tool: string, graph?: string): void {
  const time = c.dim(formatTime());
  const target = graph ? ` ${c.dim(`@${graph}`)}` : '';
  console.log(`${time} ${c.cyan('TOOL')} ${c.white(tool)}${target}`);
}

/**
 * Log nodes and edges a call created.
 */
export function logAdded(nodes: number, edges: number): void {
  if (nodes === 0 && edges === 0) return;
  const parts: string[] = [];
  if (nodes > 0) parts.push(plural(nodes, 'node'));
  if (edges > 0) parts.push(plural(edges, 'edge'));
  console.log(`${INDENT}${c.brightGreen('+ Added')} ${parts.join(', ')}`);
}

/**
 * Log something a call deleted.
 */
export function logRemoved(description: string): void {
  console.log(`${INDENT}${c.brightRed('- Removed')} ${description}`);
}

/**
 * Log labels that resolved to a different canonical label.
 */
export function logResolved(resolved: ResolvedLabel[]): void {
  for (const { query, label, tier, similarity } of resolved) {
    const score = tier === 'embedding' ? ` ${similarity.toFixed(2)}` : '';
    console.log(
      `${INDENT}${c.yellow('~ Resolved')} "${truncate(query, 40)}" → ${c.white(label)} ${c.dim(`(${tier}${score})`)}`
    );
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Failures
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Log an operation failure reported back to the agent.
 */
export function logToolFailure(type: string, message: string): void {
  console.log(`${INDENT}${c.brightRed(`✗ ${type}`)} ${c.dim(truncate(message, 80))}`);
}

/**
 * Log an unexpected error raised while running a tool.
 */
export function logToolError(tool: string, error: Error): void {
  console.error(`${INDENT}${c.error(`✗ ${tool} failed:`)} ${error.message}`);
}

/**
 * Log an embedding call that failed; matching falls back to literal tiers.
 */
export function logEmbeddingWarning(error: Error, text: string): void {
  console.warn(
    `${INDENT}${c.warning('⚠ Embedding failed')} for "${truncate(text, 40)}": ${c.dim(error.message)}`
  );
}
