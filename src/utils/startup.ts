/**
 * Startup Display
 *
 * Displays initialization steps and server info.
 */

import type { Config } from '@/config/schema';
import { c } from './colors';

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

export interface StartupInfo {
  /** "provider/model (768d)", or null when similarity matching is off */
  embedding: string | null;
  /** "similarity ≥ 0.75, ambiguity window 0.05" */
  matching: string;
  toolCount: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Configuration
// ═══════════════════════════════════════════════════════════════════════════════

/** Delay between initialization steps (ms) */
const STEP_DELAY = 50;

/** Divider line */
const DIVIDER = '━'.repeat(78);

// ═══════════════════════════════════════════════════════════════════════════════
// Utilities
// ═══════════════════════════════════════════════════════════════════════════════

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Log an initialization step with a checkmark, or a dash when skipped.
 */
function logStep(label: string, detail?: string, skipped = false): void {
  const mark = skipped ? c.yellow('–') : c.brightGreen('✓');
  const labelText = c.white(label);
  const detailText = detail ? c.dim(detail) : '';

  // Align details to column 30
  const padding = Math.max(1, 26 - label.length);
  console.log(`  ${mark} ${labelText}${' '.repeat(padding)}${detailText}`);
}

// ═══════════════════════════════════════════════════════════════════════════════
// Startup Display
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Display the complete startup sequence.
 * Note: The banner should be displayed separately before calling this.
 */
export async function displayStartup(config: Config, info: StartupInfo): Promise<void> {
  console.log(`\n  ${c.dim('Initializing...')}\n`);

  await sleep(STEP_DELAY);
  logStep('Configuration loaded');

  await sleep(STEP_DELAY);
  if (info.embedding) {
    logStep('Embedding client ready', info.embedding);
  } else {
    logStep('Embedding disabled', 'exact and normalized matching only', true);
  }

  await sleep(STEP_DELAY);
  logStep('Label matching', info.matching);

  await sleep(STEP_DELAY);
  logStep('Tools registered', String(info.toolCount));

  console.log(`\n  ${c.dim(DIVIDER)}\n`);

  const url = `http://localhost:${config.server.port}`;
  console.log(`  ${c.white('Server ready on')} ${c.brightCyan(url)}\n`);

  console.log(`  ${c.white('Endpoints:')}`);
  displayEndpoint('POST', '/mcp', 'Model Context Protocol (graph tools)');
  displayEndpoint('GET', '/health', 'Health check');

  console.log(`\n  ${c.dim(DIVIDER)}\n`);
}

/**
 * Display a single endpoint.
 */
function displayEndpoint(method: string, path: string, description: string): void {
  const methodColor = method === 'GET' ? c.brightGreen : c.brightYellow;
  const methodText = methodColor(method.padEnd(6));
  const pathText = c.cyan(path.padEnd(24));
  const descText = c.dim(description);
  console.log(`    • ${methodText} ${pathText} ${descText}`);
}

/**
 * Build startup info from config.
 */
export function buildStartupInfo(config: Config, toolCount: number): StartupInfo {
  const { embedding, matching } = config;
  return {
    embedding: embedding ? `${embedding.provider}/${embedding.model} (${embedding.dimensions}d)` : null,
    matching: `similarity ≥ ${matching.similarityThreshold}, ambiguity window ${matching.ambiguityThreshold}`,
    toolCount
  };
}
