/**
 * Config Loader
 *
 * Loads config/scratchgraph.json with {env:VAR} resolution.
 * Supports SCRATCHGRAPH_CONFIG env var to override config path.
 * A missing default config file is not an error: every section has defaults
 * and similarity matching is simply disabled.
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { type Config, configSchema } from './schema';

const DEFAULT_CONFIG_PATH = 'config/scratchgraph.json';

/**
 * Resolve {env:VAR} patterns in text.
 * Returns empty string if env var is not set.
 */
export function resolveEnvVars(text: string): string {
  return text.replace(/\{env:([A-Z_][A-Z0-9_]*)\}/g, (_, varName: string) => {
    return process.env[varName] ?? '';
  });
}

/**
 * Parse and validate raw config text.
 * Returns the validated config or the list of human-readable issues.
 */
export function parseConfig(
  text: string
): { success: true; config: Config } | { success: false; issues: string[] } {
  let data: unknown;
  try {
    data = JSON.parse(resolveEnvVars(text));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return { success: false, issues: [`Invalid JSON: ${reason}`] };
  }

  const result = configSchema.safeParse(data);
  if (!result.success) {
    return {
      success: false,
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    };
  }

  return { success: true, config: result.data };
}

/**
 * Load and validate config from file.
 */
function loadConfig(configPath: string, required: boolean): Config {
  let text: string;
  try {
    text = readFileSync(configPath, 'utf-8');
  } catch (err) {
    const code = err instanceof Error && 'code' in err ? err.code : undefined;
    if (code === 'ENOENT') {
      if (required) {
        console.error(`Config file not found: ${configPath}`);
        process.exit(1);
      }
      text = '{}';
    } else {
      throw err;
    }
  }

  const parsed = parseConfig(text);
  if (!parsed.success) {
    console.error(`Invalid config: ${configPath}`);
    for (const issue of parsed.issues) {
      console.error(`  ${issue}`);
    }
    process.exit(1);
  }

  return parsed.config;
}

// Lazy load and cache
let cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (!cachedConfig) {
    const override = process.env['SCRATCHGRAPH_CONFIG'];
    const configPath = override ?? resolve(process.cwd(), DEFAULT_CONFIG_PATH);
    cachedConfig = loadConfig(configPath, override !== undefined);
  }
  return cachedConfig;
}
