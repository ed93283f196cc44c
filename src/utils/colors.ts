/**
 * Terminal Colors
 *
 * ANSI color codes for terminal output. Plain text is returned when
 * NO_COLOR is set or stdout is not a terminal (tests, piped logs).
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ANSI Color Codes
// ═══════════════════════════════════════════════════════════════════════════════

export const colors = {
  // Reset
  reset: '\x1b[0m',

  // Modifiers
  bright: '\x1b[1m',
  dim: '\x1b[2m',

  // Foreground colors
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',

  // Bright foreground colors
  brightRed: '\x1b[91m',
  brightGreen: '\x1b[92m',
  brightYellow: '\x1b[93m',
  brightCyan: '\x1b[96m'
} as const;

export type ColorName = keyof typeof colors;

// ═══════════════════════════════════════════════════════════════════════════════
// Color Functions
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Whether output should carry ANSI codes.
 * Read on each call so NO_COLOR can be toggled at runtime.
 */
export function colorEnabled(): boolean {
  return process.env['NO_COLOR'] === undefined && process.stdout.isTTY === true;
}

/**
 * Apply a color to text.
 */
export function colorize(text: string, color: ColorName): string {
  if (!colorEnabled()) return text;
  return `${colors[color]}${text}${colors.reset}`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Convenience Functions
// ═══════════════════════════════════════════════════════════════════════════════

export const c = {
  dim: (text: string) => colorize(text, 'dim'),
  bright: (text: string) => colorize(text, 'bright'),

  // Standard colors
  red: (text: string) => colorize(text, 'red'),
  green: (text: string) => colorize(text, 'green'),
  yellow: (text: string) => colorize(text, 'yellow'),
  cyan: (text: string) => colorize(text, 'cyan'),
  white: (text: string) => colorize(text, 'white'),

  // Bright colors
  brightRed: (text: string) => colorize(text, 'brightRed'),
  brightGreen: (text: string) => colorize(text, 'brightGreen'),
  brightYellow: (text: string) => colorize(text, 'brightYellow'),
  brightCyan: (text: string) => colorize(text, 'brightCyan'),

  // Semantic colors
  success: (text: string) => colorize(text, 'brightGreen'),
  warning: (text: string) => colorize(text, 'yellow'),
  error: (text: string) => colorize(text, 'brightRed'),
  info: (text: string) => colorize(text, 'brightCyan')
} as const;
