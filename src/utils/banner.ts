/**
 * Banner
 *
 * Boxed startup banner: project name, tagline and version.
 */

import { c, type ColorName, colorize } from './colors';

// ═══════════════════════════════════════════════════════════════════════════════
// Banner Configuration
// ═══════════════════════════════════════════════════════════════════════════════

const TITLE = 's c r a t c h g r a p h';

const TAGLINE = 'Disposable relationship graphs for agents';

/** Box drawing characters */
const BOX = {
  topLeft: '╔',
  topRight: '╗',
  bottomLeft: '╚',
  bottomRight: '╝',
  horizontal: '═',
  vertical: '║'
} as const;

/** Border color (white) */
const BORDER_COLOR: ColorName = 'white';

/** Banner dimensions */
const BANNER_WIDTH = 80;
const CONTENT_WIDTH = BANNER_WIDTH - 4; // Account for borders and padding

// ═══════════════════════════════════════════════════════════════════════════════
// Layout
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Count ANSI color code characters in a string.
 * Used to calculate actual visible width.
 */
export function countColorCodes(text: string): number {
  // Match ANSI escape sequences: ESC [ ... m
  // Using String.fromCharCode(27) to avoid literal escape character in regex
  const escapeChar = String.fromCharCode(27);
  const ansiRegex = new RegExp(`${escapeChar}\\[[0-9;]*m`, 'g');
  const matches = text.match(ansiRegex);
  return matches ? matches.reduce((sum, m) => sum + m.length, 0) : 0;
}

/**
 * Center text within a given width.
 */
export function centerText(text: string, width: number): string {
  const visibleLength = text.length - countColorCodes(text);
  const padding = Math.max(0, width - visibleLength);
  const leftPad = Math.floor(padding / 2);
  const rightPad = padding - leftPad;
  return ' '.repeat(leftPad) + text + ' '.repeat(rightPad);
}

/**
 * Create a bordered line with content.
 */
function borderedLine(content: string): string {
  const border = colorize(BOX.vertical, BORDER_COLOR);
  return `${border} ${content} ${border}`;
}

/**
 * Create a horizontal border line.
 */
function horizontalBorder(left: string, right: string): string {
  const line = BOX.horizontal.repeat(BANNER_WIDTH - 2);
  return colorize(`${left}${line}${right}`, BORDER_COLOR);
}

// ═══════════════════════════════════════════════════════════════════════════════
// Banner Generation
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Generate the complete banner with box border.
 */
export function generateBanner(version: string): string {
  const empty = borderedLine(' '.repeat(CONTENT_WIDTH));
  const title = c.brightCyan(TITLE);
  const tagline = c.dim(`${TAGLINE} · v${version}`);

  return [
    horizontalBorder(BOX.topLeft, BOX.topRight),
    empty,
    borderedLine(centerText(title, CONTENT_WIDTH)),
    empty,
    borderedLine(centerText(tagline, CONTENT_WIDTH)),
    empty,
    horizontalBorder(BOX.bottomLeft, BOX.bottomRight)
  ].join('\n');
}

/**
 * Display the banner to the console.
 */
export function displayBanner(version: string): void {
  console.log(generateBanner(version));
}
