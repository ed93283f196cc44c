/**
 * Terminal Color Utility Tests
 */

import { afterEach, describe, expect, test, vi } from 'vitest';
import { centerText, countColorCodes, generateBanner } from '@/utils/banner';
import { c, colorEnabled, colorize, colors } from '@/utils/colors';
import { buildStartupInfo } from '@/utils/startup';
import { configSchema } from '@/config/schema';
import { VALID_OPENAI_EMBEDDING_CONFIG } from '@tests/helpers/fixtures';

describe('colorize', () => {
  const wasTTY = process.stdout.isTTY;

  afterEach(() => {
    process.stdout.isTTY = wasTTY;
    vi.unstubAllEnvs();
  });

  test('wraps text in the color and a reset on a terminal', () => {
    vi.stubEnv('NO_COLOR', undefined);
    process.stdout.isTTY = true;

    expect(colorEnabled()).toBe(true);
    expect(colorize('ok', 'green')).toBe(`${colors.green}ok${colors.reset}`);
    expect(c.error('bad')).toBe(`${colors.brightRed}bad${colors.reset}`);
  });

  test('returns plain text when NO_COLOR is set', () => {
    vi.stubEnv('NO_COLOR', '1');
    process.stdout.isTTY = true;

    expect(colorEnabled()).toBe(false);
    expect(c.cyan('plain')).toBe('plain');
  });
});

describe('banner layout', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  test('countColorCodes measures escape sequences only', () => {
    expect(countColorCodes(`${colors.dim}hi${colors.reset}`)).toBe(8);
    expect(countColorCodes('hi')).toBe(0);
  });

  test('centerText ignores color codes when padding', () => {
    expect(centerText('ab', 6)).toBe('  ab  ');
    expect(centerText(`${colors.dim}ab${colors.reset}`, 5)).toBe(` ${colors.dim}ab${colors.reset}  `);
  });

  test('every banner line is 80 columns wide', () => {
    vi.stubEnv('NO_COLOR', '1');

    const lines = generateBanner('0.1.0').split('\n');

    expect(lines).toHaveLength(7);
    expect(lines.every((line) => line.length === 80)).toBe(true);
    expect(lines[4]).toContain('Disposable relationship graphs for agents · v0.1.0');
  });
});

describe('buildStartupInfo', () => {
  test('describes the embedding model and matching thresholds', () => {
    const config = configSchema.parse(VALID_OPENAI_EMBEDDING_CONFIG);

    expect(buildStartupInfo(config, 27)).toEqual({
      embedding: 'openai/text-embedding-3-small (1536d)',
      matching: 'similarity ≥ 0.75, ambiguity window 0.05',
      toolCount: 27
    });
  });

  test('reports disabled embeddings as null', () => {
    expect(buildStartupInfo(configSchema.parse({}), 27).embedding).toBeNull();
  });
});
