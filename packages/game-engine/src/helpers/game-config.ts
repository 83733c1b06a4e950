/**
 * Game configuration resolution.
 *
 * Turns arbitrary input (a parsed JSON file, an override object, nothing at
 * all) into a GameConfig that satisfies every invariant the engines rely on.
 * Bad input is corrected to a safe value and reported, never thrown: a
 * session must not fail mid-game because of configuration.
 */
import { Config, DEFAULT_GAME_CONFIG, GameConfigSchema, type GameConfig } from '@cookie-division/shared-types';
import { quotientRange } from './quotient-range';

export interface ResolvedGameConfig {
  config: GameConfig;
  corrections: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isConfigKey(key: PropertyKey): key is keyof GameConfig {
  return typeof key === 'string' && key in DEFAULT_GAME_CONFIG;
}

function feasibleDivisors(divisors: readonly number[], config: GameConfig): number[] {
  const unique = [...new Set(divisors)];
  return unique.filter((d) =>
    d >= 1 && d <= config.maxMonsters && quotientRange(d, config.minDividend, config.maxDividend) !== null,
  );
}

export function resolveGameConfig(raw?: unknown): ResolvedGameConfig {
  const corrections: string[] = [];

  let input: Record<string, unknown> = {};
  if (isRecord(raw)) {
    input = raw;
  } else if (raw !== undefined && raw !== null) {
    corrections.push('config: expected an object; using defaults');
  }

  for (const key of Object.keys(input)) {
    if (!isConfigKey(key)) corrections.push(`${key}: unknown option ignored`);
  }

  const merged: Record<string, unknown> = { ...DEFAULT_GAME_CONFIG, ...input };
  let parsed = GameConfigSchema.safeParse(merged);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      const field = issue.path[0];
      if (field !== undefined && isConfigKey(field)) {
        merged[field] = DEFAULT_GAME_CONFIG[field];
        corrections.push(`${field}: ${issue.message}; using default`);
      }
    }
    parsed = GameConfigSchema.safeParse(merged);
  }
  if (!parsed.success) {
    return { config: { ...DEFAULT_GAME_CONFIG }, corrections: [...corrections, 'config: unrecoverable; using defaults'] };
  }

  const config: GameConfig = { ...parsed.data, allowedDivisors: [...parsed.data.allowedDivisors] };
  const { limits } = Config;

  if (config.testModeTimeLimit < limits.minTestModeTimeLimit) {
    corrections.push(`testModeTimeLimit: raised to ${limits.minTestModeTimeLimit}`);
    config.testModeTimeLimit = limits.minTestModeTimeLimit;
  }
  if (config.testModeLives < limits.minTestModeLives) {
    corrections.push(`testModeLives: raised to ${limits.minTestModeLives}`);
    config.testModeLives = limits.minTestModeLives;
  }
  if (config.minDividend < limits.minDividendFloor) {
    corrections.push(`minDividend: raised to ${limits.minDividendFloor}`);
    config.minDividend = limits.minDividendFloor;
  }
  if (config.maxDividend < config.minDividend) {
    corrections.push(`maxDividend: below minDividend, raised to ${config.minDividend}`);
    config.maxDividend = config.minDividend;
  }

  const divisors = feasibleDivisors(config.allowedDivisors, config);
  if (divisors.length !== config.allowedDivisors.length) {
    const dropped = config.allowedDivisors.filter((d) => !divisors.includes(d));
    if (dropped.length > 0) corrections.push(`allowedDivisors: dropped unusable ${dropped.join(', ')}`);
  }

  if (divisors.length > 0) {
    config.allowedDivisors = divisors;
  } else {
    const fallback = feasibleDivisors(DEFAULT_GAME_CONFIG.allowedDivisors, config);
    if (fallback.length > 0) {
      corrections.push('allowedDivisors: none usable; using defaults');
      config.allowedDivisors = fallback;
    } else {
      corrections.push('allowedDivisors: none usable with this dividend range; restoring default range and divisors');
      config.minDividend = DEFAULT_GAME_CONFIG.minDividend;
      config.maxDividend = DEFAULT_GAME_CONFIG.maxDividend;
      config.maxMonsters = Math.max(config.maxMonsters, DEFAULT_GAME_CONFIG.maxMonsters);
      config.allowedDivisors = [...DEFAULT_GAME_CONFIG.allowedDivisors];
    }
  }

  return { config, corrections };
}
