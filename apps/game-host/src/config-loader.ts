/**
 * Loads a GameConfig from an optional JSON file. Missing files, bad JSON
 * and invalid fields all resolve to defaults; each correction is logged.
 */
import { existsSync, readFileSync } from 'node:fs';
import type { GameConfig } from '@cookie-division/shared-types';
import { resolveGameConfig } from '@cookie-division/game-engine';
import { log, errorFields } from '@cookie-division/logger';

function readJson(path: string): unknown {
  if (!existsSync(path)) {
    log('info', 'Config', 'file.missing', { path });
    return undefined;
  }
  try {
    return JSON.parse(readFileSync(path, 'utf8'));
  } catch (err) {
    log('warn', 'Config', 'file.unreadable', { path, ...errorFields(err) });
    return undefined;
  }
}

export function loadGameConfig(path?: string, overrides: Partial<GameConfig> = {}): GameConfig {
  const fromFile = path ? readJson(path) : undefined;
  const base = typeof fromFile === 'object' && fromFile !== null && !Array.isArray(fromFile) ? fromFile : {};
  const { config, corrections } = resolveGameConfig({ ...base, ...overrides });

  for (const correction of corrections) {
    log('warn', 'Config', 'config.corrected', { path, correction });
  }
  log('debug', 'Config', 'config.loaded', { path, ...config });
  return config;
}
