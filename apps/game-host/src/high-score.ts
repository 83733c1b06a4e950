/**
 * High score persistence: one integer per key.
 * Writes are fire-and-forget: failures are logged, never thrown.
 */
import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { Config, HighScoreTableSchema, type HighScoreTable } from '@cookie-division/shared-types';
import { log, errorFields } from '@cookie-division/logger';

export interface HighScoreStore {
  /** Stored value, or 0 when the key was never written. */
  read(key: string): number;
  write(key: string, value: number): void;
}

export class MemoryHighScoreStore implements HighScoreStore {
  private readonly values = new Map<string, number>();

  read(key: string): number {
    return this.values.get(key) ?? 0;
  }

  write(key: string, value: number): void {
    this.values.set(key, value);
  }
}

/** JSON object of integer entries on disk, replaced atomically on write. */
export class FileHighScoreStore implements HighScoreStore {
  constructor(private readonly path: string) {}

  read(key: string): number {
    return this.load()[key] ?? 0;
  }

  write(key: string, value: number): void {
    const table: HighScoreTable = { ...this.load(), [key]: Math.max(0, Math.round(value)) };
    const tmp = `${this.path}.tmp`;
    try {
      mkdirSync(dirname(this.path), { recursive: true });
      writeFileSync(tmp, JSON.stringify(table, null, 2));
      renameSync(tmp, this.path);
    } catch (err) {
      log('error', 'HighScore', 'write.failed', { path: this.path, key, ...errorFields(err) });
    }
  }

  private load(): HighScoreTable {
    if (!existsSync(this.path)) return {};
    try {
      const parsed = HighScoreTableSchema.safeParse(JSON.parse(readFileSync(this.path, 'utf8')));
      if (parsed.success) return parsed.data;
      log('warn', 'HighScore', 'file.invalid', { path: this.path, issue: parsed.error.issues[0]?.message });
    } catch (err) {
      log('warn', 'HighScore', 'file.unreadable', { path: this.path, ...errorFields(err) });
    }
    return {};
  }
}

export interface HighScoreUpdate {
  highScore: number;
  isNewHighScore: boolean;
}

/** Update-if-greater under the shared high score key. */
export function recordHighScore(store: HighScoreStore, score: number): HighScoreUpdate {
  const key = Config.storage.highScoreKey;
  const current = store.read(key);
  if (score > current) {
    store.write(key, score);
    log('info', 'HighScore', 'highscore.new', { previous: current, score });
    return { highScore: score, isNewHighScore: true };
  }
  return { highScore: current, isNewHighScore: false };
}
