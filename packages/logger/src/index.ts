import { Axiom } from '@axiomhq/js';

const AXIOM_DATASET = process.env.AXIOM_DATASET || 'cookie-division';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogThreshold = LogLevel | 'silent';

const METHODS: Record<LogLevel, 'debug' | 'log' | 'warn' | 'error'> = {
  debug: 'debug',
  info: 'log',
  warn: 'warn',
  error: 'error',
};

const SEVERITY: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isThreshold(value: string): value is LogThreshold {
  return value in SEVERITY;
}

function currentThreshold(): LogThreshold {
  const raw = (process.env.LOG_LEVEL || 'info').toLowerCase();
  return isThreshold(raw) ? raw : 'info';
}

// Created lazily on the first log call that finds AXIOM_TOKEN set.
let axiomClient: Axiom | null = null;

function getAxiom(): Axiom | null {
  const token = process.env.AXIOM_TOKEN;
  if (!axiomClient && token) {
    axiomClient = new Axiom({
      token,
      orgId: process.env.AXIOM_ORG_ID,
      onError: (err) => {
        console.error(JSON.stringify({ level: 'error', component: 'Logger', event: 'axiom.failed', error: String(err) }));
      },
    });
  }
  return axiomClient;
}

/**
 * Structured logger.
 *
 * Outputs a single JSON object per call so every field can be indexed.
 * When AXIOM_TOKEN is set the same payload is queued for Axiom ingestion;
 * call `flushLogs()` before the process exits to deliver it.
 */
export function log(
  level: LogLevel,
  component: string,
  event: string,
  data?: Record<string, unknown>,
) {
  if (SEVERITY[level] < SEVERITY[currentThreshold()]) return;

  const payload = { timestamp: new Date().toISOString(), level, component, event, ...data };
  console[METHODS[level]](JSON.stringify(payload));

  getAxiom()?.ingest(AXIOM_DATASET, [payload]);
}

export async function flushLogs(): Promise<void> {
  if (axiomClient) {
    await axiomClient.flush();
  }
}

/** Normalizes a thrown value into loggable fields. */
export function errorFields(err: unknown): Record<string, unknown> {
  if (err instanceof Error) {
    return { error: err.message, errorName: err.name, stack: err.stack };
  }
  return { error: String(err) };
}
