import pino from 'pino';
import type { Logger, LevelWithSilent } from 'pino';

export type { Logger } from 'pino';

export type LoggerOptions = {
  level?: LevelWithSilent;
  bindings?: Record<string, unknown>;
};

/**
 * JSON logger on stdout. Silent under Vitest or NODE_ENV=test; pipe through
 * pino-pretty for local reading.
 */
export function makeLogger(options: LoggerOptions = {}): Logger {
  const isTestTooling = process.env['VITEST'] === 'true' || process.env['NODE_ENV'] === 'test';

  return pino({
    level: options.level ?? process.env['LOG_LEVEL'] ?? 'info',
    enabled: !isTestTooling,
    base: { ...options.bindings, app: 'plstr-vaults' },
    messageKey: 'msg',
    timestamp: pino.stdTimeFunctions.isoTime
  });
}

export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}

/** bigint fields are not JSON-serialisable; log them as decimal strings. */
export function amounts(fields: Record<string, bigint>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(fields)) out[key] = value.toString();
  return out;
}
