/**
 * Leveled logger. Everything goes to stderr: stdout carries the MCP transport
 * in server mode and the report in CLI mode.
 *
 * VAULT_DEDUP_LOG_LEVEL picks the minimum level (default `info`); DEBUG=1 is
 * shorthand for `debug`.
 */
const LEVELS = ['debug', 'info', 'warn', 'error'] as const;
type Level = typeof LEVELS[number];

function isLevel(value: string | undefined): value is Level {
  return LEVELS.some(l => l === value);
}

function threshold(): Level {
  const configured = process.env.VAULT_DEDUP_LOG_LEVEL?.toLowerCase();
  if (isLevel(configured)) return configured;
  return process.env.DEBUG ? 'debug' : 'info';
}

function emit(level: Level, args: unknown[]): void {
  if (LEVELS.indexOf(level) < LEVELS.indexOf(threshold())) return;
  console.error(`[${level.toUpperCase()}]`, ...args);
}

export const logger = {
  info: (...args: unknown[]) => emit('info', args),
  warn: (...args: unknown[]) => emit('warn', args),
  error: (...args: unknown[]) => emit('error', args),
  debug: (...args: unknown[]) => emit('debug', args),
};
