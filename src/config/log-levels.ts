import { LogLevel } from '@nestjs/common';

const LOG_LEVELS: LogLevel[] = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];

/**
 * Maps a single threshold such as `debug` to the list of levels Nest should print.
 * Unknown thresholds fall back to `log`.
 */
export function resolveLogLevels(threshold: string | undefined): LogLevel[] {
  const normalized = (threshold || 'log').toLowerCase();
  const index = LOG_LEVELS.findIndex((level) => level === normalized);
  return LOG_LEVELS.slice(0, (index === -1 ? LOG_LEVELS.indexOf('log') : index) + 1);
}
