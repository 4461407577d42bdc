import { type Logger, pino } from 'pino';

export type { Logger };

export const logger: Logger = pino({
  name: 'aa-savings',
  level: (process.env.LOG_LEVEL ?? 'info').trim().toLowerCase() || 'info',
});

/** Accepts pino level names in any case; throws on unknown levels. */
export function setLogLevel(level: string, target: Logger = logger): void {
  const normalized = level.trim().toLowerCase();
  if (normalized !== 'silent' && !(normalized in target.levels.values)) {
    throw new Error(
      `Invalid log level "${level}". Expected one of: ${Object.keys(target.levels.values).join(', ')}, silent`
    );
  }
  target.level = normalized;
}
