import pino from 'pino';

export type Logger = pino.Logger;
export type LogLevel = pino.LevelWithSilent;

const isTestEnv = process.env.NODE_ENV === 'test' || process.env.VITEST === 'true';

export const rootLogger: Logger = pino({
  level: isTestEnv ? 'silent' : 'info',
  base: { service: 'credit-ledger' },
  timestamp: pino.stdTimeFunctions.isoTime,
});

// Children copy the level when created, so a later change is applied to each
const componentLoggers = new Set<Logger>();

/**
 * Component logger; every line carries `component` for filtering.
 */
export function getLogger(component: string): Logger {
  const logger = rootLogger.child({ component });
  componentLoggers.add(logger);
  return logger;
}

/**
 * Apply the configured level. Entry points call this once `loadConfig` has
 * validated `LOG_LEVEL`.
 */
export function setLogLevel(level: LogLevel): void {
  rootLogger.level = level;
  for (const logger of componentLoggers) {
    logger.level = level;
  }
}
