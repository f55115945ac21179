import type { Logger, LoggerMeta } from './types';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/** Logger writing to `console`; records below `minLevel` are dropped. */
export function createConsoleLogger(minLevel: LogLevel = 'info'): Logger {
  const threshold = LEVEL_ORDER[minLevel];
  const emit = (level: LogLevel, message: string, meta?: LoggerMeta) => {
    if (LEVEL_ORDER[level] < threshold) return;
    const line = meta?.entity ? `[${meta.entity}] ${message}` : message;
    if (meta && Object.keys(meta).length > 0) {
      console[level](`[${level}] ${line}`, meta);
    } else {
      console[level](`[${level}] ${line}`);
    }
  };

  return {
    debug: (message, meta) => emit('debug', message, meta),
    info: (message, meta) => emit('info', message, meta),
    warn: (message, meta) => emit('warn', message, meta),
    error: (message, meta) => emit('error', message, meta),
  };
}

/** Tags every record with the entity (account, client) it concerns. */
export function withLogEntity(logger: Logger, entity: string | undefined): Logger {
  const tag = entity ?? '?';
  return {
    debug: (message, meta) => logger.debug(message, { ...meta, entity: tag }),
    info: (message, meta) => logger.info(message, { ...meta, entity: tag }),
    warn: (message, meta) => logger.warn(message, { ...meta, entity: tag }),
    error: (message, meta) => logger.error(message, { ...meta, entity: tag }),
  };
}
