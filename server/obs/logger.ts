import type { AppConfig } from '../../shared/config';

type LogLevel = AppConfig['observability']['logLevel'];
type LogMeta = Record<string, unknown>;

const levelWeights: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
  /** Returns a logger that merges `context` into every entry. */
  child: (context: LogMeta) => Logger;
}

const emit = (level: LogLevel, message: string, meta?: LogMeta) => {
  const base = {
    level,
    message,
    ts: new Date().toISOString(),
    ...meta,
  };
  const payload = JSON.stringify(base);
  /* eslint-disable no-console */
  if (level === 'error') {
    console.error(payload);
  } else if (level === 'warn') {
    console.warn(payload);
  } else {
    console.log(payload);
  }
  /* eslint-enable no-console */
};

const buildLogger = (threshold: number, context: LogMeta): Logger => {
  const shouldLog = (level: LogLevel) => levelWeights[level] >= threshold;
  const write = (level: LogLevel, message: string, meta?: LogMeta) => {
    if (level !== 'error' && !shouldLog(level)) return;
    emit(level, message, { ...context, ...meta });
  };
  return {
    debug: (message, meta) => write('debug', message, meta),
    info: (message, meta) => write('info', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    error: (message, meta) => write('error', message, meta),
    child: (extra) => buildLogger(threshold, { ...context, ...extra }),
  };
};

export const createLogger = (config: Pick<AppConfig, 'observability'>): Logger =>
  buildLogger(levelWeights[config.observability.logLevel], {});

export const createSilentLogger = (): Logger => {
  const silent: Logger = {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
    child: () => silent,
  };
  return silent;
};
