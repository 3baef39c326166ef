import pino from 'pino';
import config from 'config';
import metrics from './metrics/index.js';

const level = config.has('logging.level') ? config.get<string>('logging.level') : 'info';
const name = config.has('app.name') ? config.get<string>('app.name') : 'roomsense';

const AVAILABLE_LOG_LEVELS = new Set(
  Object.keys(pino.levels.values).map(level => level.toLowerCase())
);
AVAILABLE_LOG_LEVELS.add('silent');

type LogContext = {
  message?: string;
};

function extractContext(args: unknown[]): LogContext {
  for (const value of args) {
    if (typeof value === 'string' && value.length > 0) {
      return { message: value };
    }
  }
  return {};
}

const logger = pino({
  name,
  level,
  hooks: {
    logMethod(inputArgs, method, logLevel) {
      const resolvedLevel = pino.levels.labels[logLevel] ?? String(logLevel);
      metrics.incrementLogLevel(resolvedLevel, extractContext(inputArgs));
      return method.apply(this, inputArgs);
    }
  }
});

export type Logger = typeof logger;
export type ComponentLogger = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

function isLevel(value: string): value is pino.LevelWithSilent {
  return AVAILABLE_LOG_LEVELS.has(value);
}

export function getLogLevel(): string {
  return logger.level;
}

export function getAvailableLogLevels(): string[] {
  return Array.from(AVAILABLE_LOG_LEVELS).sort();
}

export function setLogLevel(nextLevel: string): string {
  const normalized = nextLevel.trim().toLowerCase();
  if (!isLevel(normalized)) {
    const available = getAvailableLogLevels().join(', ');
    throw new Error(`Unknown log level "${nextLevel}" (available: ${available})`);
  }

  const previous = logger.level;
  if (previous === normalized) {
    return previous;
  }

  logger.level = normalized;
  logger.debug({ level: logger.level, previous }, 'Log level updated');
  return logger.level;
}

export default logger;
