import pino from 'pino';

// Read leniently: an unknown level falls back to info instead of failing the import
function resolveLevel(): string {
  const level = process.env.LOG_LEVEL;
  return level && pino.levels.values[level] !== undefined ? level : 'info';
}

function buildOptions(): pino.LoggerOptions {
  const level = resolveLevel();
  if (process.env.NODE_ENV !== 'development') {
    return { level, base: { name: 'update-filters' } };
  }

  return {
    level,
    base: { name: 'update-filters' },
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    },
  };
}

const baseLogger = pino(buildOptions());

export function createLogger(context: Record<string, unknown> = {}): pino.Logger {
  return baseLogger.child(context);
}

export const logger = createLogger();
