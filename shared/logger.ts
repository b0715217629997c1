import dotenv from 'dotenv';
import pino from 'pino';

dotenv.config({ path: '.env.local' });

const usePrettyOutput =
  process.env.NODE_ENV === 'development' || process.env.LOG_PRETTY === 'true';

// Pretty printing in development, JSON lines everywhere else
const baseLogger = pino({
  name: 'pricewatch',
  level: process.env.LOG_LEVEL || 'info',
  transport: usePrettyOutput
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname,name',
        },
      }
    : undefined,
});

// Helper function to safely format error messages
function formatErrorMessage(message: string, error?: unknown): string {
  if (error === undefined || error === null) {
    return message;
  }

  if (error instanceof Error) {
    return `${message} ${error.message}`;
  }

  if (typeof error === 'string') {
    return `${message} ${error}`;
  }

  return `${message} ${String(error)}`;
}

function isLogData(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Error)
  );
}

export interface Logger {
  debug: (message: string, data?: unknown) => void;
  info: (message: string, data?: unknown) => void;
  warn: (message: string, error?: unknown) => void;
  error: (message: string, error?: unknown) => void;
  fatal: (message: string, error?: unknown) => void;
}

type LogMethod = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

// Structured data goes into the log record, anything else into the message
function bindLogger(target: pino.Logger): Logger {
  const write = (level: LogMethod) => (message: string, data?: unknown) => {
    if (isLogData(data)) {
      target[level](data, message);
    } else {
      target[level](formatErrorMessage(message, data));
    }
  };

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
    fatal: write('fatal'),
  };
}

const logger = bindLogger(baseLogger);

/**
 * Logger bound to a component name, e.g. `createLogger('redirect')`
 */
function createLogger(component: string): Logger {
  return bindLogger(baseLogger.child({ component }));
}

export { createLogger, logger };
