/**
 * Console Logger
 * Leveled logging: readable lines in development, JSON lines in production
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: unknown, context?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const SENSITIVE_KEY_PATTERN =
  /password|token|secret|key|authorization|credential/i;

/**
 * Mask values under sensitive keys, recursing into plain objects
 */
export function maskSensitiveData(
  obj: Record<string, unknown>
): Record<string, unknown> {
  const masked: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (SENSITIVE_KEY_PATTERN.test(key)) {
      masked[key] = '[MASKED]';
    } else if (isPlainObject(value)) {
      masked[key] = maskSensitiveData(value);
    } else {
      masked[key] = value;
    }
  }
  return masked;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    value !== null &&
    typeof value === 'object' &&
    !Array.isArray(value) &&
    !(value instanceof Date)
  );
}

function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    const described: Record<string, unknown> = {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
    if (error.cause !== undefined) {
      described.cause = describeError(error.cause);
    }
    return described;
  }
  if (isPlainObject(error)) {
    return maskSensitiveData(error);
  }
  return { value: String(error) };
}

function formatLine(
  level: LogLevel,
  message: string,
  context: Record<string, unknown> | undefined,
  error: unknown,
  json: boolean
): string {
  const timestamp = new Date().toISOString();
  const maskedContext =
    context !== undefined && Object.keys(context).length > 0
      ? maskSensitiveData(context)
      : undefined;

  if (json) {
    const entry: Record<string, unknown> = { timestamp, level, message };
    if (maskedContext !== undefined) {
      entry.context = maskedContext;
    }
    if (error !== undefined) {
      entry.error = describeError(error);
    }
    return JSON.stringify(entry);
  }

  let line = `${timestamp} [${level.toUpperCase().padEnd(5)}] ${message}`;
  if (maskedContext !== undefined) {
    line += ` ${JSON.stringify(maskedContext)}`;
  }
  if (error !== undefined) {
    const described = describeError(error);
    line += `\n${typeof described.stack === 'string' ? described.stack : JSON.stringify(described)}`;
  }
  return line;
}

/**
 * Create a console logger
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const json = options.json ?? process.env.NODE_ENV === 'production';

  function enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= threshold;
  }

  return {
    debug(message, context) {
      if (enabled('debug')) {
        console.debug(formatLine('debug', message, context, undefined, json));
      }
    },
    info(message, context) {
      if (enabled('info')) {
        console.info(formatLine('info', message, context, undefined, json));
      }
    },
    warn(message, context) {
      if (enabled('warn')) {
        console.warn(formatLine('warn', message, context, undefined, json));
      }
    },
    error(message, error, context) {
      if (enabled('error')) {
        console.error(formatLine('error', message, context, error, json));
      }
    },
  };
}

/**
 * Derive a logger that adds fixed context to every entry
 */
export function createChildLogger(
  parent: Logger,
  defaultContext: Record<string, unknown>
): Logger {
  return {
    debug(message, context) {
      parent.debug(message, { ...defaultContext, ...context });
    },
    info(message, context) {
      parent.info(message, { ...defaultContext, ...context });
    },
    warn(message, context) {
      parent.warn(message, { ...defaultContext, ...context });
    },
    error(message, error, context) {
      parent.error(message, error, { ...defaultContext, ...context });
    },
  };
}
