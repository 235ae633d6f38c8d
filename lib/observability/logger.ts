import { env, type Env } from "../env";

export type LogLevel = NonNullable<Env["LOG_LEVEL"]>;

type LogContext = Record<string, unknown>;

type LogPayload = {
  level: LogLevel;
  message: string;
  timestamp: string;
  context: LogContext;
};

export type LoggerOptions = {
  namespace: string;
  level: LogLevel;
  context?: LogContext;
};

export type Logger = {
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, context?: LogContext) => void;
  /** Logger whose lines all carry `context`. */
  child: (context: LogContext) => Logger;
};

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const SINKS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.log(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line)
};

export function resolveLogLevel(configured: LogLevel | undefined, nodeEnv: string | undefined): LogLevel {
  if (configured) {
    return configured;
  }
  return nodeEnv === "production" ? "info" : "debug";
}

export function errorMessage(error: unknown) {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}

// JSON.stringify renders an Error as {}
function toLogValue(value: unknown) {
  if (value instanceof Error) {
    return { name: value.name, message: errorMessage(value) };
  }
  return value;
}

export function createLogger(options: LoggerOptions): Logger {
  const bound = options.context ?? {};

  const write = (level: LogLevel, message: string, context: LogContext = {}) => {
    if (LEVEL_RANK[level] < LEVEL_RANK[options.level]) {
      return;
    }

    const fields: LogContext = { ...bound };
    for (const [key, value] of Object.entries(context)) {
      fields[key] = toLogValue(value);
    }
    fields.namespace = options.namespace;

    const payload: LogPayload = {
      level,
      message,
      timestamp: new Date().toISOString(),
      context: fields
    };
    SINKS[level](JSON.stringify(payload));
  };

  return {
    debug: (message, context) => write("debug", message, context),
    info: (message, context) => write("info", message, context),
    warn: (message, context) => write("warn", message, context),
    error: (message, context) => write("error", message, context),
    child: (context) => createLogger({ ...options, context: { ...bound, ...context } })
  };
}

export const logger = createLogger({
  namespace: env.LOG_NAMESPACE,
  level: resolveLogLevel(env.LOG_LEVEL, process.env.NODE_ENV)
});
