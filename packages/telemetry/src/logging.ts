export type ShellpassLogLevel = "debug" | "info" | "warn" | "error";

export type LogSink = (level: ShellpassLogLevel, line: string) => void;

export interface ShellpassLoggerOptions {
  readonly name?: string;
  readonly level?: ShellpassLogLevel;
  readonly fields?: Record<string, unknown>;
  readonly sink?: LogSink;
  readonly now?: () => Date;
}

export interface ShellpassLogger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): ShellpassLogger;
}

const LOG_LEVEL_PRIORITY: Record<ShellpassLogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const consoleSink: LogSink = (level, line) => {
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
};

export const createShellpassLogger = (options: ShellpassLoggerOptions = {}): ShellpassLogger => {
  const name = options.name ?? "shellpass";
  const threshold = LOG_LEVEL_PRIORITY[options.level ?? "info"];
  const sink = options.sink ?? consoleSink;
  const now = options.now ?? (() => new Date());
  const baseFields = {
    service: name,
    ...options.fields,
  } satisfies Record<string, unknown>;

  const createInstance = (contextFields: Record<string, unknown>): ShellpassLogger => {
    const serialize = (levelName: ShellpassLogLevel, message: string, context?: Record<string, unknown>) => {
      if (LOG_LEVEL_PRIORITY[levelName] < threshold) {
        return;
      }

      const payload = {
        timestamp: now().toISOString(),
        level: levelName,
        message,
        ...contextFields,
        ...context,
      } satisfies Record<string, unknown>;

      sink(levelName, JSON.stringify(payload));
    };

    return {
      debug(message, context) {
        serialize("debug", message, context);
      },
      info(message, context) {
        serialize("info", message, context);
      },
      warn(message, context) {
        serialize("warn", message, context);
      },
      error(message, context) {
        serialize("error", message, context);
      },
      child(additionalFields) {
        return createInstance({ ...contextFields, ...additionalFields });
      },
    } satisfies ShellpassLogger;
  };

  return createInstance(baseFields);
};

/** Logger that drops everything; handy for tests that do not assert on log output. */
export const createSilentLogger = (): ShellpassLogger => createShellpassLogger({ sink: () => {} });
