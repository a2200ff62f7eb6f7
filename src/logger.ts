import { pino, type Logger, type LoggerOptions } from "pino";

export interface LoggerConfig {
  level?: string;
  /** Pretty printing through pino-pretty (development only) */
  pretty?: boolean;
  base?: Record<string, unknown>;
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: "info",
  pretty: false,
  base: { service: "transcript-cleaner" },
};

export function createLogger(config?: LoggerConfig): Logger {
  const merged = { ...DEFAULT_CONFIG, ...config };
  const options: LoggerOptions = {
    level: merged.level,
    base: merged.base,
  };

  if (merged.pretty) {
    options.transport = {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    };
  }

  return pino(options);
}

/** Logger that drops everything; the default for library callers and tests. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

export type { Logger };
