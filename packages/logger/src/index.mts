import { pino } from "pino";

import type { DestinationStream, Logger as PinoLogger, LoggerOptions } from "pino";

export type LoggerLevels =
  | "info"
  | "trace"
  | "debug"
  | "warn"
  | "error"
  | "fatal";
export type LoggerLevelSetting = LoggerLevels | "silent";
export type LoggerMessage = string | Error;
export type LoggerMeta = Record<string, unknown>;

export type BaseLogger = Record<
  LoggerLevels,
  (message: LoggerMessage, meta?: LoggerMeta) => void
>;

export type Logger = BaseLogger & {
  logMessage: (
    level: LoggerLevels,
    message: LoggerMessage,
    meta?: LoggerMeta,
  ) => void;
  child: (bindings: LoggerMeta) => Logger;
};

export interface LoggerFactoryOptions {
  /** Emitted as `name` on every line */
  name?: string;
  /** Defaults to {@link resolveLogLevel} */
  level?: LoggerLevelSetting;
  /** Fields attached to every line */
  bindings?: LoggerMeta;
  /** Where lines are written; stdout when omitted */
  destination?: DestinationStream;
}

const levelSettings: readonly LoggerLevelSetting[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

export const isLoggerLevel = (value: unknown): value is LoggerLevelSetting =>
  levelSettings.some((level) => level === value);

/**
 * Reads the log level from `LOG_LEVEL`, falling back when it is unset or not
 * a pino level.
 */
export const resolveLogLevel = (
  env: NodeJS.ProcessEnv = process.env,
  fallback: LoggerLevelSetting = "info",
): LoggerLevelSetting => {
  const raw = env.LOG_LEVEL?.trim().toLowerCase();
  return isLoggerLevel(raw) ? raw : fallback;
};

const wrap = (pinoLogger: PinoLogger): Logger => ({
  logMessage(level, message, meta) {
    if (message instanceof Error) {
      pinoLogger[level]({ ...meta, err: message }, message.message);
      return;
    }
    pinoLogger[level](meta ?? {}, message);
  },
  child(bindings) {
    return wrap(pinoLogger.child(bindings));
  },
  trace: function (message, meta?) {
    this.logMessage("trace", message, meta);
  },
  debug: function (message, meta?) {
    this.logMessage("debug", message, meta);
  },
  info: function (message, meta?) {
    this.logMessage("info", message, meta);
  },
  warn: function (message, meta?) {
    this.logMessage("warn", message, meta);
  },
  error: function (message, meta?) {
    this.logMessage("error", message, meta);
  },
  fatal: function (message, meta?) {
    this.logMessage("fatal", message, meta);
  },
});

/**
 * Creates a JSON line logger. `logger` is the level-method facade the rest of
 * the workspace depends on; `pinoLogger` is the underlying instance.
 */
export const loggerFactory = (options: LoggerFactoryOptions = {}) => {
  const pinoOptions: LoggerOptions = {
    name: options.name,
    level: options.level ?? resolveLogLevel(),
    base: options.bindings ?? {},
  };
  const pinoLogger = options.destination
    ? pino(pinoOptions, options.destination)
    : pino(pinoOptions);

  return { logger: wrap(pinoLogger), pinoLogger };
};

export default loggerFactory;
