import { type Logger as PinoLogger, pino } from "pino";

export type LogFields = Record<string, unknown>;

type LogMethod = (fields: LogFields | string, message?: string) => void;

export interface Logger {
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  debug: LogMethod;
  child: (bindings: { name?: string }) => Logger;
}

const baseLogger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  timestamp: pino.stdTimeFunctions.isoTime,
});

function createPinoLogger(resolvedName?: string): PinoLogger {
  return resolvedName ? baseLogger.child({ name: resolvedName }) : baseLogger;
}

function wrapLogger(pinoLogger: PinoLogger, resolvedName?: string): Logger {
  const method =
    (level: "info" | "warn" | "error" | "debug"): LogMethod =>
    (fields, message) => {
      if (typeof fields === "string") {
        pinoLogger[level](fields);
      } else {
        pinoLogger[level](fields, message);
      }
    };

  return {
    info: method("info"),
    warn: method("warn"),
    error: method("error"),
    debug: method("debug"),
    child: (bindings) => {
      const childName = bindings.name
        ? resolvedName
          ? `${resolvedName}:${bindings.name}`
          : bindings.name
        : resolvedName;
      return wrapLogger(pinoLogger.child(childName ? { name: childName } : {}), childName);
    },
  };
}

/**
 * Named logger backed by the shared pino instance.
 * Nested children join their names with a colon (`orchestrator:logs`).
 */
export function createLogger(name?: string | { name?: string }): Logger {
  const resolvedName = typeof name === "string" ? name : name?.name;
  return wrapLogger(createPinoLogger(resolvedName), resolvedName);
}
