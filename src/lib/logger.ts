import pino from "pino";
import type { DestinationStream, Logger } from "pino";

export type { Logger };

export type LogLevel = "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const validLevels = new Set<string>(["debug", "info", "warn", "error", "fatal", "silent"]);

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && validLevels.has(value);
}

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const envLevel = env.LOG_LEVEL;
  if (isLogLevel(envLevel)) {
    return envLevel;
  }
  if (env.NODE_ENV === "production") return "info";
  // quiet under test runners
  if (env.NODE_ENV === "test") return "silent";
  return "debug";
}

function createPinoOptions(
  logLevel: LogLevel = resolveLogLevel(),
): pino.LoggerOptions {
  return {
    level: logLevel,
    timestamp: pino.stdTimeFunctions.isoTime,
    messageKey: "message",
    formatters: {
      level(label) {
        return { level: label };
      },
    },
  };
}

function getTransport(): pino.TransportSingleOptions | undefined {
  if (process.env.NODE_ENV === "development") {
    return {
      target: "pino-pretty",
      options: { colorize: true },
    };
  }
  return undefined;
}

const transport = getTransport();
export const logger: Logger = transport
  ? pino(createPinoOptions(), pino.transport(transport))
  : pino(createPinoOptions());

/** Child of `base` (or the shared logger) tagged with the Fitbit component. */
export function fitbitLogger(base?: Logger): Logger {
  return (base ?? logger).child({ component: "fitbit" });
}

/** Test helper: create a logger writing to a custom destination */
export function createLoggerWithDestination(
  destination: DestinationStream,
  logLevel?: LogLevel,
): Logger {
  return pino(createPinoOptions(logLevel), destination);
}
