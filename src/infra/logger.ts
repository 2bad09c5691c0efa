/**
 * Structured logger — thin pino wrapper with file output support.
 *
 * Log format: JSON with human-readable `level` (label) and `time` (ISO 8601),
 * or single human-readable lines when `logFormat` is "line".
 */
import pino from "pino";
import type { TransportSingleOptions, TransportMultiOptions } from "pino";
import path from "node:path";

export type LogFormat = "json" | "line";

// Bootstrap phase: read log level from env before config is available.
// Replaced when reinitLogger() is called with loaded settings.
const level = process.env["MANIFEST_HUB_LOG_LEVEL"] ?? "info";

/** Days of rotated files pino-roll keeps next to the active log. */
const LOG_RETENTION_FILES = 30;

/**
 * Shared pino options.
 *
 * NOTE: pino disallows `formatters.level` with multi-target transports,
 * so the label formatter is only applied for single-target mode.
 */
function createLoggerOptions(
  logLevel: string,
  transport: TransportSingleOptions | TransportMultiOptions,
  isMultiTarget: boolean,
): pino.LoggerOptions {
  const opts: pino.LoggerOptions = {
    level: logLevel,
    transport,
    base: undefined, // no pid/hostname
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (!isMultiTarget) {
    opts.formatters = {
      level(label) {
        return { level: label };
      },
    };
  }

  return opts;
}

/**
 * Resolve transports for the given destination and options.
 * File logging is always enabled. Console output is optional.
 */
export function resolveTransports(
  logFile: string,
  logConsoleEnabled: boolean,
  logFormat: LogFormat,
  nodeEnv?: string,
): { transport: TransportSingleOptions | TransportMultiOptions; isMultiTarget: boolean } {
  const transports: TransportSingleOptions[] = [];

  if (logConsoleEnabled) {
    if (nodeEnv === "production") {
      transports.push({ target: "pino/file", options: { destination: 1 } });
    } else {
      transports.push({ target: "pino-pretty", options: { colorize: true } });
    }
  }

  if (logFormat === "line") {
    transports.push({
      target: "pino-pretty",
      options: {
        colorize: false,
        singleLine: true,
        destination: logFile,
        mkdir: true,
      },
    });
  } else {
    transports.push({
      target: "pino-roll",
      options: {
        file: logFile,
        frequency: "daily",
        size: "10m",
        mkdir: true,
        limit: { count: LOG_RETENTION_FILES },
      },
    });
  }

  const [only] = transports;
  if (transports.length === 1 && only) {
    return { transport: only, isMultiTarget: false };
  }

  return {
    transport: { targets: transports },
    isMultiTarget: true,
  };
}

function buildLogger(
  logLevel: string,
  logFile: string,
  logConsoleEnabled: boolean,
  logFormat: LogFormat,
  nodeEnv?: string,
): pino.Logger {
  // No transport worker when nothing would be written.
  if (logLevel === "silent") {
    return pino({ level: "silent" });
  }
  const { transport, isMultiTarget } = resolveTransports(
    logFile,
    logConsoleEnabled,
    logFormat,
    nodeEnv,
  );
  return pino(createLoggerOptions(logLevel, transport, isMultiTarget));
}

/** Log file location under a data directory. */
export function logFilePath(dataDir: string): string {
  return path.join(dataDir, "logs", "manifest-hub.log");
}

function initRootLogger(): pino.Logger {
  const dataDir = process.env["MANIFEST_HUB_DATA_DIR"] || "data";
  return buildLogger(
    level,
    logFilePath(dataDir),
    process.env["MANIFEST_HUB_LOG_CONSOLE_ENABLED"] === "true",
    "json",
    process.env["NODE_ENV"],
  );
}

const rootLogger = initRootLogger();

/** Get a child logger with a module name. */
export function getLogger(name: string): pino.Logger {
  return rootLogger.child({ module: name });
}

export interface LoggerSettings {
  logLevel: string;
  dataDir: string;
  logConsoleEnabled: boolean;
  logFormat: LogFormat;
  nodeEnv: string;
}

/**
 * Reinitialize the root logger from loaded settings.
 * Child loggers created earlier share the root's stream and pick it up.
 */
export function reinitLogger(settings: LoggerSettings): void {
  const newLogger = buildLogger(
    settings.logLevel,
    logFilePath(settings.dataDir),
    settings.logConsoleEnabled,
    settings.logFormat,
    settings.nodeEnv,
  );
  Object.assign(rootLogger, newLogger);
  rootLogger.level = settings.logLevel;
}

export { rootLogger };
