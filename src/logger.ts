/**
 * Logging for sessions, the pump and the reaper.
 *
 * Every line is `<timestamp> [<prefix>:<level>] [courier:<area>] message`,
 * so two peers in one process can be told apart by prefix. SessionFactory
 * defaults to silentLogger; startCourier builds a winston logger from the
 * configured logLevel.
 */

import winston from "winston";
import type { CourierLogger } from "./types.js";

export type CourierLogLevel = "debug" | "info" | "warn" | "error";

export interface CourierLoggerOptions {
  /** Prefix for all log lines. Default: "courier". */
  prefix?: string;
  /** Minimum log level. Default: "info". */
  level?: CourierLogLevel;
}

export function createCourierLogger(opts?: CourierLoggerOptions): CourierLogger {
  const prefix = opts?.prefix ?? "courier";
  const minLevel = opts?.level ?? "info";

  const winstonLogger = winston.createLogger({
    level: minLevel,
    format: winston.format.combine(
      winston.format.timestamp({ format: "YYYY-MM-DDTHH:mm:ss.SSSZ" }),
      winston.format.printf(({ timestamp, level, message }) =>
        `${String(timestamp)} [${prefix}:${level}] ${String(message)}`
      ),
    ),
    transports: [
      new winston.transports.Console({ forceConsole: true }),
    ],
  });

  return {
    info: (msg: string) => winstonLogger.info(msg),
    warn: (msg: string) => winstonLogger.warn(msg),
    error: (msg: string) => winstonLogger.error(msg),
    debug: (msg: string) => winstonLogger.debug(msg),
  };
}

/** Logger that drops everything. Used when the host supplies none. */
export const silentLogger: CourierLogger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};
