/**
 * Structured Logger (Pino)
 *
 * All modules import { logger } from this file instead of using console.log,
 * and components that take a `logger` option default to it.
 * Logs go to stderr so command output on stdout stays clean:
 * pretty-printed in development, JSON otherwise.
 *
 * Every log entry includes:
 * - service: "shopee-cli"
 * - pid: process ID
 * - Contextual fields passed as the first argument object
 */
import pino from "pino";
import type { Logger, LoggerOptions } from "pino";
import config from "../config";

export type { Logger };

const options: LoggerOptions = {
  level: config.logLevel,
  // Base fields included in every log entry
  base: {
    service: "shopee-cli",
    pid: process.pid,
  },
};

export const logger: Logger =
  config.env === "development"
    ? pino({
        ...options,
        transport: {
          target: "pino-pretty",
          options: { colorize: true, destination: 2 },
        },
      })
    : pino(options, pino.destination(2));
