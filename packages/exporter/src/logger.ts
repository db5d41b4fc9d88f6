import { pino, type Logger, type LoggerOptions } from "pino";
import type { LogLevel } from "./config/options.js";

const isDev = process.env.NODE_ENV !== "production";

/**
 * Process-wide logger, shared by the polling loop and Fastify.
 * Pretty-printed in development, structured JSON in production.
 */
export function createLogger(level: LogLevel): Logger {
  const options: LoggerOptions = isDev
    ? {
        level,
        transport: {
          target: "pino-pretty",
          options: { colorize: true },
        },
      }
    : { level };
  return pino(options);
}
