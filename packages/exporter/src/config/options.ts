/**
 * Runtime options: CLI flags first, then environment, then defaults.
 */

import { ConfigError } from "../errors.js";
import { DEFAULT_TR064_PORT } from "../tr064/tr064-client.js";
import { DEFAULT_METRICS_CONFIG } from "./metrics-config.js";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** CRITICAL and WARNING spellings are accepted too */
const LEVEL_ALIASES: Record<string, LogLevel> = {
  critical: "fatal",
  warning: "warn",
};

/** Flags as parsed by commander (all optional strings) */
export interface CliOptions {
  address?: string;
  username?: string;
  password?: string;
  config?: string;
  port?: string;
  host?: string;
  tr064Port?: string;
  loglevel?: string;
}

export interface ExporterOptions {
  /** IP / hostname of the router */
  address: string;
  tr064Port: number;
  username?: string;
  password?: string;
  /** Path of the metrics YAML file */
  configPath: string;
  /** Port of the /metrics server */
  port: number;
  host: string;
  logLevel: LogLevel;
}

export const DEFAULT_ADDRESS = "fritz.box";
export const DEFAULT_PORT = 8000;
export const DEFAULT_HOST = "0.0.0.0";
export const DEFAULT_LOG_LEVEL: LogLevel = "warn";

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** Case-insensitive log level; undefined means the default */
export function parseLogLevel(value: string | undefined): LogLevel {
  if (value === undefined || value === "") return DEFAULT_LOG_LEVEL;
  const lower = value.toLowerCase();
  const level = LEVEL_ALIASES[lower] ?? lower;
  if (!isLogLevel(level)) {
    throw new ConfigError(`Invalid log level: ${value}`);
  }
  return level;
}

export function parsePort(value: string | undefined, fallback: number, what: string): number {
  if (value === undefined || value === "") return fallback;
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`Invalid ${what}: ${value}`);
  }
  return port;
}

/** Merge CLI flags with environment variables. Throws ConfigError. */
export function resolveOptions(
  cli: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
): ExporterOptions {
  return {
    address: cli.address || env.FRITZBOX_ADDRESS || DEFAULT_ADDRESS,
    tr064Port: parsePort(cli.tr064Port ?? env.FRITZBOX_TR064_PORT, DEFAULT_TR064_PORT, "TR-064 port"),
    username: cli.username || env.FRITZBOX_USERNAME || undefined,
    password: cli.password || env.FRITZBOX_PASSWORD || undefined,
    configPath: cli.config || env.FRITZBOX_METRICS_CONFIG || DEFAULT_METRICS_CONFIG,
    port: parsePort(cli.port ?? env.PORT, DEFAULT_PORT, "port"),
    host: cli.host || env.HOST || DEFAULT_HOST,
    logLevel: parseLogLevel(cli.loglevel ?? env.LOG_LEVEL),
  };
}
