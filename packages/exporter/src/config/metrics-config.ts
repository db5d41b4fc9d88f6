/**
 * Metrics config file loader.
 *
 * The file is a YAML mapping of metric name to definition:
 *
 *   uptime:
 *     service: DeviceInfo1
 *     action: GetInfo
 *     param: NewUpTime
 *     type: gauge
 *
 * Order is kept, so the scheduler polls metrics in file order.
 */

import { readFile } from "node:fs/promises";
import { Value } from "@sinclair/typebox/value";
import { parse } from "yaml";
import { ConfigError } from "../errors.js";
import { MetricsFile } from "./metrics-config.schemas.js";

export const DEFAULT_METRICS_CONFIG = "metrics.yml";

/** Parse metrics config text. Throws ConfigError. */
export function parseMetricsConfig(text: string, source = "metrics config"): MetricsFile {
  let doc: unknown;
  try {
    doc = parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot parse ${source}: ${reason}`, { cause: err });
  }

  if (!Value.Check(MetricsFile, doc) || Array.isArray(doc)) {
    throw new ConfigError(`${source} must be a mapping of metric names to definitions`);
  }
  return doc;
}

/** Read and parse a metrics config file. Throws ConfigError. */
export async function loadMetricsConfig(path: string): Promise<MetricsFile> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read metrics config ${path}: ${reason}`, { cause: err });
  }
  return parseMetricsConfig(text, path);
}
