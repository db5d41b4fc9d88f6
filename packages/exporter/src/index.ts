#!/usr/bin/env node
/**
 * CLI entry point: poll the router and serve its values for Prometheus.
 */

import { Command } from "commander";
import { resolveOptions, type CliOptions, type ExporterOptions } from "./config/options.js";
import { createExporter } from "./exporter.js";
import { createLogger } from "./logger.js";

/** Option errors are reported before a logger exists */
function resolveOrExit(cliOptions: CliOptions): ExporterOptions {
  try {
    return resolveOptions(cliOptions);
  } catch (err) {
    console.error(err instanceof Error ? err.message : err);
    process.exit(1);
  }
}

const program = new Command();

program
  .name("fritzbox-exporter")
  .description("Export FRITZ!Box TR-064 values as Prometheus metrics")
  .version("0.1.0")
  .option("--address <address>", "IP / hostname of the device to monitor")
  .option("--username <username>", "Username to log into the device")
  .option("--password <password>", "Password to log into the device")
  .option("--config <path>", "Path to a custom metrics config file")
  .option("--port <port>", "Port to serve /metrics on")
  .option("--host <host>", "Host to bind to")
  .option("--tr064-port <port>", "TR-064 port of the device")
  .option("--loglevel <level>", "Log level [CRITICAL, ERROR, WARNING, INFO, DEBUG]")
  .action(async (cliOptions: CliOptions) => {
    const options = resolveOrExit(cliOptions);
    const logger = createLogger(options.logLevel);

    try {
      const { app } = await createExporter(options, { logger });

      // Handle shutdown signals
      const shutdown = (signal: NodeJS.Signals) => {
        logger.info({ signal }, "shutting down");
        app.close().then(
          () => process.exit(0),
          (err: unknown) => {
            logger.error({ err }, "error during shutdown");
            process.exit(1);
          },
        );
      };
      process.once("SIGINT", shutdown);
      process.once("SIGTERM", shutdown);

      await app.listen({ port: options.port, host: options.host });
      logger.info(`Exporter listening on ${options.host}:${options.port}`);
    } catch (err) {
      logger.fatal({ err }, "failed to start exporter");
      process.exit(1);
    }
  });

await program.parseAsync();
