/**
 * Error taxonomy for the exporter.
 *
 *  - ConfigError: fatal at startup, polling never begins
 *  - TransportError: a TR-064 request failed (network, auth, SOAP fault)
 *  - SampleError: one metric could not be read in one round; never fatal
 */

export type ExporterErrorCode = "CONFIG" | "TRANSPORT" | "SAMPLE";

export class ExporterError extends Error {
  readonly code: ExporterErrorCode;

  constructor(code: ExporterErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends ExporterError {
  constructor(message: string, options?: ErrorOptions) {
    super("CONFIG", message, options);
  }
}

export class TransportError extends ExporterError {
  /** HTTP status of the failed response, if there was one */
  readonly status: number | null;

  constructor(message: string, options?: ErrorOptions & { status?: number }) {
    super("TRANSPORT", message, options);
    this.status = options?.status ?? null;
  }
}

export class SampleError extends ExporterError {
  /** Name of the metric that failed */
  readonly metric: string;

  constructor(metric: string, message: string, options?: ErrorOptions) {
    super("SAMPLE", `${metric}: ${message}`, options);
    this.metric = metric;
  }
}
