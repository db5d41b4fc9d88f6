/**
 * TR-064 client: the device transport used by the sampler.
 *
 * `connect()` loads the device description once; every `call()` then POSTs
 * a SOAP request to the service's control URL. The router protects most
 * actions with HTTP Digest auth: the first 401 challenge is cached and
 * answered on every later request, and a fresh challenge (expired nonce)
 * is answered once before giving up.
 */

import type { Logger } from "pino";
import type { ActionArguments, IDeviceTransport } from "@fritzbox-exporter/shared";
import { TransportError } from "../errors.js";
import { parseDeviceDescription, type ServiceDescription } from "./description.js";
import {
  buildDigestAuthorization,
  createCnonce,
  parseDigestChallenge,
  type DigestChallenge,
  type DigestCredentials,
} from "./digest-auth.js";
import { buildEnvelope, parseActionResponse, parseFault } from "./soap.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const DEFAULT_TR064_PORT = 49000;
const DEFAULT_TIMEOUT_MS = 10_000;
const DESCRIPTION_PATH = "/tr64desc.xml";

export interface Tr064ClientOptions {
  /** IP / hostname of the router */
  address: string;
  /** TR-064 port (default: 49000) */
  port?: number;
  username?: string;
  password?: string;
  /** Per-request timeout in ms (default: 10000) */
  timeoutMs?: number;
  logger?: Logger;
  /** Client nonce source for digest auth (default: random) */
  cnonce?: () => string;
}

// ---------------------------------------------------------------------------
// Tr064Client
// ---------------------------------------------------------------------------

export class Tr064Client implements IDeviceTransport {
  readonly baseUrl: string;
  private credentials: DigestCredentials | null;
  private timeoutMs: number;
  private logger: Logger | null;
  private cnonce: () => string;

  private services: Map<string, ServiceDescription> | null = null;
  private challenge: DigestChallenge | null = null;
  private nonceCount = 0;

  constructor(options: Tr064ClientOptions) {
    this.baseUrl = `http://${options.address}:${options.port ?? DEFAULT_TR064_PORT}`;
    this.credentials =
      options.username !== undefined && options.password !== undefined
        ? { username: options.username, password: options.password }
        : null;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger ?? null;
    this.cnonce = options.cnonce ?? createCnonce;
  }

  /** Load the device description. Throws TransportError. */
  async connect(signal?: AbortSignal): Promise<void> {
    const url = `${this.baseUrl}${DESCRIPTION_PATH}`;
    const res = await this.request(url, { method: "GET" }, signal);
    if (!res.ok) {
      await discard(res);
      throw new TransportError(`Failed to load ${url}: HTTP ${res.status}`, { status: res.status });
    }

    const services = parseDeviceDescription(await res.text());
    if (services.size === 0) {
      throw new TransportError(`${url} lists no services`);
    }
    this.services = services;
    this.logger?.info({ url, services: services.size }, "loaded TR-064 device description");
  }

  /** Whether the device description has been loaded */
  get isConnected(): boolean {
    return this.services !== null;
  }

  /** Names of the services the device offers, sorted */
  get serviceNames(): string[] {
    return Array.from(this.services?.keys() ?? []).sort();
  }

  async call(service: string, action: string, signal?: AbortSignal): Promise<ActionArguments> {
    if (!this.services) await this.connect(signal);

    const description = this.services?.get(service);
    if (!description) {
      throw new TransportError(`Unknown service "${service}"`);
    }

    const url = new URL(description.controlURL, this.baseUrl);
    const body = buildEnvelope(description.serviceType, action);
    const headers: Record<string, string> = {
      "Content-Type": 'text/xml; charset="utf-8"',
      SOAPACTION: `"${description.serviceType}#${action}"`,
    };

    let res = await this.post(url, body, headers, signal);
    if (res.status === 401) {
      const challenge = parseDigestChallenge(res.headers.get("www-authenticate"));
      await discard(res);
      if (!challenge || !this.credentials) {
        throw new TransportError(`${service}#${action} requires authentication`, { status: 401 });
      }
      this.challenge = challenge;
      this.nonceCount = 0;
      res = await this.post(url, body, headers, signal);
      if (res.status === 401) {
        await discard(res);
        throw new TransportError(`${service}#${action}: authentication failed`, { status: 401 });
      }
    }

    const text = await res.text();
    if (!res.ok) {
      const fault = parseFault(text);
      throw new TransportError(
        fault
          ? `${service}#${action}: UPnP error ${fault.code} (${fault.description})`
          : `${service}#${action}: HTTP ${res.status}`,
        { status: res.status },
      );
    }
    return parseActionResponse(text, action);
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private post(
    url: URL,
    body: string,
    headers: Record<string, string>,
    signal?: AbortSignal,
  ): Promise<Response> {
    const authorization = this.authorization("POST", url.pathname);
    return this.request(
      url,
      {
        method: "POST",
        body,
        headers: authorization ? { ...headers, Authorization: authorization } : headers,
      },
      signal,
    );
  }

  /** Answer to the cached challenge, null before the first 401 */
  private authorization(method: string, uri: string): string | null {
    if (!this.challenge || !this.credentials) return null;
    this.nonceCount++;
    return buildDigestAuthorization(this.challenge, this.credentials, {
      method,
      uri,
      nonceCount: this.nonceCount,
      cnonce: this.cnonce(),
    });
  }

  private async request(url: string | URL, init: RequestInit, signal?: AbortSignal): Promise<Response> {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    try {
      return await fetch(url, { ...init, signal: signal ? AbortSignal.any([signal, timeout]) : timeout });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new TransportError(`Request to ${url.toString()} failed: ${reason}`, { cause: err });
    }
  }
}

/** Release the connection of a response whose body is not needed */
async function discard(res: Response): Promise<void> {
  await res.body?.cancel();
}
