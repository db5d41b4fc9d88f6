/**
 * HTTP Digest authentication (RFC 2617, MD5) for TR-064 requests.
 *
 * The router answers an unauthenticated request with 401 and a
 * `WWW-Authenticate: Digest ...` challenge; we answer with the matching
 * `Authorization` header.
 */

import { createHash, randomBytes } from "node:crypto";

export interface DigestChallenge {
  realm: string;
  nonce: string;
  /** Offered qop values, e.g. "auth" or "auth,auth-int" */
  qop?: string;
  opaque?: string;
  algorithm?: string;
}

export interface DigestCredentials {
  username: string;
  password: string;
}

export interface DigestRequest {
  method: string;
  /** Request path, e.g. "/upnp/control/deviceinfo" */
  uri: string;
  /** Requests made with this nonce so far, including this one */
  nonceCount: number;
  cnonce?: string;
}

/** Matches key=value and key="quoted value" pairs */
const PARAM_RE = /([a-zA-Z-]+)=(?:"([^"]*)"|([^\s,]+))/g;

function md5(data: string): string {
  return createHash("md5").update(data).digest("hex");
}

/** Parse a `WWW-Authenticate` header; null unless it is a usable Digest challenge */
export function parseDigestChallenge(header: string | null): DigestChallenge | null {
  if (!header || !/^digest\s/i.test(header)) return null;

  const params = new Map<string, string>();
  for (const match of header.slice(header.indexOf(" ") + 1).matchAll(PARAM_RE)) {
    params.set(match[1].toLowerCase(), match[2] ?? match[3]);
  }

  const realm = params.get("realm");
  const nonce = params.get("nonce");
  if (realm === undefined || nonce === undefined) return null;

  return {
    realm,
    nonce,
    qop: params.get("qop"),
    opaque: params.get("opaque"),
    algorithm: params.get("algorithm"),
  };
}

export function createCnonce(): string {
  return randomBytes(8).toString("hex");
}

/** Build the `Authorization` header value answering `challenge` */
export function buildDigestAuthorization(
  challenge: DigestChallenge,
  credentials: DigestCredentials,
  request: DigestRequest,
): string {
  const ha1 = md5(`${credentials.username}:${challenge.realm}:${credentials.password}`);
  const ha2 = md5(`${request.method}:${request.uri}`);
  const useQop = challenge.qop?.split(",").some((q) => q.trim() === "auth") ?? false;

  const parts = [
    `username="${credentials.username}"`,
    `realm="${challenge.realm}"`,
    `nonce="${challenge.nonce}"`,
    `uri="${request.uri}"`,
  ];

  if (useQop) {
    const nc = request.nonceCount.toString(16).padStart(8, "0");
    const cnonce = request.cnonce ?? createCnonce();
    const response = md5(`${ha1}:${challenge.nonce}:${nc}:${cnonce}:auth:${ha2}`);
    parts.push(`response="${response}"`, "qop=auth", `nc=${nc}`, `cnonce="${cnonce}"`);
  } else {
    parts.push(`response="${md5(`${ha1}:${challenge.nonce}:${ha2}`)}"`);
  }

  parts.push("algorithm=MD5");
  if (challenge.opaque !== undefined) {
    parts.push(`opaque="${challenge.opaque}"`);
  }
  return `Digest ${parts.join(", ")}`;
}
