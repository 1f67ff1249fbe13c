import { Agent, fetch } from "undici";
import { REDIRECT_STATUSES } from "./http.js";
import type { TransportErrorKind } from "./types.js";

export interface HttpRequest {
  url: string;
  method: "HEAD" | "GET";
  headers: Record<string, string>;
  signal: AbortSignal;
}

export interface HttpReply {
  status: number;
  location: string | null;
}

export interface HttpRequester {
  request(request: HttpRequest): Promise<HttpReply>;
  close?(): Promise<void>;
}

export interface TextReply {
  status: number;
  url: string;
  location: string | null;
  contentType: string | null;
  body: string;
}

/**
 * undici-backed requester. Redirects are returned, not followed, so the
 * checker can count hops and spot loops. One agent is shared by every request
 * of a run to keep connections pooled.
 */
export class UndiciRequester implements HttpRequester {
  private readonly agent: Agent;

  constructor(options: { insecureTls: boolean; timeoutMs: number }) {
    this.agent = new Agent({
      connect: { rejectUnauthorized: !options.insecureTls, timeout: options.timeoutMs },
      keepAliveTimeout: 30_000,
      keepAliveMaxTimeout: 60_000,
    });
  }

  async request({ url, method, headers, signal }: HttpRequest): Promise<HttpReply> {
    const response = await fetch(url, {
      method,
      headers,
      signal,
      redirect: "manual",
      dispatcher: this.agent,
    });
    // Only the status matters; release the connection.
    await response.body?.cancel();
    return { status: response.status, location: response.headers.get("location") };
  }

  /**
   * GET for documents given as URLs. Redirects are returned like `request`
   * does, so the loader can vet every hop.
   */
  async fetchText(
    url: string,
    headers: Record<string, string>,
    signal: AbortSignal
  ): Promise<TextReply> {
    const response = await fetch(url, {
      headers,
      signal,
      redirect: "manual",
      dispatcher: this.agent,
    });
    const location = response.headers.get("location");
    const redirected = REDIRECT_STATUSES.has(response.status) && location !== null;
    if (redirected) await response.body?.cancel();
    return {
      status: response.status,
      url: response.url || url,
      location,
      contentType: response.headers.get("content-type"),
      body: redirected ? "" : await response.text(),
    };
  }

  async close(): Promise<void> {
    await this.agent.close();
  }
}

const TLS_CODES = new Set([
  "CERT_HAS_EXPIRED",
  "CERT_NOT_YET_VALID",
  "DEPTH_ZERO_SELF_SIGNED_CERT",
  "SELF_SIGNED_CERT_IN_CHAIN",
  "UNABLE_TO_VERIFY_LEAF_SIGNATURE",
  "UNABLE_TO_GET_ISSUER_CERT_LOCALLY",
  "ERR_TLS_CERT_ALTNAME_INVALID",
]);
const DNS_CODES = new Set(["ENOTFOUND", "EAI_AGAIN", "EAI_FAIL"]);
const TIMEOUT_CODES = new Set([
  "ETIMEDOUT",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
]);
const CONNECTION_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "EPIPE",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "UND_ERR_SOCKET",
  "UND_ERR_CLOSED",
]);

/**
 * Classify a rejected request. fetch wraps socket errors in a TypeError whose
 * `cause` carries the code.
 */
export function classifyTransportError(error: unknown): {
  kind: TransportErrorKind;
  message: string;
} {
  if (error instanceof Error && error.name === "TimeoutError") {
    return { kind: "timeout", message: "request timed out" };
  }

  const code = errorCode(error) ?? errorCode(causeOf(error));
  const message = describe(error);

  if (code && TLS_CODES.has(code)) return { kind: "tls", message };
  if (code && DNS_CODES.has(code)) return { kind: "dns", message };
  if (code && TIMEOUT_CODES.has(code)) return { kind: "timeout", message };
  if (code && CONNECTION_CODES.has(code)) return { kind: "connection", message };
  if (code?.startsWith("ERR_TLS_") || code?.startsWith("ERR_SSL_")) {
    return { kind: "tls", message };
  }
  return { kind: "network", message };
}

function causeOf(error: unknown): unknown {
  if (typeof error === "object" && error !== null && "cause" in error) {
    return error.cause;
  }
  return undefined;
}

function errorCode(error: unknown): string | undefined {
  if (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    typeof error.code === "string"
  ) {
    return error.code;
  }
  return undefined;
}

function describe(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  const cause = causeOf(error);
  if (cause instanceof Error && cause.message && cause.message !== message) {
    return `${message}: ${cause.message}`;
  }
  return message;
}
