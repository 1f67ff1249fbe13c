import { readFile, stat } from "node:fs/promises";
import { collectAnchors } from "./anchors.js";
import { classifyTransportError, type HttpReply, type HttpRequester } from "./client.js";
import { credentialFor } from "./credentials.js";
import { errorMessage } from "./errors.js";
import { formatFromPath } from "./extract.js";
import {
  basicAuthHeader,
  HEAD_REJECTED_STATUSES,
  isRedirectStatus,
  isSuccessStatus,
  REDIRECT_STATUSES,
} from "./http.js";
import type { NormalizedOptions } from "./options.js";
import { applyQuirks } from "./quirks.js";
import { targetKey } from "./resolve.js";
import { HostGate } from "./semaphore.js";
import { backoffDelay } from "./time.js";
import type {
  CheckResult,
  FailureReason,
  RawLink,
  Target,
  TransportErrorKind,
} from "./types.js";

export interface Logger {
  log(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export interface CheckerContext {
  requester: HttpRequester;
  sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  now: () => number;
  logger: Logger;
}

/** Result of one attempt: HEAD (maybe GET) plus the redirects it followed. */
type Attempt =
  | { kind: "response"; status: number; finalUrl: string }
  | { kind: "transport"; error: TransportErrorKind; message: string }
  | { kind: "redirects"; message: string }
  | { kind: "cancelled" };

/**
 * Retry state of one web target:
 * attempting → done | backoff → attempting.
 */
type RetryState =
  | { phase: "attempting"; attempt: number }
  | { phase: "backoff"; attempt: number; delayMs: number }
  | { phase: "done"; outcome: Omit<CheckResult, "url" | "link" | "elapsedMs"> };

const MAIL_LOCAL_MAX = 64;
const MAIL_MAX = 254;
const MAIL_SYNTAX = /^[^\s@]+@[^\s@.]+(?:\.[^\s@.]+)+$/;

export class Checker {
  private readonly gate: HostGate;
  private readonly anchorCache = new Map<string, Promise<Set<string>>>();

  constructor(
    private readonly options: NormalizedOptions,
    private readonly context: CheckerContext
  ) {
    this.gate = new HostGate(options, context.now);
  }

  /** Never throws; every outcome is a CheckResult. */
  async check(target: Target, signal: AbortSignal): Promise<CheckResult> {
    const started = this.context.now();
    const url = targetKey(target);

    const outcome = signal.aborted
      ? cancelled()
      : target.kind === "web"
        ? await this.checkWeb(target.url, signal)
        : target.kind === "file"
          ? await this.checkFile(target.path, target.anchor)
          : checkMail(target.address);

    return {
      url,
      link: target.link,
      ...outcome,
      elapsedMs: Math.max(0, this.context.now() - started),
    };
  }

  private async checkWeb(
    url: string,
    signal: AbortSignal
  ): Promise<Omit<CheckResult, "url" | "link" | "elapsedMs">> {
    const { retryCount, backoff, retryStatusCodes, acceptedStatusCodes } = this.options;
    let state: RetryState = { phase: "attempting", attempt: 1 };
    for (;;) {
      switch (state.phase) {
        case "attempting": {
          const { attempt }: { attempt: number } = state;
          const last = await this.attempt(url, signal);
          const retries: number = attempt - 1;

          if (last.kind === "cancelled") {
            state = { phase: "done", outcome: { ...cancelled(), retries } };
          } else if (last.kind === "redirects") {
            state = {
              phase: "done",
              outcome: { status: "failure", reason: "too_many_redirects", error: last.message, retries },
            };
          } else if (
            last.kind === "response" &&
            (isSuccessStatus(last.status, acceptedStatusCodes) || isRedirectStatus(last.status))
          ) {
            state = {
              phase: "done",
              outcome: {
                status: "success",
                httpStatus: last.status,
                redirectedTo: last.finalUrl === url ? undefined : last.finalUrl,
                retries,
              },
            };
          } else if (last.kind === "response" && !retryStatusCodes.has(last.status)) {
            state = {
              phase: "done",
              outcome: { status: "failure", reason: "http_status", httpStatus: last.status, retries },
            };
          } else if (last.kind === "transport" && last.error === "tls") {
            state = {
              phase: "done",
              outcome: { status: "failure", reason: "tls", transportError: "tls", error: last.message, retries },
            };
          } else if (attempt >= retryCount) {
            state = { phase: "done", outcome: { ...exhausted(last), retries } };
          } else {
            state = { phase: "backoff", attempt, delayMs: backoffDelay(attempt, backoff) };
          }
          break;
        }

        case "backoff": {
          const { attempt, delayMs }: { attempt: number; delayMs: number } = state;
          try {
            await this.context.sleep(delayMs, signal);
            state = { phase: "attempting", attempt: attempt + 1 };
          } catch {
            state = { phase: "done", outcome: { ...cancelled(), retries: attempt - 1 } };
          }
          break;
        }

        case "done":
          return state.outcome;
      }
    }
  }

  /** One attempt: HEAD (or GET), repeated as GET when HEAD is refused. */
  private async attempt(url: string, signal: AbortSignal): Promise<Attempt> {
    if (this.options.method === "get") return this.follow(url, "GET", signal);

    const head = await this.follow(url, "HEAD", signal);
    if (head.kind === "response" && HEAD_REJECTED_STATUSES.has(head.status)) {
      return this.follow(url, "GET", signal);
    }
    return head;
  }

  private async follow(
    url: string,
    method: "HEAD" | "GET",
    signal: AbortSignal
  ): Promise<Attempt> {
    const origin = new URL(url).host;
    const visited = new Set<string>([url]);
    let current = url;

    for (let hop = 0; ; hop++) {
      const request = this.buildRequest(current, new URL(current).host === origin);
      const host = new URL(request.url).host;
      let reply: HttpReply;
      try {
        const release = this.gate.enabled ? await this.gate.enter(host, signal) : () => {};
        try {
          reply = await this.context.requester.request({
            ...request,
            method,
            signal: AbortSignal.any([signal, AbortSignal.timeout(this.options.timeoutMs)]),
          });
        } finally {
          release();
        }
      } catch (error) {
        if (signal.aborted) return { kind: "cancelled" };
        const { kind, message } = classifyTransportError(error);
        return { kind: "transport", error: kind, message };
      }

      if (!REDIRECT_STATUSES.has(reply.status) || !reply.location) {
        return { kind: "response", status: reply.status, finalUrl: current };
      }

      let next: string;
      try {
        next = new URL(reply.location, request.url).href;
      } catch {
        return { kind: "response", status: reply.status, finalUrl: current };
      }

      if (visited.has(next)) {
        return { kind: "redirects", message: `redirect loop at ${next}` };
      }
      if (hop + 1 > this.options.maxRedirects) {
        return {
          kind: "redirects",
          message: `more than ${this.options.maxRedirects} redirects`,
        };
      }
      visited.add(next);
      current = next;
    }
  }

  private buildRequest(
    url: string,
    sameHost: boolean
  ): { url: string; headers: Record<string, string> } {
    const headers: Record<string, string> = {
      "User-Agent": this.options.userAgent,
      Accept: "*/*",
      ...this.options.headers,
    };

    const { basicAuth } = this.options;
    if (basicAuth && sameHost) {
      headers.Authorization = basicAuthHeader(basicAuth.username, basicAuth.password);
    }

    const request = applyQuirks({ url, headers });
    const credential = credentialFor(new URL(request.url).hostname, this.options.credentials);
    if (credential) request.headers.Authorization = credential;
    return request;
  }

  private async checkFile(
    path: string,
    anchor: string | undefined
  ): Promise<Omit<CheckResult, "url" | "link" | "elapsedMs">> {
    try {
      await stat(path);
    } catch {
      return { status: "failure", reason: "not_found", error: `file not found: ${path}`, retries: 0 };
    }

    if (!this.options.checkAnchors || anchor === undefined || anchor === "") {
      return { status: "success", retries: 0 };
    }

    const format = formatFromPath(path);
    if (format !== "markdown" && format !== "html") {
      return { status: "success", retries: 0 };
    }

    let anchors: Set<string>;
    try {
      anchors = await this.anchorsOf(path, format);
    } catch (error) {
      return {
        status: "failure",
        reason: "not_found",
        error: `cannot read ${path}: ${errorMessage(error)}`,
        retries: 0,
      };
    }

    if (anchors.has(anchor) || anchors.has(anchor.toLowerCase())) {
      return { status: "success", retries: 0 };
    }
    return {
      status: "failure",
      reason: "not_found",
      error: `anchor #${anchor} not found in ${path}`,
      retries: 0,
    };
  }

  private anchorsOf(path: string, format: "markdown" | "html"): Promise<Set<string>> {
    let anchors = this.anchorCache.get(path);
    if (!anchors) {
      anchors = readFile(path, "utf8").then((content) => collectAnchors(content, format));
      this.anchorCache.set(path, anchors);
    }
    return anchors;
  }
}

export function checkMail(
  address: string
): Omit<CheckResult, "url" | "link" | "elapsedMs"> {
  const local = address.slice(0, address.lastIndexOf("@"));
  const valid =
    MAIL_SYNTAX.test(address) &&
    local.length <= MAIL_LOCAL_MAX &&
    address.length <= MAIL_MAX;

  return valid
    ? { status: "success", retries: 0 }
    : { status: "failure", reason: "invalid_mail", error: `invalid mail address: ${address}`, retries: 0 };
}

function cancelled(): { status: "failure"; reason: FailureReason; retries: number } {
  return { status: "failure", reason: "cancelled", retries: 0 };
}

function exhausted(last: Attempt): Omit<CheckResult, "url" | "link" | "elapsedMs" | "retries"> {
  switch (last.kind) {
    case "response":
      return {
        status: "failure",
        reason: "exhausted_retries",
        httpStatus: last.status,
        error: `HTTP ${last.status}`,
      };
    case "transport":
      return {
        status: "failure",
        reason: "exhausted_retries",
        transportError: last.error,
        error: last.message,
      };
    default:
      return { status: "failure", reason: "exhausted_retries" };
  }
}

/** Result for a link the run never got to check. */
export function cancelledResult(link: RawLink, url: string): CheckResult {
  return { url, link, ...cancelled(), elapsedMs: 0 };
}
