import { ConfigError } from "./errors.js";
import type { StatusCodeSpec } from "./types.js";

/** Statuses after which a HEAD request is repeated as GET. */
export const HEAD_REJECTED_STATUSES: ReadonlySet<number> = new Set([405, 501]);

export const REDIRECT_STATUSES: ReadonlySet<number> = new Set([
  301, 302, 303, 307, 308,
]);

export function isSuccessStatus(
  statusCode: number,
  accepted: ReadonlySet<number>
): boolean {
  if (statusCode >= 200 && statusCode < 300) return true;
  return accepted.has(statusCode);
}

/**
 * Any 3xx. One that reaches the checker ended its chain: 300, 304, or a
 * redirect without a usable Location.
 */
export function isRedirectStatus(statusCode: number): boolean {
  return statusCode >= 300 && statusCode < 400;
}

/**
 * Expand status specs such as `[403, "500-503"]` into a set of codes.
 */
export function parseStatusCodes(
  specs: readonly StatusCodeSpec[],
  option = "acceptedStatusCodes"
): Set<number> {
  const codes = new Set<number>();

  for (const spec of specs) {
    if (typeof spec === "number") {
      codes.add(validCode(spec, option));
      continue;
    }

    const match = spec.trim().match(/^(\d{3})(?:\s*(?:-|\.\.)\s*(\d{3}))?$/);
    if (!match) {
      throw new ConfigError(`invalid status code "${spec}"`, option);
    }

    const from = validCode(Number(match[1]), option);
    const to = match[2] === undefined ? from : validCode(Number(match[2]), option);
    if (to < from) {
      throw new ConfigError(`empty status code range "${spec}"`, option);
    }
    for (let code = from; code <= to; code++) codes.add(code);
  }

  return codes;
}

function validCode(code: number, option: string): number {
  if (!Number.isInteger(code) || code < 100 || code > 999) {
    throw new ConfigError(`invalid status code ${code}`, option);
  }
  return code;
}

export function basicAuthHeader(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`).toString("base64")}`;
}
