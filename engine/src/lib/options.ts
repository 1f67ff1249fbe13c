import { buildCredentialTable } from "./credentials.js";
import { ConfigError } from "./errors.js";
import { parseStatusCodes } from "./http.js";
import type {
  BasicAuth,
  CheckOptions,
  HostCredential,
  TargetScheme,
} from "./types.js";

export const VERSION = "0.1.0";

export const DEFAULT_USER_AGENT = `linkprobe/${VERSION}`;

const ALL_SCHEMES: TargetScheme[] = ["http", "https", "mailto", "file"];

type Defaulted = Omit<
  CheckOptions,
  "basicAuth" | "githubToken" | "rootDir" | "schemes"
>;

export const DEFAULT_OPTIONS: Required<Defaulted> = {
  maxConcurrency: 16,
  maxConcurrencyPerHost: 0,
  hostDelayMs: 0,
  hostJitterMs: 0,
  timeoutMs: 20000,
  globalTimeoutMs: 0,
  retryCount: 3,
  backoffBaseMs: 1000,
  backoffMultiplier: 2,
  backoffMaxMs: 30000,
  retryStatusCodes: [429, 502, 503, 504],
  acceptedStatusCodes: [],
  include: [],
  exclude: [],
  skipPrivate: false,
  excludePrivateIps: false,
  excludeLinkLocal: false,
  excludeLoopback: false,
  excludeMail: false,
  userAgent: DEFAULT_USER_AGENT,
  headers: {},
  hostCredentials: [],
  insecureTls: false,
  checkAnchors: false,
  method: "head",
  maxRedirects: 5,
  dedupe: true,
  countSkippedAsChecked: false,
};

/** Options with defaults applied and patterns compiled. */
export interface NormalizedOptions {
  maxConcurrency: number;
  maxConcurrencyPerHost: number;
  hostDelayMs: number;
  hostJitterMs: number;
  timeoutMs: number;
  globalTimeoutMs: number;
  retryCount: number;
  backoff: { baseMs: number; multiplier: number; maxMs: number };
  retryStatusCodes: ReadonlySet<number>;
  acceptedStatusCodes: ReadonlySet<number>;
  include: RegExp[];
  exclude: RegExp[];
  excludePrivateIps: boolean;
  excludeLinkLocal: boolean;
  excludeLoopback: boolean;
  excludeMail: boolean;
  schemes: ReadonlySet<TargetScheme>;
  userAgent: string;
  basicAuth?: BasicAuth;
  headers: Record<string, string>;
  credentials: HostCredential[];
  insecureTls: boolean;
  checkAnchors: boolean;
  method: "head" | "get";
  maxRedirects: number;
  rootDir?: string;
  dedupe: boolean;
  countSkippedAsChecked: boolean;
}

/**
 * Apply defaults and validate. Throws {@link ConfigError} on anything that
 * would make the run meaningless, before any I/O happens.
 */
export function normalizeOptions(options?: CheckOptions): NormalizedOptions {
  const o = { ...DEFAULT_OPTIONS, ...stripUndefined(options ?? {}) };

  if (o.method !== "head" && o.method !== "get") {
    throw new ConfigError(`expected "head" or "get", got "${String(o.method)}"`, "method");
  }

  const schemes = options?.schemes ?? ALL_SCHEMES;
  for (const scheme of schemes) {
    if (!ALL_SCHEMES.includes(scheme)) {
      throw new ConfigError(`unsupported scheme "${scheme}"`, "schemes");
    }
  }

  for (const [name, value] of Object.entries(o.headers)) {
    if (!/^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/.test(name) || /[\r\n]/.test(value)) {
      throw new ConfigError(`invalid header "${name}"`, "headers");
    }
  }

  const backoff = {
    baseMs: nonNegative(o.backoffBaseMs, "backoffBaseMs"),
    multiplier: o.backoffMultiplier,
    maxMs: nonNegative(o.backoffMaxMs, "backoffMaxMs"),
  };
  if (!Number.isFinite(backoff.multiplier) || backoff.multiplier < 1) {
    throw new ConfigError("must be a number >= 1", "backoffMultiplier");
  }

  return {
    maxConcurrency: positiveInt(o.maxConcurrency, "maxConcurrency"),
    maxConcurrencyPerHost: nonNegativeInt(o.maxConcurrencyPerHost, "maxConcurrencyPerHost"),
    hostDelayMs: nonNegative(o.hostDelayMs, "hostDelayMs"),
    hostJitterMs: nonNegative(o.hostJitterMs, "hostJitterMs"),
    timeoutMs: positiveInt(o.timeoutMs, "timeoutMs"),
    globalTimeoutMs: nonNegative(o.globalTimeoutMs, "globalTimeoutMs"),
    retryCount: positiveInt(o.retryCount, "retryCount"),
    backoff,
    retryStatusCodes: parseStatusCodes(o.retryStatusCodes, "retryStatusCodes"),
    acceptedStatusCodes: parseStatusCodes(o.acceptedStatusCodes),
    include: compilePatterns(o.include, "include"),
    exclude: compilePatterns(o.exclude, "exclude"),
    excludePrivateIps: o.skipPrivate || o.excludePrivateIps,
    excludeLinkLocal: o.skipPrivate || o.excludeLinkLocal,
    excludeLoopback: o.skipPrivate || o.excludeLoopback,
    excludeMail: o.excludeMail,
    schemes: new Set(schemes),
    userAgent: o.userAgent,
    basicAuth: options?.basicAuth,
    headers: { ...o.headers },
    credentials: buildCredentialTable(options?.githubToken, o.hostCredentials),
    insecureTls: o.insecureTls,
    checkAnchors: o.checkAnchors,
    method: o.method,
    maxRedirects: nonNegativeInt(o.maxRedirects, "maxRedirects"),
    rootDir: options?.rootDir,
    dedupe: o.dedupe,
    countSkippedAsChecked: o.countSkippedAsChecked,
  };
}

function stripUndefined(options: CheckOptions): Partial<Defaulted> {
  const out: Partial<Defaulted> = {};
  for (const [key, value] of Object.entries(options)) {
    if (value !== undefined) Object.assign(out, { [key]: value });
  }
  return out;
}

function compilePatterns(patterns: readonly string[], option: string): RegExp[] {
  return patterns.map((pattern) => {
    try {
      return new RegExp(pattern);
    } catch (error) {
      throw new ConfigError(
        `invalid pattern "${pattern}" (${error instanceof Error ? error.message : String(error)})`,
        option
      );
    }
  });
}

function positiveInt(value: number, option: string): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`must be a positive integer, got ${value}`, option);
  }
  return value;
}

function nonNegativeInt(value: number, option: string): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(`must be a non-negative integer, got ${value}`, option);
  }
  return value;
}

function nonNegative(value: number, option: string): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigError(`must be a non-negative number, got ${value}`, option);
  }
  return value;
}
