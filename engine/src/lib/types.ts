export type DocumentFormat = "markdown" | "html" | "text" | "links";

export type DocumentBase =
  | { kind: "url"; url: string }
  | { kind: "file"; path: string }
  | { kind: "none" };

/**
 * A document to scan. `base` is where relative links are resolved from: the
 * document's own file path or URL.
 */
export interface SourceDocument {
  id: string;
  format: DocumentFormat;
  content: string;
  base: DocumentBase;
}

export type LinkKind =
  | "markdown-link"
  | "markdown-image"
  | "markdown-reference"
  | "autolink"
  | "href"
  | "src"
  | "bare-url"
  | "mail"
  | "direct";

/** A link as written in a document, before resolution. */
export interface RawLink {
  text: string;
  kind: LinkKind;
  /** Character offset into the document content. */
  offset: number;
  line: number;
  column: number;
  /** Position in the document's extraction sequence, used to restore order. */
  index: number;
}

export type Target =
  | { kind: "web"; url: string; link: RawLink }
  | { kind: "file"; path: string; anchor?: string; link: RawLink }
  | { kind: "mail"; address: string; link: RawLink };

export type SkipReason =
  | "excluded"
  | "private_address"
  | "mail_excluded"
  | "unsupported_scheme"
  | "anchor_only"
  | "outside_root"
  | "invalid";

export interface SkipVerdict {
  kind: "skip";
  reason: SkipReason;
  /** Resolved form of the link when resolution got that far. */
  url?: string;
  detail?: string;
  link: RawLink;
}

export type Resolution = Target | SkipVerdict;

export type CheckStatus = "success" | "failure" | "excluded" | "skipped";

export type FailureReason =
  | "http_status"
  | "exhausted_retries"
  | "too_many_redirects"
  | "tls"
  | "not_found"
  | "invalid_mail"
  | "cancelled";

export type TransportErrorKind =
  | "timeout"
  | "dns"
  | "connection"
  | "tls"
  | "network";

export interface CheckResult {
  /** Normalized target, or the link text when the link was never resolved. */
  url: string;
  link: RawLink;
  status: CheckStatus;
  reason?: FailureReason | SkipReason;
  httpStatus?: number;
  error?: string;
  transportError?: TransportErrorKind;
  /** Final URL when redirects were followed. */
  redirectedTo?: string;
  elapsedMs: number;
  /** Attempts made beyond the first. */
  retries: number;
}

export interface ReportSummary {
  total: number;
  checked: number;
  succeeded: number;
  failed: number;
  excluded: number;
  skipped: number;
  redirected: number;
  timeouts: number;
  cancelled: number;
}

export interface InputFailure {
  input: string;
  error: string;
}

export interface Report {
  /** Results per document id, each in source order. */
  documents: Record<string, CheckResult[]>;
  summary: ReportSummary;
  inputErrors: InputFailure[];
  /** True when the run was cut short by the global timeout or the caller. */
  cancelled: boolean;
  startedAt: string;
  completedAt: string;
  durationMs: number;
}

export interface BasicAuth {
  username: string;
  password: string;
}

export interface HostCredential {
  /** Host name; subdomains match too. */
  host: string;
  /** Value sent as the Authorization header. */
  authorization: string;
}

export type StatusCodeSpec = number | string;

export type TargetScheme = "http" | "https" | "mailto" | "file";

export interface CheckOptions {
  /**
   * Maximum number of checks in flight at once.
   */
  maxConcurrency?: number;
  /**
   * Maximum concurrent requests to a single host (0 for no per-host bound).
   */
  maxConcurrencyPerHost?: number;
  /**
   * Minimum spacing between requests to the same host in ms.
   */
  hostDelayMs?: number;
  /**
   * Random jitter (0..N ms) added to each host delay.
   */
  hostJitterMs?: number;
  /**
   * Timeout of a single HTTP request in ms.
   */
  timeoutMs?: number;
  /**
   * Timeout of the whole run in ms (0 for none). Checks still outstanding when
   * it fires are reported as cancelled.
   */
  globalTimeoutMs?: number;
  /**
   * Maximum number of attempts per web link, the first one included.
   */
  retryCount?: number;
  /**
   * Delay before the first retry in ms.
   */
  backoffBaseMs?: number;
  /**
   * Growth factor of the delay between consecutive retries.
   */
  backoffMultiplier?: number;
  /**
   * Upper bound of a single backoff delay in ms.
   */
  backoffMaxMs?: number;
  /**
   * Status codes that are retried rather than failed immediately.
   */
  retryStatusCodes?: number[];
  /**
   * Status codes (or ranges such as "400-403") treated as success on top of 2xx.
   */
  acceptedStatusCodes?: StatusCodeSpec[];
  /**
   * Regular expressions; when present only matching links are checked.
   */
  include?: string[];
  /**
   * Regular expressions; matching links are excluded.
   */
  exclude?: string[];
  /**
   * Exclude loopback, private and link-local hosts.
   */
  skipPrivate?: boolean;
  excludePrivateIps?: boolean;
  excludeLinkLocal?: boolean;
  excludeLoopback?: boolean;
  /**
   * Exclude mail addresses from checking.
   */
  excludeMail?: boolean;
  /**
   * Target schemes to check; links with any other scheme are skipped.
   */
  schemes?: TargetScheme[];
  userAgent?: string;
  basicAuth?: BasicAuth;
  /**
   * Extra headers sent with every request.
   */
  headers?: Record<string, string>;
  /**
   * Token sent to GitHub hosts to stay clear of their anonymous rate limit.
   */
  githubToken?: string;
  hostCredentials?: HostCredential[];
  /**
   * Skip TLS certificate verification.
   */
  insecureTls?: boolean;
  /**
   * Check `#fragment` anchors of local Markdown and HTML files.
   */
  checkAnchors?: boolean;
  /**
   * "head" tries HEAD first and falls back to GET; "get" always uses GET.
   */
  method?: "head" | "get";
  maxRedirects?: number;
  /**
   * Root directory for root-absolute paths (`/docs/a.md`) in local documents.
   * Resolved paths outside of it are skipped.
   */
  rootDir?: string;
  /**
   * Check identical targets once per run.
   */
  dedupe?: boolean;
  /**
   * Count excluded and skipped links in the summary's `checked` total.
   */
  countSkippedAsChecked?: boolean;
}
