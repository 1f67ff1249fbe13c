export { checkInputs } from "./lib/run.js";
export type { RunContext } from "./lib/run.js";

export { Checker, checkMail } from "./lib/checker.js";
export type { CheckerContext, Logger } from "./lib/checker.js";

export { UndiciRequester, classifyTransportError } from "./lib/client.js";
export type { HttpReply, HttpRequest, HttpRequester, TextReply } from "./lib/client.js";

export { describeInput, loadDocuments, loadFile, loadUrl } from "./lib/documents.js";
export type { DocumentFetcher, DocumentInput, LoadedDocuments } from "./lib/documents.js";

export { extract, formatFromContentType, formatFromPath } from "./lib/extract.js";
export { resolve, targetKey } from "./lib/resolve.js";
export { runChecks, GlobalTimeoutError } from "./lib/orchestrator.js";
export { EXIT_CODES, ReportBuilder, exitCodeFor, skipResult, summarize } from "./lib/report.js";
export {
  DEFAULT_OPTIONS,
  DEFAULT_USER_AGENT,
  VERSION,
  normalizeOptions,
} from "./lib/options.js";
export type { NormalizedOptions } from "./lib/options.js";
export { ConfigError, errorMessage } from "./lib/errors.js";
export type { Result } from "./lib/result.js";

export type * from "./lib/types.js";
