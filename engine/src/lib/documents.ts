import { readFile } from "node:fs/promises";
import { join, resolve as resolvePath } from "node:path";
import { glob } from "glob";
import { excludedHostClass, type HostPolicy } from "./address.js";
import type { TextReply } from "./client.js";
import { errorMessage } from "./errors.js";
import { formatFromContentType, formatFromPath } from "./extract.js";
import { REDIRECT_STATUSES } from "./http.js";
import { err, ok, type Result } from "./result.js";
import type {
  DocumentBase,
  DocumentFormat,
  InputFailure,
  SourceDocument,
} from "./types.js";

export type DocumentInput =
  | { path: string }
  | { glob: string; cwd?: string }
  | { url: string }
  | { id: string; content: string; format?: DocumentFormat; base?: string }
  | { links: string[]; id?: string };

export interface DocumentFetcher {
  fetchText(
    url: string,
    headers: Record<string, string>,
    signal: AbortSignal
  ): Promise<TextReply>;
}

export interface LoadContext {
  fetcher: DocumentFetcher;
  headers: Record<string, string>;
  timeoutMs: number;
  signal?: AbortSignal;
  /** Hosts never fetched, on the first request or any redirect. */
  hostPolicy?: HostPolicy;
  /** Defaults to 5. */
  maxRedirects?: number;
}

export interface LoadedDocuments {
  documents: SourceDocument[];
  errors: InputFailure[];
}

export function describeInput(input: DocumentInput): string {
  if ("path" in input) return input.path;
  if ("glob" in input) return input.glob;
  if ("url" in input) return input.url;
  if ("content" in input) return input.id;
  return input.id ?? "links";
}

/**
 * Load every input. An input that cannot be read is reported in `errors` and
 * the others are still loaded. A file matched twice is loaded once.
 */
export async function loadDocuments(
  inputs: readonly DocumentInput[],
  context: LoadContext
): Promise<LoadedDocuments> {
  const documents: SourceDocument[] = [];
  const errors: InputFailure[] = [];
  const seen = new Set<string>();

  const add = (input: DocumentInput, loaded: Result<SourceDocument[]>) => {
    if (!loaded.success) {
      errors.push({ input: describeInput(input), error: loaded.error });
      return;
    }
    for (const document of loaded.data) {
      if (seen.has(document.id)) {
        if (!isFileInput(input)) {
          errors.push({
            input: describeInput(input),
            error: `duplicate document id "${document.id}"`,
          });
        }
        continue;
      }
      seen.add(document.id);
      documents.push(document);
    }
  };

  for (const input of inputs) {
    add(input, await loadInput(input, context));
  }

  return { documents, errors };
}

function isFileInput(input: DocumentInput): boolean {
  return "path" in input || "glob" in input;
}

async function loadInput(
  input: DocumentInput,
  context: LoadContext
): Promise<Result<SourceDocument[]>> {
  if ("path" in input) {
    const loaded = await loadFile(input.path);
    return loaded.success ? ok([loaded.data]) : loaded;
  }

  if ("glob" in input) return loadGlob(input.glob, input.cwd);

  if ("url" in input) {
    const loaded = await loadUrl(input.url, context);
    return loaded.success ? ok([loaded.data]) : loaded;
  }

  if ("content" in input) {
    const base = inlineBase(input.base);
    if (!base.success) return base;
    return ok([
      {
        id: input.id,
        content: input.content,
        format: input.format ?? formatFromPath(input.id),
        base: base.data,
      },
    ]);
  }

  return ok([
    {
      id: input.id ?? "links",
      content: input.links.join("\n"),
      format: "links",
      base: { kind: "none" },
    },
  ]);
}

export async function loadFile(path: string): Promise<Result<SourceDocument>> {
  try {
    const content = await readFile(path, "utf8");
    return ok({
      id: path,
      content,
      format: formatFromPath(path),
      base: { kind: "file", path: resolvePath(path) },
    });
  } catch (error) {
    return err(`cannot read ${path}: ${errorMessage(error)}`);
  }
}

async function loadGlob(
  pattern: string,
  cwd?: string
): Promise<Result<SourceDocument[]>> {
  let matches: string[];
  try {
    matches = await glob(pattern, { nodir: true, cwd });
  } catch (error) {
    return err(`invalid pattern ${pattern}: ${errorMessage(error)}`);
  }
  if (matches.length === 0) return err(`no files match ${pattern}`);

  const documents: SourceDocument[] = [];
  for (const match of matches.sort()) {
    const loaded = await loadFile(cwd ? join(cwd, match) : match);
    if (!loaded.success) return loaded;
    documents.push(loaded.data);
  }
  return ok(documents);
}

export async function loadUrl(
  url: string,
  context: LoadContext
): Promise<Result<SourceDocument>> {
  let current: URL;
  try {
    current = new URL(url);
  } catch {
    return err(`invalid URL ${url}`);
  }

  const timeout = AbortSignal.timeout(context.timeoutMs);
  const signal = context.signal ? AbortSignal.any([context.signal, timeout]) : timeout;
  const maxRedirects = context.maxRedirects ?? 5;

  for (let hop = 0; ; hop++) {
    if (current.protocol !== "http:" && current.protocol !== "https:") {
      return err(`unsupported URL ${current.href}`);
    }
    const excluded = context.hostPolicy
      ? excludedHostClass(current.hostname, context.hostPolicy)
      : undefined;
    if (excluded) return err(`refusing to fetch ${current.href}: ${excluded} host`);

    let reply: TextReply;
    try {
      reply = await context.fetcher.fetchText(current.href, context.headers, signal);
    } catch (error) {
      return err(`cannot fetch ${url}: ${errorMessage(error)}`);
    }

    if (REDIRECT_STATUSES.has(reply.status) && reply.location) {
      if (hop >= maxRedirects) {
        return err(`cannot fetch ${url}: more than ${maxRedirects} redirects`);
      }
      try {
        current = new URL(reply.location, current);
      } catch {
        return err(`cannot fetch ${url}: invalid redirect to ${reply.location}`);
      }
      continue;
    }

    if (reply.status < 200 || reply.status >= 300) {
      return err(`cannot fetch ${url}: HTTP ${reply.status}`);
    }
    return ok({
      id: url,
      content: reply.body,
      format: formatFromContentType(reply.contentType, reply.url),
      base: { kind: "url", url: reply.url },
    });
  }
}

function inlineBase(base: string | undefined): Result<DocumentBase> {
  if (!base) return ok({ kind: "none" });
  if (!/^https?:/i.test(base)) return ok({ kind: "file", path: resolvePath(base) });

  try {
    return ok({ kind: "url", url: new URL(base).href });
  } catch {
    return err(`invalid base URL ${base}`);
  }
}
