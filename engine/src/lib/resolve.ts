import { dirname, isAbsolute, join, normalize, relative } from "node:path";
import { fileURLToPath } from "node:url";
import { excludedHostClass } from "./address.js";
import type { NormalizedOptions } from "./options.js";
import type {
  DocumentBase,
  RawLink,
  Resolution,
  SkipReason,
  SkipVerdict,
  Target,
  TargetScheme,
} from "./types.js";

const SCHEME_PATTERN = /^([a-z][a-z0-9+.-]*):/i;
const MAIL_ADDRESS = /^[^\s@/:?#]+@[^\s@/:?#]+$/;

/** Canonical string form of a target, used for patterns, dedupe and reports. */
export function targetKey(target: Target): string {
  switch (target.kind) {
    case "web":
      return target.url;
    case "file":
      return target.anchor === undefined ? target.path : `${target.path}#${target.anchor}`;
    case "mail":
      return `mailto:${target.address}`;
  }
}

export function targetScheme(target: Target): TargetScheme {
  switch (target.kind) {
    case "web":
      return target.url.startsWith("https:") ? "https" : "http";
    case "file":
      return "file";
    case "mail":
      return "mailto";
  }
}

/**
 * Turn a raw link into a checkable target or a skip verdict. Pure: depends on
 * the link, the document base and the options only.
 */
export function resolve(
  link: RawLink,
  base: DocumentBase,
  options: NormalizedOptions
): Resolution {
  const located = locate(link, base, options);
  if (located.kind === "skip") return located;
  return applyPolicy(located, options);
}

function skip(
  link: RawLink,
  reason: SkipReason,
  detail?: string,
  url?: string
): SkipVerdict {
  return { kind: "skip", reason, link, detail, url };
}

function locate(
  link: RawLink,
  base: DocumentBase,
  options: NormalizedOptions
): Resolution {
  const raw = link.text.trim();
  if (!raw) return skip(link, "invalid", "empty link");

  if (raw.startsWith("#")) {
    if (options.checkAnchors && base.kind === "file") {
      return { kind: "file", path: base.path, anchor: decode(raw.slice(1)), link };
    }
    return skip(link, "anchor_only", undefined, raw);
  }

  if (/^mailto:/i.test(raw)) {
    const address = decode(raw.slice("mailto:".length).split("?")[0]);
    return { kind: "mail", address, link };
  }
  if (MAIL_ADDRESS.test(raw)) {
    return { kind: "mail", address: raw, link };
  }

  if (raw.startsWith("//")) {
    return webTarget(link, `${baseProtocol(base)}${raw}`);
  }

  const scheme = raw.match(SCHEME_PATTERN)?.[1].toLowerCase();
  if (scheme === "http" || scheme === "https") return webTarget(link, raw);
  if (scheme === "file") {
    try {
      const url = new URL(raw);
      const anchor = url.hash ? decode(url.hash.slice(1)) : undefined;
      url.hash = "";
      return { kind: "file", path: fileURLToPath(url), anchor, link };
    } catch {
      return skip(link, "invalid", "malformed file URL", raw);
    }
  }
  if (scheme !== undefined) {
    return skip(link, "unsupported_scheme", `${scheme}: links are not checked`, raw);
  }

  switch (base.kind) {
    case "url":
      return webTarget(link, raw, base.url);
    case "file":
      return fileTarget(link, raw, base.path, options.rootDir);
    case "none":
      return skip(link, "invalid", "relative link without a base", raw);
  }
}

/** Protocol for `//host` links: the base URL's, else https. */
function baseProtocol(base: DocumentBase): string {
  if (base.kind !== "url") return "https:";
  try {
    return new URL(base.url).protocol;
  } catch {
    return "https:";
  }
}

function webTarget(link: RawLink, raw: string, base?: string): Resolution {
  try {
    return { kind: "web", url: new URL(raw, base).href, link };
  } catch {
    return skip(link, "invalid", "malformed URL", raw);
  }
}

function fileTarget(
  link: RawLink,
  raw: string,
  documentPath: string,
  rootDir: string | undefined
): Resolution {
  const hashAt = raw.indexOf("#");
  const anchor = hashAt === -1 ? undefined : decode(raw.slice(hashAt + 1));
  const pathPart = decode((hashAt === -1 ? raw : raw.slice(0, hashAt)).split("?")[0]);

  let path: string;
  if (!pathPart) {
    path = documentPath;
  } else if (isAbsolute(pathPart)) {
    if (rootDir === undefined) {
      return skip(link, "outside_root", "root-absolute path without rootDir", raw);
    }
    path = join(rootDir, pathPart);
  } else {
    path = normalize(join(dirname(documentPath), pathPart));
  }

  if (rootDir !== undefined) {
    const fromRoot = relative(rootDir, path);
    if (fromRoot.startsWith("..") || isAbsolute(fromRoot)) {
      return skip(link, "outside_root", `outside of ${rootDir}`, path);
    }
  }

  return anchor ? { kind: "file", path, anchor, link } : { kind: "file", path, link };
}

function applyPolicy(target: Target, options: NormalizedOptions): Resolution {
  const key = targetKey(target);
  const { link } = target;

  if (!options.schemes.has(targetScheme(target))) {
    return skip(link, "unsupported_scheme", `${targetScheme(target)} links are disabled`, key);
  }

  if (options.include.length > 0) {
    if (!options.include.some((pattern) => pattern.test(key))) {
      return skip(link, "excluded", "not matched by any include pattern", key);
    }
  } else {
    const matched = options.exclude.find((pattern) => pattern.test(key));
    if (matched) return skip(link, "excluded", `matched ${matched.source}`, key);
  }

  if (target.kind === "mail" && options.excludeMail) {
    return skip(link, "mail_excluded", undefined, key);
  }

  if (target.kind === "web") {
    const hostClass = excludedHostClass(new URL(target.url).hostname, options);
    if (hostClass) return skip(link, "private_address", `${hostClass} host`, key);
  }

  return target;
}

function decode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}
