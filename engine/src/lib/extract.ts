import { extractHtml } from "./html.js";
import { extractMarkdown } from "./markdown.js";
import { toRawLinks, type LinkCandidate } from "./position.js";
import { extractLinkList, extractText } from "./text.js";
import type { DocumentFormat, RawLink, SourceDocument } from "./types.js";

const EXTRACTORS: Record<DocumentFormat, (content: string) => LinkCandidate[]> = {
  markdown: extractMarkdown,
  html: extractHtml,
  text: extractText,
  links: extractLinkList,
};

/**
 * Links of a document in source order. Never throws on document content: a
 * parser failure degrades to the plain-text scan.
 */
export function extract(document: SourceDocument): RawLink[] {
  let candidates: LinkCandidate[];
  try {
    candidates = EXTRACTORS[document.format](document.content);
  } catch {
    candidates = extractText(document.content);
  }
  return toRawLinks(document.content, candidates);
}

const EXTENSION_FORMATS: Record<string, DocumentFormat> = {
  ".md": "markdown",
  ".markdown": "markdown",
  ".mdx": "markdown",
  ".mkd": "markdown",
  ".html": "html",
  ".htm": "html",
  ".xhtml": "html",
};

export function formatFromPath(path: string): DocumentFormat {
  const match = path.toLowerCase().match(/\.[a-z0-9]+$/);
  return (match && EXTENSION_FORMATS[match[0]]) || "text";
}

export function formatFromContentType(
  contentType: string | null,
  url: string
): DocumentFormat {
  const type = contentType?.split(";")[0].trim().toLowerCase() ?? "";
  if (type === "text/html" || type === "application/xhtml+xml") return "html";
  if (type === "text/markdown" || type === "text/x-markdown") return "markdown";

  try {
    return formatFromPath(new URL(url).pathname);
  } catch {
    return "text";
  }
}
