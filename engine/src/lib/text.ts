import type { LinkCandidate } from "./position.js";

const URL_PATTERN = /\b[a-z][a-z0-9+.-]*:\/\/[^\s<>"'`]+/gi;
const MAILTO_PATTERN = /\bmailto:[^\s<>"'`]+/gi;
const MAIL_PATTERN = /[a-z0-9._%+-]+@[a-z0-9-]+(?:\.[a-z0-9-]+)*\.[a-z]{2,}/gi;

const TRAILING_PUNCTUATION = /[.,;:!?'"\]}>*_]+$/;

/**
 * Drop sentence punctuation after a URL. A closing parenthesis is kept only
 * when it balances one inside the URL, as in wiki links.
 */
export function trimUrl(url: string): string {
  let out = url;
  for (;;) {
    const before = out;
    out = out.replace(TRAILING_PUNCTUATION, "");
    if (out.endsWith(")")) {
      const opens = (out.match(/\(/g) ?? []).length;
      const closes = (out.match(/\)/g) ?? []).length;
      if (closes > opens) out = out.slice(0, -1);
    }
    if (out === before) return out;
  }
}

/**
 * Bare URLs, `mailto:` links and mail addresses in free text. Mail addresses
 * inside a URL match (credentials, query strings) are not reported twice.
 */
export function scanText(text: string, baseOffset = 0): LinkCandidate[] {
  const found: LinkCandidate[] = [];
  const taken: Array<[number, number]> = [];

  for (const match of text.matchAll(URL_PATTERN)) {
    const start = match.index ?? 0;
    const url = trimUrl(match[0]);
    if (!url.includes("://") || url.endsWith("://")) continue;
    taken.push([start, start + url.length]);
    found.push({ text: url, kind: "bare-url", offset: baseOffset + start });
  }

  for (const match of text.matchAll(MAILTO_PATTERN)) {
    const start = match.index ?? 0;
    const url = trimUrl(match[0]);
    if (overlaps(taken, start) || url.length <= "mailto:".length) continue;
    taken.push([start, start + url.length]);
    found.push({ text: url, kind: "mail", offset: baseOffset + start });
  }

  for (const match of text.matchAll(MAIL_PATTERN)) {
    const start = match.index ?? 0;
    if (overlaps(taken, start)) continue;
    found.push({ text: match[0], kind: "mail", offset: baseOffset + start });
  }

  return found.sort((a, b) => a.offset - b.offset);
}

function overlaps(ranges: Array<[number, number]>, position: number): boolean {
  return ranges.some(([from, to]) => position >= from && position < to);
}

export function extractText(content: string): LinkCandidate[] {
  return scanText(content);
}

/** One direct link per non-empty line. */
export function extractLinkList(content: string): LinkCandidate[] {
  const found: LinkCandidate[] = [];
  let offset = 0;

  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (trimmed) {
      found.push({
        text: trimmed,
        kind: "direct",
        offset: offset + line.indexOf(trimmed),
      });
    }
    offset += line.length + 1;
  }

  return found;
}
