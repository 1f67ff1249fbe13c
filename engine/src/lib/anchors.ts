import { load } from "cheerio";
import type { Heading, Root } from "mdast";
import { visit } from "unist-util-visit";
import { markdownParser } from "./markdown.js";
import type { DocumentFormat } from "./types.js";

/**
 * GitHub-style heading slug. Repeated headings get `-1`, `-2`... suffixes,
 * tracked in `seen`.
 */
export function githubSlug(heading: string, seen: Map<string, number>): string {
  const base = heading
    .trim()
    .toLowerCase()
    .replace(/<[^>]*>/g, "")
    .replace(/[^\p{L}\p{N}\s_-]/gu, "")
    .replace(/\s/g, "-");

  const count = seen.get(base) ?? 0;
  seen.set(base, count + 1);
  return count === 0 ? base : `${base}-${count}`;
}

function headingText(node: Heading): string {
  let text = "";
  visit(node, (child) => {
    if (child.type === "text" || child.type === "inlineCode") text += child.value;
  });
  return text;
}

/** Fragment targets a document offers: heading slugs and id/name attributes. */
export function collectAnchors(content: string, format: DocumentFormat): Set<string> {
  const anchors = new Set<string>();

  if (format === "markdown") {
    const tree: Root = markdownParser.parse(content);
    const seen = new Map<string, number>();
    visit(tree, (node) => {
      if (node.type === "heading") anchors.add(githubSlug(headingText(node), seen));
      if (node.type === "html") addHtmlAnchors(node.value, anchors);
    });
    return anchors;
  }

  if (format === "html") addHtmlAnchors(content, anchors);
  return anchors;
}

function addHtmlAnchors(html: string, anchors: Set<string>): void {
  const $ = load(html);
  $("[id], a[name]").each((_, element) => {
    for (const attribute of ["id", "name"]) {
      const value = $(element).attr(attribute);
      if (value) anchors.add(value);
    }
  });
}
