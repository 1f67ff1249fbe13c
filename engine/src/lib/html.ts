import { load } from "cheerio";
import { hasChildren, isTag, isText, type AnyNode } from "domhandler";
import type { LinkCandidate } from "./position.js";
import { scanText } from "./text.js";

const LINK_ATTRIBUTES = ["href", "src"] as const;

// Text under these elements is not scanned for bare URLs. Anchor text usually
// repeats the href it labels.
const OPAQUE_ELEMENTS = new Set(["script", "style", "template", "textarea", "a"]);

/**
 * `href`/`src` attributes plus bare URLs and mail addresses in text nodes.
 * Comments never reach the walk: they are their own node type.
 */
export function extractHtml(content: string, baseOffset = 0): LinkCandidate[] {
  const $ = load(content, { sourceCodeLocationInfo: true });
  const found: LinkCandidate[] = [];

  const walk = (node: AnyNode, opaque: boolean): void => {
    if (isTag(node)) {
      const offset = baseOffset + (node.startIndex ?? 0);
      for (const attribute of LINK_ATTRIBUTES) {
        const value = node.attribs[attribute]?.trim();
        if (value) found.push({ text: value, kind: attribute, offset });
      }

      const childOpaque = opaque || OPAQUE_ELEMENTS.has(node.name);
      for (const child of node.children) walk(child, childOpaque);
      return;
    }

    if (isText(node)) {
      if (!opaque) {
        found.push(...scanText(node.data, baseOffset + (node.startIndex ?? 0)));
      }
      return;
    }

    if (hasChildren(node)) {
      for (const child of node.children) walk(child, opaque);
    }
  };

  walk($.root()[0], false);
  return found;
}
