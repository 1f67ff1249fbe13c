import type { Definition, Root } from "mdast";
import remarkGfm from "remark-gfm";
import remarkParse from "remark-parse";
import { unified } from "unified";
import { visit } from "unist-util-visit";
import { extractHtml } from "./html.js";
import type { LinkCandidate } from "./position.js";

export const markdownParser = unified().use(remarkParse).use(remarkGfm);

/**
 * Links, images, reference links and autolinks (including GFM bare URLs and
 * mail addresses). Code is skipped by construction: code nodes carry no link
 * children. Embedded HTML is handed to the HTML extractor.
 */
export function extractMarkdown(content: string): LinkCandidate[] {
  const tree: Root = markdownParser.parse(content);
  const found: LinkCandidate[] = [];

  const definitions = new Map<string, Definition>();
  visit(tree, "definition", (node) => {
    const id = node.identifier.toLowerCase();
    // First definition wins, as in CommonMark.
    if (!definitions.has(id)) definitions.set(id, node);
  });

  visit(tree, (node) => {
    const offset = node.position?.start.offset ?? 0;

    switch (node.type) {
      case "link":
        found.push({
          text: node.url,
          kind: content.charAt(offset) === "[" ? "markdown-link" : "autolink",
          offset,
        });
        break;
      case "image":
        found.push({ text: node.url, kind: "markdown-image", offset });
        break;
      case "linkReference":
      case "imageReference": {
        const definition = definitions.get(node.identifier.toLowerCase());
        if (definition) {
          found.push({ text: definition.url, kind: "markdown-reference", offset });
        }
        break;
      }
      case "html":
        found.push(...extractHtml(node.value, offset));
        break;
    }
  });

  return found;
}
