/**
 * Block handlers: paragraphs, headings, preformatted text, rules, quotes.
 */

import type { Handler } from "../conversion.js";
import { hasDescendant, textContent } from "../storage-tree.js";
import { emitFence, renderQuoted } from "./quote.js";

/** Descendants that produce block output even when the paragraph has no text. */
const BLOCK_PRODUCERS: ReadonlySet<string> = new Set(["ac:structured-macro", "ac:image"]);

export const paragraph: Handler = (node, convert) => {
  const content = node.children.map(convert).join("");
  if (!content.trim() && !hasDescendant(node, BLOCK_PRODUCERS)) return "";
  return content + "\n\n";
};

/**
 * Headings deeper than `maxHeadingLevel` are clamped to it. A heading without
 * text is dropped rather than emitted as a bare `#` marker.
 */
export function heading(level: number): Handler {
  return (node, convert, context) => {
    const content = node.children.map(convert).join("").trim();
    if (!content) return "";
    const effective = Math.min(level, context.options.maxHeadingLevel);
    return `${"#".repeat(effective)} ${content}\n\n`;
  };
}

export const preformatted: Handler = (node, _convert, context) => {
  const code = textContent(node).replace(/^\s*\n/, "").trimEnd();
  if (!code.trim()) return "";
  return emitFence(code, "", context);
};

export const horizontalRule: Handler = () => "---\n\n";

export const blockquote: Handler = (node, convert, context) => renderQuoted(node, "", convert, context);
