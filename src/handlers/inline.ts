/**
 * Inline handlers: emphasis, links, line breaks and list items.
 */

import { isBlock, splitWhitespace, type ConversionContext, type Handler } from "../conversion.js";
import { attr, isElement, type StorageElement } from "../storage-tree.js";

/**
 * Wrap the rendered children in `marker`, keeping surrounding whitespace
 * outside the markers (`** bold **` is not bold in the target).
 */
function wrapped(marker: string): Handler {
  return (node, convert) => {
    const content = node.children.map(convert).join("");
    const { lead, core, trail } = splitWhitespace(content);
    if (!core) return content;
    return `${lead}${marker}${core}${marker}${trail}`;
  };
}

export const emphasis = wrapped("_");
export const strong = wrapped("**");
export const strikethrough = wrapped("~~");

export const inlineCode: Handler = (node, convert) => {
  const content = node.children.map(convert).join("").trim();
  return content ? `\`${content}\`` : "";
};

export function resolveHref(href: string, context: ConversionContext): string {
  return href.startsWith("/") ? context.options.siteBaseUrl + href : href;
}

export const link: Handler = (node, convert, context) => {
  const text = node.children.map(convert).join("").trim();
  const href = resolveHref(attr(node, "href") ?? "", context);
  if (!text) return href;
  return href ? `[${text}](${href})` : text;
};

export const lineBreak: Handler = () => "\n";

function isList(node: StorageElement): boolean {
  return node.name === "ul" || node.name === "ol";
}

function indent(block: string): string {
  return block
    .split("\n")
    .map((line) => (line ? `  ${line}` : line))
    .join("\n");
}

/** Children that keep their own lines inside an item; paragraphs flow as text. */
function isItemBlock(node: StorageElement): boolean {
  return isList(node) || (node.name !== "p" && isBlock(node));
}

/**
 * `* text`, then nested lists and block children (code fences, tables) on
 * their own lines, indented one level below the item. Only text is reflowed;
 * block output is indented as is.
 */
export const listItem: Handler = (node, convert) => {
  const lines: string[] = [];
  let flow = "";
  const flushFlow = () => {
    const text = flow
      .trim()
      .split(/\n+/)
      .map((line) => line.trim())
      .filter(Boolean);
    flow = "";
    if (lines.length === 0) lines.push(`* ${text.shift() ?? ""}`.trimEnd());
    lines.push(...text.map((line) => `  ${line}`));
  };
  for (const child of node.children) {
    if (isElement(child) && isItemBlock(child)) {
      flushFlow();
      const block = convert(child).replace(/^\n+/, "").trimEnd();
      if (block) lines.push(indent(block));
    } else {
      flow += convert(child);
    }
  }
  flushFlow();
  return lines.join("\n") + "\n";
};

/**
 * `ul`, `ol` and `ac:task-list`: items only. Whitespace between items in the
 * source would otherwise indent every following bullet.
 */
export const listContainer: Handler = (node, convert) =>
  node.children
    .filter((child) => child.kind === "element")
    .map(convert)
    .join("");
