/**
 * Shared conversion types: options, the per-conversion context and the
 * generic child-joining rule every handler can fall back to.
 */

import type { StorageElement, StorageNode } from "./storage-tree.js";

export type CalloutStyle = "blockquote" | "markers";

export interface ConverterOptions {
  /** Base for site-relative links (`/display/...`). */
  siteBaseUrl?: string;
  /** Issue tracker base; jira macros link to `<base>/browse/<KEY>`. */
  issueTrackerBaseUrl?: string;
  /** Highest heading level the target renders; deeper headings are clamped. */
  maxHeadingLevel?: number;
  calloutStyle?: CalloutStyle;
}

export type ResolvedConverterOptions = Required<ConverterOptions>;

export const DEFAULT_CONVERTER_OPTIONS: ResolvedConverterOptions = {
  siteBaseUrl: "",
  issueTrackerBaseUrl: "",
  maxHeadingLevel: 3,
  calloutStyle: "blockquote",
};

export interface EmbedRequest {
  index: number;
  filename: string;
  /** Inside a table cell: rendered without the trailing blank line. */
  inline: boolean;
}

export interface MarkdownDraft {
  /** Converted Markdown with embed placeholders, not yet postprocessed. */
  markdown: string;
  embeds: EmbedRequest[];
}

/**
 * Mutable state of one document conversion. Created per conversion and
 * threaded through every handler; never shared between documents.
 */
export interface ConversionContext {
  readonly options: ResolvedConverterOptions;
  /** Next callout number (marker style). */
  nextCallout: number;
  /** Number of blockquote callouts currently being rendered. */
  quoteDepth: number;
  /** Number of table cells currently being rendered. */
  cellDepth: number;
  /** Fenced blocks lifted out of blockquote callouts, by placeholder index. */
  readonly breakouts: string[];
  readonly embeds: EmbedRequest[];
}

export type ConvertFn = (node: StorageNode) => string;

export type Handler = (node: StorageElement, convert: ConvertFn, context: ConversionContext) => string;

export function resolveOptions(options: ConverterOptions = {}): ResolvedConverterOptions {
  const merged = { ...DEFAULT_CONVERTER_OPTIONS };
  if (options.siteBaseUrl !== undefined) merged.siteBaseUrl = options.siteBaseUrl.replace(/\/+$/, "");
  if (options.issueTrackerBaseUrl !== undefined) {
    merged.issueTrackerBaseUrl = options.issueTrackerBaseUrl.replace(/\/+$/, "");
  }
  if (options.maxHeadingLevel !== undefined) {
    merged.maxHeadingLevel = Math.min(6, Math.max(1, Math.floor(options.maxHeadingLevel)));
  }
  if (options.calloutStyle !== undefined) merged.calloutStyle = options.calloutStyle;
  return merged;
}

export function createConversionContext(options: ConverterOptions = {}): ConversionContext {
  return {
    options: resolveOptions(options),
    nextCallout: 0,
    quoteDepth: 0,
    cellDepth: 0,
    breakouts: [],
    embeds: [],
  };
}

/*
 * Placeholders left in the draft for content produced later. Storage HTML
 * cannot carry NUL, so these never collide with document text.
 */
export function embedPlaceholder(index: number): string {
  return `\u0000EMBED:${index}\u0000`;
}

export const EMBED_PLACEHOLDER_RE = /\u0000EMBED:(\d+)\u0000/g;

export function breakoutPlaceholder(index: number): string {
  return `\u0000FENCE:${index}\u0000`;
}

export const BREAKOUT_PLACEHOLDER_RE = /\u0000FENCE:(\d+)\u0000/;

/** Elements that render as their own block; siblings are separated by a blank line. */
export const BLOCK_TAGS: ReadonlySet<string> = new Set([
  "p", "h1", "h2", "h3", "h4", "h5", "h6",
  "ul", "ol", "table", "pre", "blockquote", "hr", "div", "section",
  "ac:structured-macro", "ac:image", "ac:task-list",
  "ac:layout", "ac:layout-section", "ac:layout-cell", "ac:rich-text-body",
]);

export function isBlock(node: StorageNode): boolean {
  return node.kind === "element" && BLOCK_TAGS.has(node.name);
}

/**
 * Render all children of `node`. Without block children the output is
 * concatenated. With block children each block, and each run of inline
 * siblings between them, becomes its own part, and parts are joined by a
 * blank line; parts that are only whitespace are dropped.
 */
export function renderChildren(node: StorageElement, convert: ConvertFn): string {
  if (!node.children.some(isBlock)) {
    return node.children.map(convert).join("");
  }
  const parts: string[] = [];
  let inline = "";
  for (const child of node.children) {
    if (isBlock(child)) {
      parts.push(inline, convert(child));
      inline = "";
    } else {
      inline += convert(child);
    }
  }
  parts.push(inline);
  return parts.filter((part) => part.trim() !== "").join("\n\n");
}

/** Split into leading whitespace, core and trailing whitespace. */
export function splitWhitespace(content: string): { lead: string; core: string; trail: string } {
  const core = content.trim();
  if (!core) return { lead: content, core: "", trail: "" };
  const start = content.indexOf(core);
  return { lead: content.slice(0, start), core, trail: content.slice(start + core.length) };
}
