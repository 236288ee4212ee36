/**
 * Storage format → canvas Markdown converter.
 *
 * Why: Canvases accept a narrow Markdown dialect, and Confluence storage HTML
 * mixes plain HTML with composite `ac:` macros. A generic HTML→Markdown pass
 * loses macro parameters and puts code fences inside quotes, so we walk the
 * storage tree ourselves and let one handler per element decide its output.
 *
 * How: preprocess the raw string, parse it into a storage tree, then convert
 * recursively. The result is a draft: attachment embeds are placeholders that
 * `resolveEmbeds` fills in once the binaries have been re-hosted.
 */

import {
  createConversionContext,
  EMBED_PLACEHOLDER_RE,
  renderChildren,
  type ConversionContext,
  type ConvertFn,
  type ConverterOptions,
  type Handler,
  type MarkdownDraft,
} from "./conversion.js";
import { resolveEmbeds, type EmbedCollaborators } from "./embeds.js";
import { blockquote, heading, horizontalRule, paragraph, preformatted } from "./handlers/blocks.js";
import { attachmentEmbed } from "./handlers/embeds.js";
import {
  emphasis,
  inlineCode,
  lineBreak,
  link,
  listContainer,
  listItem,
  strikethrough,
  strong,
} from "./handlers/inline.js";
import { structuredMacro } from "./handlers/macros.js";
import { confluenceLink, task, timestamp, userReference } from "./handlers/references.js";
import { table } from "./handlers/table.js";
import { postprocessMarkdown, preprocessStorage } from "./preprocess.js";
import { parseStorageTree, type StorageNode } from "./storage-tree.js";

export type HandledTag =
  | "p" | "h1" | "h2" | "h3" | "h4" | "h5" | "h6"
  | "em" | "i" | "strong" | "b" | "s" | "del" | "code"
  | "a" | "br" | "li" | "ul" | "ol"
  | "pre" | "hr" | "blockquote" | "table" | "time"
  | "ac:structured-macro" | "ac:image" | "ac:link" | "ri:user"
  | "ac:task-list" | "ac:task";

const HANDLERS: Record<HandledTag, Handler> = {
  p: paragraph,
  h1: heading(1),
  h2: heading(2),
  h3: heading(3),
  h4: heading(4),
  h5: heading(5),
  h6: heading(6),
  em: emphasis,
  i: emphasis,
  strong,
  b: strong,
  s: strikethrough,
  del: strikethrough,
  code: inlineCode,
  a: link,
  br: lineBreak,
  li: listItem,
  ul: listContainer,
  ol: listContainer,
  pre: preformatted,
  hr: horizontalRule,
  blockquote,
  table,
  time: timestamp,
  "ac:structured-macro": structuredMacro,
  "ac:image": attachmentEmbed,
  "ac:link": confluenceLink,
  "ri:user": userReference,
  "ac:task-list": listContainer,
  "ac:task": task,
};

function isHandledTag(name: string): name is HandledTag {
  return Object.prototype.hasOwnProperty.call(HANDLERS, name);
}

export function normalizeText(value: string): string {
  return value.replace(/\u00a0/g, " ").replace(/\s+/g, " ");
}

export function convertNode(node: StorageNode, context: ConversionContext): string {
  if (node.kind === "text") {
    return node.raw ? node.value : normalizeText(node.value);
  }
  const convert: ConvertFn = (child) => convertNode(child, context);
  if (isHandledTag(node.name)) {
    return HANDLERS[node.name](node, convert, context);
  }
  return renderChildren(node, convert);
}

/** Pure first phase: no I/O, a fresh context per call. */
export function draftMarkdown(storageHtml: string, options: ConverterOptions = {}): MarkdownDraft {
  const context = createConversionContext(options);
  const tree = parseStorageTree(preprocessStorage(storageHtml));
  const markdown = convertNode(tree, context);
  return { markdown, embeds: [...context.embeds] };
}

/** Convert without re-hosting attachments; attachment embeds are left out. */
export function convertStorageOffline(storageHtml: string, options: ConverterOptions = {}): string {
  const { markdown } = draftMarkdown(storageHtml, options);
  return postprocessMarkdown(markdown.replace(EMBED_PLACEHOLDER_RE, ""));
}

export interface ConvertOptions<Handle> extends ConverterOptions {
  collaborators?: EmbedCollaborators<Handle>;
}

export async function convertStorageToMarkdown<Handle>(
  storageHtml: string,
  options: ConvertOptions<Handle> = {}
): Promise<string> {
  const { collaborators, ...converterOptions } = options;
  const draft = draftMarkdown(storageHtml, converterOptions);
  const resolved = await resolveEmbeds(draft, collaborators);
  return postprocessMarkdown(resolved);
}
