/**
 * Structured macro subsystem.
 *
 * `ac:structured-macro` elements dispatch on their `ac:name`. Names without a
 * handler render all of their children so no content is lost.
 */

import { renderChildren, type Handler } from "../conversion.js";
import { decodeLiteralPayload, LITERAL_MARKER_ATTR, LITERAL_MARKER_VALUE } from "../preprocess.js";
import { attr, macroBody, macroParameter, textContent } from "../storage-tree.js";
import { attachmentEmbed } from "./embeds.js";
import { emitFence, renderQuoted } from "./quote.js";

export type MacroName = "code" | "info" | "note" | "tip" | "warning" | "jira" | "multimedia";

export const code: Handler = (node, _convert, context) => {
  const body = macroBody(node, "ac:plain-text-body");
  if (!body) return "";
  const raw = textContent(body);
  const literal = attr(body, LITERAL_MARKER_ATTR) === LITERAL_MARKER_VALUE ? decodeLiteralPayload(raw) : raw;
  const source = literal.replace(/^\s*\n/, "").trimEnd();
  if (!source.trim()) return "";
  return emitFence(source, macroParameter(node, "language") ?? "", context);
};

function calloutMarker(edge: "START" | "END", index: number): string {
  return `===========${edge} CALLOUT ${index}==========`;
}

/**
 * Info-style panels. `markers` numbers each callout from the conversion's
 * counter and keeps the body verbatim between START/END lines; `blockquote`
 * quotes title and body and lifts nested code out of the quote.
 */
export const callout: Handler = (node, convert, context) => {
  const title = macroParameter(node, "title") ?? "";
  const body = macroBody(node, "ac:rich-text-body");

  if (context.options.calloutStyle === "blockquote") {
    return renderQuoted(body, title, convert, context);
  }

  // Allocate before rendering the body so nested callouts number after this one.
  const index = context.nextCallout++;
  const lines = [calloutMarker("START", index)];
  if (title) lines.push(`**${title}**`);
  const content = body ? renderChildren(body, convert).trim() : "";
  if (content) lines.push(content);
  lines.push(calloutMarker("END", index));
  return lines.join("\n") + "\n\n";
};

export const jira: Handler = (node, _convert, context) => {
  const key = macroParameter(node, "key");
  if (!key) return "";
  const base = context.options.issueTrackerBaseUrl;
  return (base ? `[${key}](${base}/browse/${key})` : key) + "\n\n";
};

export const MACRO_HANDLERS: Record<MacroName, Handler> = {
  code,
  info: callout,
  note: callout,
  tip: callout,
  warning: callout,
  jira,
  multimedia: attachmentEmbed,
};

function isMacroName(name: string): name is MacroName {
  return Object.prototype.hasOwnProperty.call(MACRO_HANDLERS, name);
}

export const structuredMacro: Handler = (node, convert, context) => {
  const name = (attr(node, "ac:name") ?? "").toLowerCase();
  if (isMacroName(name)) return MACRO_HANDLERS[name](node, convert, context);
  return renderChildren(node, convert);
};
