/**
 * Blockquote rendering with fenced-block breakout.
 *
 * Why: a canvas blockquote cannot hold a fenced code block. While a quote is
 * being rendered, code handlers park their fence in `context.breakouts` and
 * return a placeholder. The outermost quote splits its body on those
 * placeholders, quotes the text segments and puts each fence back between them
 * unquoted. Inner quotes leave placeholders untouched so fences escape every
 * level of nesting.
 */

import {
  BREAKOUT_PLACEHOLDER_RE,
  breakoutPlaceholder,
  renderChildren,
  type ConversionContext,
  type ConvertFn,
} from "../conversion.js";
import type { StorageElement } from "../storage-tree.js";

function quoteLines(text: string): string {
  return text
    .split("\n")
    .map((line) => (line ? `> ${line}` : ">"))
    .join("\n");
}

/** Emit a fence, or park it as a breakout when inside a quote. */
export function emitFence(code: string, language: string, context: ConversionContext): string {
  const fence = "```" + language + "\n" + code + "\n```";
  if (context.quoteDepth > 0) {
    const index = context.breakouts.push(fence) - 1;
    return breakoutPlaceholder(index) + "\n\n";
  }
  return fence + "\n\n";
}

export function renderQuoted(
  body: StorageElement | undefined,
  title: string,
  convert: ConvertFn,
  context: ConversionContext
): string {
  const outermost = context.quoteDepth === 0;
  context.quoteDepth++;
  const rendered = body ? renderChildren(body, convert) : "";
  context.quoteDepth--;

  // split() with a capture group alternates text segments and fence indexes.
  const pieces = rendered.split(BREAKOUT_PLACEHOLDER_RE);
  const parts: string[] = [];
  pieces.forEach((piece, i) => {
    if (i % 2 === 1) {
      const index = Number(piece);
      parts.push(outermost ? context.breakouts[index] ?? "" : breakoutPlaceholder(index));
      return;
    }
    const text = piece.trim().replace(/\n{3,}/g, "\n\n");
    const lines = [i === 0 && title ? `**${title}**` : "", text].filter(Boolean);
    if (lines.length) parts.push(quoteLines(lines.join("\n")));
  });

  const out = parts.filter(Boolean).join("\n\n");
  return out ? out + "\n\n" : "";
}
