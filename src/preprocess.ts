/**
 * Raw storage HTML preparation and final Markdown cleanup.
 *
 * Why: linkedom parses storage HTML in HTML mode, where a CDATA section is read
 * as a comment and dropped, and where `<ri:attachment ... />` does not close
 * itself. Both have to be fixed on the string before the tree is built.
 */

/** Attribute set on literal bodies whose payload was protected here. */
export const LITERAL_MARKER_ATTR = "data-literal";
export const LITERAL_MARKER_VALUE = "entities";

// The body may not run past its own closing tag.
const LITERAL_WRAPPER_RE =
  /<(ac:plain-text-body|ac:plain-text-link-body)\b[^>]*>((?:(?!<\/\1>)[\s\S])*)<\/\1>/gi;

const CDATA_SECTION_RE = /<!\[CDATA\[([\s\S]*?)\]\]>/g;

const FENCE_LINE_RE = /^\s*```/;

const VOID_ELEMENTS = new Set([
  "area", "base", "br", "col", "embed", "hr", "img", "input", "link", "meta", "source", "track", "wbr",
]);

const SELF_CLOSING_RE = /<([a-zA-Z][\w:.-]*)((?:\s+[^\s"'<>/=]+(?:\s*=\s*(?:"[^"]*"|'[^']*'|[^\s"'<>]+))?)*)\s*\/>/g;

export function encodeLiteralPayload(payload: string): string {
  return payload.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

export function decodeLiteralPayload(encoded: string): string {
  return encoded.replace(/&lt;/g, "<").replace(/&gt;/g, ">").replace(/&amp;/g, "&");
}

/**
 * Concatenated payload of a literal body: CDATA sections verbatim, any text
 * between them entity-decoded. A `]]>` inside code is stored by splitting it
 * across two sections, so every section has to be joined.
 */
function literalPayload(content: string): string {
  let payload = "";
  let last = 0;
  for (const match of content.matchAll(CDATA_SECTION_RE)) {
    const start = match.index ?? 0;
    payload += decodeLiteralPayload(content.slice(last, start)) + (match[1] ?? "");
    last = start + match[0].length;
  }
  return payload + decodeLiteralPayload(content.slice(last));
}

/**
 * Replace the CDATA payload of every literal body with its entity-encoded form.
 * Bodies without CDATA are left as they are.
 *
 * The encoded payload is itself written as markup text (its `&` escaped once
 * more), so after the parser decodes entities the tree holds exactly the
 * encoded payload, and the wrapper carries `data-literal="entities"` for the
 * reader to reverse it with {@link decodeLiteralPayload}.
 */
export function protectLiteralPayloads(html: string): string {
  return html.replace(LITERAL_WRAPPER_RE, (match, tag: string, content: string) => {
    if (!content.includes("<![CDATA[")) return match;
    const encoded = encodeLiteralPayload(literalPayload(content)).replace(/&/g, "&amp;");
    return `<${tag} ${LITERAL_MARKER_ATTR}="${LITERAL_MARKER_VALUE}">${encoded}</${tag}>`;
  });
}

/** Rewrite `<x:y a="b"/>` as `<x:y a="b"></x:y>` for every non-void element. */
export function expandSelfClosingTags(html: string): string {
  return html.replace(SELF_CLOSING_RE, (match, tag: string, attrs: string) => {
    if (VOID_ELEMENTS.has(tag.toLowerCase())) return match;
    return `<${tag}${attrs}></${tag}>`;
  });
}

export function preprocessStorage(html: string): string {
  return expandSelfClosingTags(protectLiteralPayloads(html));
}

/**
 * Collapse blank-line runs to a single blank line and trim the document.
 * Whitespace-only lines count as blank. Lines inside fenced blocks are kept
 * exactly as they are.
 */
export function postprocessMarkdown(markdown: string): string {
  const out: string[] = [];
  let inFence = false;
  let blank = false;
  for (const line of markdown.split("\n")) {
    const fence = FENCE_LINE_RE.test(line);
    if (inFence || fence) {
      if (fence) inFence = !inFence;
      out.push(line);
      blank = false;
      continue;
    }
    if (line.trim() === "") {
      if (!blank) out.push("");
      blank = true;
      continue;
    }
    out.push(line);
    blank = false;
  }
  return out.join("\n").trim();
}
