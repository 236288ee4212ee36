/**
 * Storage tree model.
 *
 * Why: Handlers should not read `tagName`/`childNodes` off DOM objects.
 * We parse storage HTML once with linkedom and copy it into a small immutable
 * tree of text and element nodes that the converter can switch on.
 */

import { parseHTML } from "linkedom";

export interface StorageText {
  readonly kind: "text";
  readonly value: string;
  /** Text inside a literal context (code bodies, `pre`): never whitespace-collapsed. */
  readonly raw: boolean;
}

export interface StorageElement {
  readonly kind: "element";
  readonly name: string;
  readonly attributes: Readonly<Record<string, string>>;
  readonly children: readonly StorageNode[];
}

export type StorageNode = StorageText | StorageElement;

/** Elements whose text content is a literal payload. */
const LITERAL_CONTEXTS = new Set(["ac:plain-text-body", "ac:plain-text-link-body", "pre"]);

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;

// Structural view of what we read from linkedom nodes.
interface DomNode {
  readonly nodeType: number;
  readonly textContent: string | null;
  readonly childNodes: ArrayLike<DomNode>;
}

interface DomElement extends DomNode {
  readonly tagName: string;
  getAttributeNames(): string[];
  getAttribute(name: string): string | null;
}

function isDomElement(node: DomNode): node is DomElement {
  return node.nodeType === ELEMENT_NODE;
}

export function text(value: string, raw = false): StorageText {
  return { kind: "text", value, raw };
}

export function element(
  name: string,
  attributes: Record<string, string> = {},
  children: StorageNode[] = []
): StorageElement {
  return { kind: "element", name, attributes, children };
}

/**
 * Parse (already preprocessed) storage HTML into a storage tree rooted at a
 * synthetic `body` element. Comments and processing instructions are dropped.
 */
export function parseStorageTree(html: string): StorageElement {
  const documentHtml = /<body[\s>]/i.test(html)
    ? html
    : `<!DOCTYPE html><html><head></head><body>${html}</body></html>`;
  const { document } = parseHTML(documentHtml);
  const body: DomNode | null = document.body;
  if (!body) return element("body");
  return element("body", {}, fromDomChildren(body, false));
}

function fromDomChildren(parent: DomNode, raw: boolean): StorageNode[] {
  const out: StorageNode[] = [];
  for (const child of Array.from(parent.childNodes)) {
    const node = fromDom(child, raw);
    if (node) out.push(node);
  }
  return out;
}

function fromDom(node: DomNode, raw: boolean): StorageNode | undefined {
  if (node.nodeType === TEXT_NODE) {
    return text(node.textContent ?? "", raw);
  }
  if (!isDomElement(node)) return undefined;
  const name = node.tagName.toLowerCase();
  const attributes: Record<string, string> = {};
  for (const attrName of node.getAttributeNames()) {
    attributes[attrName.toLowerCase()] = node.getAttribute(attrName) ?? "";
  }
  return element(name, attributes, fromDomChildren(node, raw || LITERAL_CONTEXTS.has(name)));
}

export function isElement(node: StorageNode, name?: string): node is StorageElement {
  return node.kind === "element" && (name === undefined || node.name === name);
}

export function attr(node: StorageElement, name: string): string | undefined {
  return node.attributes[name];
}

/** Depth-first, document-order search for the first matching descendant. */
export function findDescendant(
  node: StorageElement,
  predicate: (el: StorageElement) => boolean
): StorageElement | undefined {
  for (const child of node.children) {
    if (child.kind !== "element") continue;
    if (predicate(child)) return child;
    const nested = findDescendant(child, predicate);
    if (nested) return nested;
  }
  return undefined;
}

export function byName(name: string): (el: StorageElement) => boolean {
  return (el) => el.name === name;
}

export function hasDescendant(node: StorageElement, names: ReadonlySet<string>): boolean {
  return findDescendant(node, (el) => names.has(el.name)) !== undefined;
}

/** Concatenated text of every text node below `node`, untouched. */
export function textContent(node: StorageNode): string {
  if (node.kind === "text") return node.value;
  return node.children.map(textContent).join("");
}

/** Text content with non-breaking spaces and whitespace runs normalized, trimmed. */
export function plainText(node: StorageNode): string {
  return textContent(node).replace(/\u00a0/g, " ").replace(/\s+/g, " ").trim();
}

/**
 * Value of the `ac:parameter` child named `name` of a macro element, trimmed.
 * Only direct parameters count, so nested macros cannot leak theirs.
 */
export function macroParameter(macro: StorageElement, name: string): string | undefined {
  for (const child of macro.children) {
    if (isElement(child, "ac:parameter") && attr(child, "ac:name") === name) {
      return plainText(child);
    }
  }
  return undefined;
}

/** The direct body child (`ac:plain-text-body` or `ac:rich-text-body`) of a macro. */
export function macroBody(macro: StorageElement, name: "ac:plain-text-body" | "ac:rich-text-body"): StorageElement | undefined {
  for (const child of macro.children) {
    if (isElement(child, name)) return child;
  }
  return undefined;
}
