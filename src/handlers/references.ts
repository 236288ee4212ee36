/**
 * Confluence references: `ac:link` targets, user mentions, task items and
 * timestamps.
 */

import type { Handler } from "../conversion.js";
import { decodeLiteralPayload, LITERAL_MARKER_ATTR, LITERAL_MARKER_VALUE } from "../preprocess.js";
import { attr, byName, findDescendant, isElement, plainText, textContent, type StorageElement } from "../storage-tree.js";
import { UNKNOWN_USER_MENTION, userMention } from "../mentions.js";

/** Server instances use `ri:userkey`, Cloud `ri:account-id`; very old pages `ri:username`. */
const USER_KEY_ATTRS = ["ri:userkey", "ri:account-id", "ri:username"];

export function renderUserReference(user: StorageElement | undefined): string {
  if (!user) return UNKNOWN_USER_MENTION;
  for (const name of USER_KEY_ATTRS) {
    const key = attr(user, name)?.trim();
    if (key) return userMention(key);
  }
  return UNKNOWN_USER_MENTION;
}

export const userReference: Handler = (node) => renderUserReference(node);

function linkBody(node: StorageElement, convert: (n: StorageElement) => string): string {
  for (const child of node.children) {
    if (isElement(child, "ac:plain-text-link-body")) {
      const raw = textContent(child);
      const literal = attr(child, LITERAL_MARKER_ATTR) === LITERAL_MARKER_VALUE ? decodeLiteralPayload(raw) : raw;
      return literal.replace(/\s+/g, " ").trim();
    }
    if (isElement(child, "ac:link-body")) return convert(child).trim();
  }
  return "";
}

/**
 * `ac:link`: user mention, page, attachment or URL. Pages and attachments
 * render as their visible text; there is nothing to link to in the target.
 */
export const confluenceLink: Handler = (node, convert) => {
  const user = findDescendant(node, byName("ri:user"));
  if (user) return renderUserReference(user);

  const body = linkBody(node, convert);
  const page = findDescendant(node, byName("ri:page"));
  if (page) return body || (attr(page, "ri:content-title") ?? "");

  const attachment = findDescendant(node, byName("ri:attachment"));
  if (attachment) return body || (attr(attachment, "ri:filename") ?? "");

  const url = findDescendant(node, byName("ri:url"));
  const href = url ? attr(url, "ri:value") ?? "" : "";
  if (href) return `[${body || href}](${href})`;
  return body;
};

export const task: Handler = (node) => {
  let status = "";
  let body = "";
  for (const child of node.children) {
    if (isElement(child, "ac:task-status")) status = plainText(child);
    if (isElement(child, "ac:task-body")) body = plainText(child);
  }
  const box = status === "complete" ? "[x]" : "[ ]";
  return `* ${box} ${body}\n`;
};

export const timestamp: Handler = (node) => attr(node, "datetime") ?? "";
