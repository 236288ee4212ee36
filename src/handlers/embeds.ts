/**
 * Image and multimedia embeds (first, pure phase).
 *
 * Attachment embeds are recorded as requests with a placeholder in the draft;
 * `resolveEmbeds` fetches and publishes them afterwards.
 */

import { embedPlaceholder, type Handler } from "../conversion.js";
import { attr, byName, findDescendant } from "../storage-tree.js";

export const attachmentEmbed: Handler = (node, _convert, context) => {
  const inline = context.cellDepth > 0;
  const end = inline ? "" : "\n\n";
  const attachment = findDescendant(node, byName("ri:attachment"));
  if (attachment) {
    const filename = attr(attachment, "ri:filename")?.trim();
    if (!filename) return "";
    const index = context.embeds.length;
    context.embeds.push({ index, filename, inline });
    return embedPlaceholder(index) + end;
  }
  // External images need no re-hosting.
  const url = findDescendant(node, byName("ri:url"));
  const src = url ? attr(url, "ri:value")?.trim() : undefined;
  return src ? `![](${src})${end}` : "";
};
