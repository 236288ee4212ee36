/**
 * Glue between the converter and the two services.
 *
 * Why: The converter only sees abstract collaborators. This module binds them
 * to Confluence downloads and Slack uploads, resolves mentions through both
 * user directories and composes the final canvas document.
 */

import type { ConfluenceClient } from "./api.js";
import type { EmbedCollaborators } from "./embeds.js";
import type { ResolveUserDisplayName } from "./mentions.js";
import type { SlackClient } from "./slack.js";

export interface AttachmentHandle {
  filename: string;
  data: Buffer;
}

type AttachmentSource = Pick<ConfluenceClient, "downloadAttachment">;
type UserDirectory = Pick<ConfluenceClient, "getUser">;

export function createAttachmentBridge(
  confluence: AttachmentSource,
  slack: Pick<SlackClient, "uploadFile">,
  pageId: string
): EmbedCollaborators<AttachmentHandle> {
  return {
    async fetchBinaryByName(filename) {
      const data = await confluence.downloadAttachment(pageId, filename);
      return { filename, data };
    },
    publishBinary(handle) {
      return slack.uploadFile(handle.filename, handle.data);
    },
  };
}

/**
 * Slack members are mentioned with `![](@U123)`; anyone without a Slack
 * account matched by e-mail falls back to `@displayName`.
 */
export function createMentionResolver(
  confluence: UserDirectory,
  slack?: Pick<SlackClient, "lookupUserByEmail">
): ResolveUserDisplayName {
  return async (userKey) => {
    const user = await confluence.getUser(userKey);
    if (!user) return undefined;
    if (slack && user.email) {
      const slackId = await slack.lookupUserByEmail(user.email);
      if (slackId) return `![](@${slackId})`;
    }
    const name = user.displayName || user.username;
    return name ? `@${name}` : undefined;
  };
}

/** Replace characters that are unsafe in file names on common platforms. */
export function sanitizeFilename(name: string): string {
  const cleaned = name.replace(/[\\/:*?"<>|\u0000-\u001f]/g, "_").trim();
  return cleaned || "untitled";
}

export function composeCanvasMarkdown(author: string, body: string): string {
  return `_Original Author: ${author}_\n\n${body}`;
}

export function composeMarkdownFile(title: string, canvasMarkdown: string): string {
  return `# ${title}\n\n${canvasMarkdown}\n`;
}
