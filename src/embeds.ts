/**
 * Second conversion phase: resolve attachment embeds.
 *
 * Each request is fetched by filename and published; the returned reference
 * replaces the placeholder. Any failure only blanks that one embed.
 */

import { EMBED_PLACEHOLDER_RE, type MarkdownDraft } from "./conversion.js";

export interface EmbedCollaborators<Handle> {
  fetchBinaryByName(filename: string): Promise<Handle | undefined>;
  publishBinary(handle: Handle, filename: string): Promise<string | undefined>;
}

export function renderEmbed(filename: string, reference: string, inline = false): string {
  return `![${filename}](${reference})` + (inline ? "" : "\n\n");
}

async function publishOne<Handle>(
  filename: string,
  collaborators: EmbedCollaborators<Handle>
): Promise<string | undefined> {
  try {
    const handle = await collaborators.fetchBinaryByName(filename);
    if (handle === undefined) {
      console.warn(`[embed] Attachment not available: ${filename}`);
      return undefined;
    }
    const reference = await collaborators.publishBinary(handle, filename);
    if (!reference) {
      console.warn(`[embed] Publishing failed: ${filename}`);
      return undefined;
    }
    return reference;
  } catch (err) {
    console.warn(`[embed] ${filename}:`, err instanceof Error ? err.message : err);
    return undefined;
  }
}

/**
 * Substitute every embed placeholder in the draft. Requests are handled
 * sequentially in document order; a filename seen before reuses its result.
 * Without collaborators every embed renders empty.
 */
export async function resolveEmbeds<Handle>(
  draft: MarkdownDraft,
  collaborators?: EmbedCollaborators<Handle>
): Promise<string> {
  const byFilename = new Map<string, string | undefined>();
  const byIndex = new Map<number, string>();
  for (const request of draft.embeds) {
    if (!byFilename.has(request.filename)) {
      byFilename.set(request.filename, collaborators ? await publishOne(request.filename, collaborators) : undefined);
    }
    const reference = byFilename.get(request.filename);
    byIndex.set(request.index, reference ? renderEmbed(request.filename, reference, request.inline) : "");
  }
  return draft.markdown.replace(EMBED_PLACEHOLDER_RE, (_m, index: string) => byIndex.get(Number(index)) ?? "");
}
