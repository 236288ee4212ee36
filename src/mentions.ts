/**
 * User mention placeholders and their caller-side enrichment.
 *
 * The converter only knows the storage user key. Turning it into something a
 * reader recognizes needs network lookups, so it happens after conversion.
 */

export const UNKNOWN_USER_MENTION = "@[unknown user]";

const MENTION_RE = /@\[user:([^\]\s]+)\]/g;

export function userMention(userKey: string): string {
  return `@[user:${userKey}]`;
}

export function listMentionedUsers(markdown: string): string[] {
  const keys = new Set<string>();
  for (const match of markdown.matchAll(MENTION_RE)) {
    if (match[1]) keys.add(match[1]);
  }
  return Array.from(keys);
}

export type ResolveUserDisplayName = (userKey: string) => Promise<string | undefined>;

/**
 * Replace every `@[user:KEY]` with the resolver's answer. Keys are resolved
 * once each, in order of first appearance. A key the resolver cannot answer
 * (undefined or a thrown error) keeps its placeholder.
 */
export async function enrichMentions(markdown: string, resolve: ResolveUserDisplayName): Promise<string> {
  const resolved = new Map<string, string>();
  for (const key of listMentionedUsers(markdown)) {
    try {
      const name = await resolve(key);
      if (name) resolved.set(key, name);
    } catch (err) {
      console.warn(`[mentions] Could not resolve user ${key}:`, err instanceof Error ? err.message : err);
    }
  }
  return markdown.replace(MENTION_RE, (placeholder, key: string) => resolved.get(key) ?? placeholder);
}
