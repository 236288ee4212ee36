/**
 * Confluence REST client helpers.
 *
 * Why: Centralize HTTP handling and auth headers for the endpoints the sync
 * command needs: page storage with its author, attachment bytes and user
 * lookups for mention enrichment.
 *
 * How: v1 content API (`/rest/api`), available on Server/Data Center and on
 * Cloud under `/wiki`. The base URL includes that context path.
 */

import { URL } from "url";

export interface ConfluenceClientOptions {
  baseUrl: string;
  email?: string;
  apiToken?: string;
  accessToken?: string; // optional bearer alternative
  cookie?: string; // raw Cookie header for SSO-fronted servers
}

interface ContentResponse {
  id?: string;
  title?: string;
  body?: { storage?: { value?: string } };
  history?: { createdBy?: { username?: string; displayName?: string } };
}

export interface ConfluencePage {
  id: string;
  title: string;
  storageHtml: string;
  author: string;
}

export interface ConfluenceUser {
  username?: string;
  displayName?: string;
  email?: string;
}

function buildAuthHeader(opts: ConfluenceClientOptions): Record<string, string> {
  const headers: Record<string, string> = {};
  if (opts.email && opts.apiToken) {
    const b64 = Buffer.from(`${opts.email}:${opts.apiToken}`).toString("base64");
    headers.Authorization = `Basic ${b64}`;
  } else if (opts.accessToken) {
    headers.Authorization = `Bearer ${opts.accessToken}`;
  }
  if (opts.cookie) headers.Cookie = opts.cookie;
  return headers;
}

export class ConfluenceClient {
  private readonly base: string;
  private readonly headers: Record<string, string>;

  constructor(opts: ConfluenceClientOptions) {
    this.base = opts.baseUrl.replace(/\/$/, "");
    this.headers = {
      Accept: "application/json",
      ...buildAuthHeader(opts),
    };
  }

  private build(pathname: string, query: Record<string, string | undefined> = {}): string {
    const u = new URL(this.base + pathname);
    for (const [k, v] of Object.entries(query)) {
      if (v !== undefined) u.searchParams.set(k, v);
    }
    return u.toString();
  }

  async getPage(pageId: string): Promise<ConfluencePage> {
    const url = this.build(`/rest/api/content/${encodeURIComponent(pageId)}`, { expand: "body.storage,history" });
    const res = await fetch(url, { headers: this.headers });
    if (!res.ok) throw new Error(`getPage ${pageId} failed: ${res.status} ${res.statusText}`);
    const data: ContentResponse = await res.json();
    const createdBy = data.history?.createdBy;
    return {
      id: data.id ?? pageId,
      title: data.title || `Page ${pageId}`,
      storageHtml: data.body?.storage?.value ?? "",
      author: createdBy?.username || createdBy?.displayName || "Unknown",
    };
  }

  async downloadAttachment(pageId: string, filename: string): Promise<Buffer> {
    const url = this.build(`/download/attachments/${encodeURIComponent(pageId)}/${encodeURIComponent(filename)}`);
    const res = await fetch(url, { headers: { ...this.headers, Accept: "*/*" } });
    if (!res.ok) throw new Error(`downloadAttachment ${filename} failed: ${res.status} ${res.statusText}`);
    return Buffer.from(await res.arrayBuffer());
  }

  /** Look up a user by storage user key. Unknown users resolve to undefined. */
  async getUser(userKey: string): Promise<ConfluenceUser | undefined> {
    const url = this.build(`/rest/api/user`, { key: userKey });
    const res = await fetch(url, { headers: this.headers });
    if (!res.ok) return undefined;
    const data: ConfluenceUser = await res.json();
    return data;
  }
}

export function fromEnv(env: NodeJS.ProcessEnv = process.env): ConfluenceClient {
  const baseUrl = env.CONFLUENCE_BASE_URL || env.CONFLUENCE_URL || "";
  if (!baseUrl) throw new Error("CONFLUENCE_BASE_URL (or CONFLUENCE_URL) must be set");
  return new ConfluenceClient({
    baseUrl,
    email: env.CONFLUENCE_EMAIL,
    apiToken: env.CONFLUENCE_API_TOKEN,
    accessToken: env.CONFLUENCE_ACCESS_TOKEN,
    cookie: env.CONFLUENCE_COOKIE,
  });
}
