/**
 * Slack Web API client helpers.
 *
 * Why: Canvases cannot reference Confluence attachments, so images are
 * re-uploaded to Slack and linked by permalink. The same client creates the
 * canvas and finds Slack users for mentions.
 */

const SLACK_API_BASE = "https://slack.com/api";

interface SlackResponse {
  ok: boolean;
  error?: string;
}

interface UploadUrlResponse extends SlackResponse {
  upload_url?: string;
  file_id?: string;
}

interface CompleteUploadResponse extends SlackResponse {
  files?: Array<{ id?: string; permalink?: string }>;
}

interface CanvasResponse extends SlackResponse {
  canvas_id?: string;
}

interface LookupResponse extends SlackResponse {
  user?: { id?: string };
}

export class SlackClient {
  private readonly token: string;
  private readonly apiBase: string;

  constructor(token: string, apiBase: string = SLACK_API_BASE) {
    this.token = token;
    this.apiBase = apiBase.replace(/\/$/, "");
  }

  private async send<T extends SlackResponse>(method: string, body: string, contentType: string): Promise<T> {
    const res = await fetch(`${this.apiBase}/${method}`, {
      method: "POST",
      headers: { Authorization: `Bearer ${this.token}`, "Content-Type": contentType },
      body,
    });
    if (!res.ok) throw new Error(`${method} failed: ${res.status} ${res.statusText}`);
    const data: T = await res.json();
    return data;
  }

  private form<T extends SlackResponse>(method: string, fields: Record<string, string>): Promise<T> {
    return this.send<T>(method, new URLSearchParams(fields).toString(), "application/x-www-form-urlencoded");
  }

  private json<T extends SlackResponse>(method: string, payload: unknown): Promise<T> {
    return this.send<T>(method, JSON.stringify(payload), "application/json; charset=utf-8");
  }

  /** Upload a file through the external upload flow and return its permalink. */
  async uploadFile(filename: string, data: Buffer): Promise<string> {
    const ticket = await this.form<UploadUrlResponse>("files.getUploadURLExternal", {
      filename,
      length: String(data.length),
    });
    if (!ticket.ok || !ticket.upload_url || !ticket.file_id) {
      throw new Error(`files.getUploadURLExternal failed: ${ticket.error ?? "no upload url"}`);
    }

    const upload = await fetch(ticket.upload_url, { method: "POST", body: new Uint8Array(data) });
    if (!upload.ok) throw new Error(`upload of ${filename} failed: ${upload.status} ${upload.statusText}`);

    const done = await this.form<CompleteUploadResponse>("files.completeUploadExternal", {
      files: JSON.stringify([{ id: ticket.file_id, title: filename }]),
    });
    const permalink = done.files?.[0]?.permalink;
    if (!done.ok || !permalink) {
      throw new Error(`files.completeUploadExternal failed: ${done.error ?? "no permalink"}`);
    }
    return permalink;
  }

  async createCanvas(channelId: string, title: string, markdown: string): Promise<string> {
    const res = await this.json<CanvasResponse>("canvases.create", {
      title,
      channel_id: channelId,
      document_content: { type: "markdown", markdown },
    });
    if (!res.ok || !res.canvas_id) throw new Error(`canvases.create failed: ${res.error ?? "no canvas id"}`);
    return res.canvas_id;
  }

  /** Slack user id for an e-mail address, or undefined when nobody matches. */
  async lookupUserByEmail(email: string): Promise<string | undefined> {
    const res = await this.form<LookupResponse>("users.lookupByEmail", { email });
    if (!res.ok) {
      if (res.error === "users_not_found") return undefined;
      throw new Error(`users.lookupByEmail failed: ${res.error ?? "unknown error"}`);
    }
    return res.user?.id;
  }
}

export function slackFromEnv(env: NodeJS.ProcessEnv = process.env): SlackClient {
  const token = env.SLACK_BOT_TOKEN || "";
  if (!token) throw new Error("SLACK_BOT_TOKEN must be set");
  return new SlackClient(token, env.SLACK_API_BASE || SLACK_API_BASE);
}
