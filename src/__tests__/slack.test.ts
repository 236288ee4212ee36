import { afterEach, describe, it, expect, vi } from "vitest";
import { SlackClient, slackFromEnv } from "../slack.js";

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), { status: 200, headers: { "Content-Type": "application/json" } });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("SlackClient", () => {
  const client = new SlackClient("test-token", "https://slack.example.com/api");

  it("uploads a file in three steps and returns its permalink", async () => {
    const fetchMock = vi.fn(async (url: string, _init?: RequestInit) => {
      if (url.endsWith("/files.getUploadURLExternal")) {
        return jsonResponse({ ok: true, upload_url: "https://upload.example.com/u1", file_id: "F1" });
      }
      if (url === "https://upload.example.com/u1") return new Response("OK");
      return jsonResponse({ ok: true, files: [{ id: "F1", permalink: "https://team.example.com/files/F1" }] });
    });
    vi.stubGlobal("fetch", fetchMock);

    expect(await client.uploadFile("a.png", Buffer.from("png"))).toBe("https://team.example.com/files/F1");
    expect(fetchMock.mock.calls.map(([url]) => url)).toEqual([
      "https://slack.example.com/api/files.getUploadURLExternal",
      "https://upload.example.com/u1",
      "https://slack.example.com/api/files.completeUploadExternal",
    ]);
    expect(fetchMock.mock.calls[0][1]?.body).toBe("filename=a.png&length=3");
    expect(fetchMock.mock.calls[2][1]?.body).toBe(
      new URLSearchParams({ files: JSON.stringify([{ id: "F1", title: "a.png" }]) }).toString()
    );
  });

  it("creates a markdown canvas in a channel", async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => jsonResponse({ ok: true, canvas_id: "C9" }));
    vi.stubGlobal("fetch", fetchMock);

    expect(await client.createCanvas("C123", "Runbook", "# Hi")).toBe("C9");
    const init = fetchMock.mock.calls[0][1];
    expect(init?.headers).toEqual({
      Authorization: "Bearer test-token",
      "Content-Type": "application/json; charset=utf-8",
    });
    expect(init?.body).toBe(
      JSON.stringify({ title: "Runbook", channel_id: "C123", document_content: { type: "markdown", markdown: "# Hi" } })
    );
  });

  it("throws on an error response", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ ok: false, error: "not_allowed" })));
    await expect(client.createCanvas("C123", "T", "x")).rejects.toThrow("canvases.create failed: not_allowed");
  });

  it("looks users up by e-mail", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async (_url: string, init?: RequestInit) =>
        init?.body === "email=ada%40example.com"
          ? jsonResponse({ ok: true, user: { id: "U123" } })
          : jsonResponse({ ok: false, error: "users_not_found" })
      )
    );
    expect(await client.lookupUserByEmail("ada@example.com")).toBe("U123");
    expect(await client.lookupUserByEmail("nobody@example.com")).toBeUndefined();
  });
});

describe("slackFromEnv", () => {
  it("requires a bot token", () => {
    expect(() => slackFromEnv({})).toThrow("SLACK_BOT_TOKEN must be set");
  });
});
