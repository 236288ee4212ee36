import { describe, it, expect, vi } from "vitest";
import {
  composeCanvasMarkdown,
  composeMarkdownFile,
  createAttachmentBridge,
  createMentionResolver,
  sanitizeFilename,
} from "../canvas.js";
import { convertStorageToMarkdown } from "../converter.js";

describe("sanitizeFilename", () => {
  it("replaces characters unsafe in file names", () => {
    expect(sanitizeFilename('Q3: plan/review?')).toBe("Q3_ plan_review_");
  });

  it("falls back for blank titles", () => {
    expect(sanitizeFilename("   ")).toBe("untitled");
  });
});

describe("document composition", () => {
  it("puts the author line above the body", () => {
    const canvas = composeCanvasMarkdown("jdoe", "Body");
    expect(canvas).toBe("_Original Author: jdoe_\n\nBody");
    expect(composeMarkdownFile("Release notes", canvas)).toBe("# Release notes\n\n_Original Author: jdoe_\n\nBody\n");
  });
});

describe("createMentionResolver", () => {
  const confluence = {
    getUser: vi.fn(async (key: string) =>
      key === "k1" ? { username: "ada", displayName: "Ada L", email: "ada@example.com" } : undefined
    ),
  };

  it("mentions the matching Slack member", async () => {
    const slack = { lookupUserByEmail: vi.fn(async () => "U123") };
    expect(await createMentionResolver(confluence, slack)("k1")).toBe("![](@U123)");
    expect(slack.lookupUserByEmail).toHaveBeenCalledWith("ada@example.com");
  });

  it("falls back to the display name", async () => {
    const slack = { lookupUserByEmail: vi.fn(async (): Promise<string | undefined> => undefined) };
    expect(await createMentionResolver(confluence, slack)("k1")).toBe("@Ada L");
    expect(await createMentionResolver(confluence)("k1")).toBe("@Ada L");
  });

  it("leaves unknown users unresolved", async () => {
    expect(await createMentionResolver(confluence)("nobody")).toBeUndefined();
  });
});

describe("createAttachmentBridge", () => {
  it("downloads from the page and uploads to Slack", async () => {
    const confluence = { downloadAttachment: vi.fn(async (_pageId: string, _name: string) => Buffer.from("png")) };
    const slack = { uploadFile: vi.fn(async (_name: string, _data: Buffer) => "https://team.example.com/files/F1") };
    const out = await convertStorageToMarkdown(`<ac:image><ri:attachment ri:filename="a.png" /></ac:image>`, {
      collaborators: createAttachmentBridge(confluence, slack, "42"),
    });
    expect(out).toBe("![a.png](https://team.example.com/files/F1)");
    expect(confluence.downloadAttachment).toHaveBeenCalledWith("42", "a.png");
    expect(slack.uploadFile).toHaveBeenCalledWith("a.png", Buffer.from("png"));
  });
});
