import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { optionValue, positionals } from "../commands/args.js";
import { convertFile } from "../commands/convert.js";
import { createOrUpdateEnv, ensureGitignore, renderEnvTemplate } from "../commands/init.js";

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "canvas-bridge-"));
  vi.spyOn(console, "log").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("argument helpers", () => {
  it("reads option values in both spellings", () => {
    expect(optionValue(["--page-id", "42", "--no-canvas"], "--page-id", "-p")).toBe("42");
    expect(optionValue(["-p=7"], "--page-id", "-p")).toBe("7");
    expect(optionValue(["--page-id", "--no-canvas"], "--page-id")).toBeUndefined();
  });

  it("skips flags and option values when listing positionals", () => {
    expect(positionals(["page.html", "--out", "md", "--verbose"], ["--out"])).toEqual(["page.html"]);
  });
});

describe("init helpers", () => {
  it("writes the full .env template", () => {
    createOrUpdateEnv({ cwd: dir });
    expect(fs.readFileSync(path.join(dir, ".env"), "utf8")).toBe(renderEnvTemplate());
  });

  it("appends only missing keys to an existing .env", () => {
    const envPath = path.join(dir, ".env");
    const keys = renderEnvTemplate()
      .split("\n")
      .filter((l) => /^[A-Z0-9_]+=/.test(l))
      .map((l) => l.split("=", 1)[0]);
    fs.writeFileSync(envPath, keys.filter((k) => k !== "OUTPUT_DIR").map((k) => `${k}=x`).join("\n") + "\n");

    createOrUpdateEnv({ cwd: dir });
    const content = fs.readFileSync(envPath, "utf8");
    expect(content.endsWith("\n# Added by init\nOUTPUT_DIR=output\n")).toBe(true);
    expect(content.match(/^SLACK_BOT_TOKEN=/gm)).toHaveLength(1);
  });

  it("creates and extends .gitignore", () => {
    const gitignore = path.join(dir, ".gitignore");
    ensureGitignore({ cwd: dir });
    expect(fs.readFileSync(gitignore, "utf8")).toBe("# Credentials\n.env\n\n# Rendered canvases\noutput/\n");

    fs.writeFileSync(gitignore, "node_modules/\n.env\n");
    ensureGitignore({ cwd: dir }, "canvases");
    expect(fs.readFileSync(gitignore, "utf8")).toBe("node_modules/\n.env\n\n# Added by init\ncanvases/\n");
  });
});

describe("convertFile", () => {
  it("writes the converted Markdown next to the chosen output folder", () => {
    fs.writeFileSync(path.join(dir, "page.html"), "<h1>Title</h1><p>Body</p>");
    const target = convertFile({ cwd: dir, args: ["page.html", "--out", "md"] });
    expect(target).toBe(path.join(dir, "md", "page.md"));
    expect(fs.readFileSync(target, "utf8")).toBe("# Title\n\nBody\n");
  });

  it("requires an input file", () => {
    expect(() => convertFile({ cwd: dir, args: [] })).toThrow("Usage: convert <storage.html> [--out dir]");
  });
});
