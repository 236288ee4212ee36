/**
 * Initialize a working directory for syncing pages to canvases.
 *
 * Why: Credentials for two services are needed before `sync` can run, and the
 * rendered Markdown lands in a local folder that should stay out of git.
 * How: git init if needed, keep `.env` and the output folder ignored, then
 * write a commented `.env` or append the keys it is missing.
 */

import fs from "fs";
import path from "path";
import { simpleGit } from "simple-git";

export interface InitOptions {
  cwd: string;
}

interface EnvKey {
  key: string;
  comment?: string;
  value?: string;
}

const ENV_KEYS: EnvKey[] = [
  { key: "CONFLUENCE_BASE_URL", comment: "# Confluence (required for sync)\n# Base URL example: https://wiki.example.com or https://your-domain.atlassian.net/wiki" },
  { key: "CONFLUENCE_EMAIL", comment: "# Auth: email+API token, a personal access token, or a raw Cookie header" },
  { key: "CONFLUENCE_API_TOKEN" },
  { key: "CONFLUENCE_ACCESS_TOKEN" },
  { key: "CONFLUENCE_COOKIE" },
  { key: "SLACK_BOT_TOKEN", comment: "\n# Slack bot token with canvases:write, files:write and users:read.email" },
  { key: "JIRA_BASE_URL", comment: "\n# Issue links for jira macros, e.g. https://jira.example.com" },
  { key: "CANVAS_MAX_HEADING_LEVEL", comment: "\n# Conversion (optional)", value: "3" },
  { key: "CANVAS_CALLOUT_STYLE", comment: "# blockquote or markers", value: "blockquote" },
  { key: "OUTPUT_DIR", value: "output" },
];

export function renderEnvTemplate(): string {
  const lines: string[] = [];
  for (const { key, comment, value } of ENV_KEYS) {
    if (comment) lines.push(comment);
    lines.push(`${key}=${value ?? ""}`);
  }
  return lines.join("\n") + "\n";
}

async function initGitRepo(opts: InitOptions): Promise<void> {
  if (fs.existsSync(path.resolve(opts.cwd, ".git"))) {
    console.log(`[init] Git repository already initialized`);
    return;
  }
  const git = simpleGit({ baseDir: opts.cwd });
  await git.init();
  console.log(`[init] Initialized git repository`);
}

/** Ensure `.env` and the output folder are ignored. */
export function ensureGitignore(opts: InitOptions, outputDir = "output"): void {
  const gitignorePath = path.resolve(opts.cwd, ".gitignore");
  const wanted = [".env", `${outputDir.replace(/\/+$/, "")}/`];

  if (!fs.existsSync(gitignorePath)) {
    const content = ["# Credentials", wanted[0], "", "# Rendered canvases", wanted[1], ""].join("\n");
    fs.writeFileSync(gitignorePath, content, "utf8");
    console.log(`[init] Created .gitignore`);
    return;
  }

  const existing = fs.readFileSync(gitignorePath, "utf8");
  const have = new Set(
    existing
      .split(/\r?\n/)
      .map((l) => l.trim())
      .filter((l) => l && !l.startsWith("#"))
  );
  const missing = wanted.filter((e) => !have.has(e));
  if (missing.length === 0) {
    console.log(`[init] .gitignore already up to date`);
    return;
  }
  const updated = existing.replace(/\s*$/, "\n") + "\n# Added by init\n" + missing.join("\n") + "\n";
  fs.writeFileSync(gitignorePath, updated, "utf8");
  console.log(`[init] Added ${missing.join(", ")} to .gitignore`);
}

/** Write the template, or append only the keys an existing `.env` lacks. */
export function createOrUpdateEnv(opts: InitOptions): void {
  const envPath = path.resolve(opts.cwd, ".env");
  if (!fs.existsSync(envPath)) {
    fs.writeFileSync(envPath, renderEnvTemplate(), "utf8");
    console.log(`[init] Wrote .env`);
    return;
  }

  const existing = fs.readFileSync(envPath, "utf8");
  const have = new Set(
    existing
      .split(/\r?\n/)
      .map((l) => l.trim())
      .filter((l) => !l.startsWith("#") && /^[A-Z0-9_]+=/.test(l))
      .map((l) => l.split("=", 1)[0])
  );
  const missing = ENV_KEYS.filter(({ key }) => !have.has(key));
  if (missing.length === 0) {
    console.log(`[init] .env already contains all known keys`);
    return;
  }
  const appendix = ["", "# Added by init", ...missing.map(({ key, value }) => `${key}=${value ?? ""}`)];
  fs.writeFileSync(envPath, existing.replace(/\s*$/, "\n") + appendix.join("\n") + "\n", "utf8");
  console.log(`[init] Added ${missing.map(({ key }) => key).join(", ")} to .env`);
}

export async function initEnv(opts: InitOptions): Promise<void> {
  await initGitRepo(opts);
  ensureGitignore(opts, process.env.OUTPUT_DIR || "output");
  createOrUpdateEnv(opts);
}
