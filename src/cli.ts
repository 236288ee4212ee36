#!/usr/bin/env node
/**
 * canvas-bridge CLI entrypoint
 *
 * Why: Turn Confluence pages into Slack canvases from the terminal, or convert
 * saved storage files offline.
 *
 * How: Subcommands dispatch to dedicated modules. Settings come from
 * process.env, loaded from `.env` first.
 */

import dotenv from "dotenv";
import { convertFile } from "./commands/convert.js";
import { initEnv } from "./commands/init.js";

dotenv.config();

function printHelp() {
  console.log(
    [
      "canvas-bridge",
      "",
      "Usage:",
      "  canvas-bridge init                                   # Create .env, .gitignore and git repo",
      "  canvas-bridge convert <file> [--out dir]             # Convert a storage-format file offline",
      "  canvas-bridge sync [--page-id id] [--channel-id id]  # Convert a page and create a canvas",
      "                     [--no-canvas]                     # Only write the Markdown file",
      "",
      "Env:",
      "  CONFLUENCE_BASE_URL, CONFLUENCE_EMAIL+CONFLUENCE_API_TOKEN | CONFLUENCE_ACCESS_TOKEN | CONFLUENCE_COOKIE",
      "  SLACK_BOT_TOKEN, JIRA_BASE_URL, CANVAS_MAX_HEADING_LEVEL, CANVAS_CALLOUT_STYLE, OUTPUT_DIR",
    ].join("\n")
  );
}

async function main() {
  const [, , cmd, ...args] = process.argv;
  switch (cmd) {
    case "init":
      await initEnv({ cwd: process.cwd() });
      break;
    case "convert":
      convertFile({ cwd: process.cwd(), args });
      break;
    case "sync":
      {
        // enquirer and the service clients are only needed here
        const { syncPage } = await import("./commands/sync.js");
        await syncPage({ cwd: process.cwd(), args });
      }
      break;
    case "-h":
    case "--help":
    default:
      printHelp();
  }
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
