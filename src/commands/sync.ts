/**
 * Sync one Confluence page into a Slack canvas.
 *
 * How: fetch storage and author, convert with attachments re-hosted on Slack,
 * resolve mentions, save `<output>/<title>.md`, then create the canvas in the
 * chosen channel. Missing page or channel ids are prompted for.
 */

import fs from "fs";
import path from "path";
import enquirer from "enquirer";
import { fromEnv } from "../api.js";
import {
  composeCanvasMarkdown,
  composeMarkdownFile,
  createAttachmentBridge,
  createMentionResolver,
  sanitizeFilename,
} from "../canvas.js";
import { loadSettings } from "../config.js";
import { convertStorageToMarkdown } from "../converter.js";
import { enrichMentions } from "../mentions.js";
import { slackFromEnv } from "../slack.js";
import { optionValue } from "./args.js";

const { prompt } = enquirer;

export interface SyncOptions {
  cwd: string;
  args?: string[];
}

async function ask(name: string, message: string): Promise<string> {
  const answer = await prompt<Record<string, string>>({
    type: "input",
    name,
    message,
    validate: (v: string) => (v.trim() ? true : "Required"),
  });
  return (answer[name] ?? "").trim();
}

export async function syncPage(opts: SyncOptions): Promise<void> {
  const args = opts.args ?? [];
  const noCanvas = args.includes("--no-canvas");

  const settings = loadSettings();
  const confluence = fromEnv();
  const slack = noCanvas && !process.env.SLACK_BOT_TOKEN ? undefined : slackFromEnv();

  const pageId = optionValue(args, "--page-id", "-p") ?? (await ask("pageId", "Confluence page id"));
  let channelId = optionValue(args, "--channel-id", "-c");
  if (!noCanvas && !channelId) channelId = await ask("channelId", "Slack channel id");

  console.log(`[sync] Fetching page ${pageId}`);
  const page = await confluence.getPage(pageId);

  const body = await convertStorageToMarkdown(page.storageHtml, {
    ...settings.converter,
    collaborators: slack ? createAttachmentBridge(confluence, slack, pageId) : undefined,
  });
  const enriched = await enrichMentions(body, createMentionResolver(confluence, slack));
  const canvasMarkdown = composeCanvasMarkdown(page.author, enriched);

  const outDir = path.resolve(opts.cwd, settings.outputDir);
  fs.mkdirSync(outDir, { recursive: true });
  const file = path.join(outDir, `${sanitizeFilename(page.title)}.md`);
  fs.writeFileSync(file, composeMarkdownFile(page.title, canvasMarkdown), "utf8");
  console.log(`[sync] Saved ${path.relative(opts.cwd, file) || file}`);

  if (noCanvas || !slack || !channelId) return;
  const canvasId = await slack.createCanvas(channelId, page.title, canvasMarkdown);
  console.log(`[sync] Created canvas ${canvasId} in ${channelId}`);
}
