/**
 * Convert a saved storage-format file to canvas Markdown without any network.
 *
 * Attachment embeds are dropped and mentions stay as placeholders, since both
 * need the services that `sync` talks to.
 */

import fs from "fs";
import path from "path";
import { loadSettings } from "../config.js";
import { convertStorageOffline } from "../converter.js";
import { optionValue, positionals } from "./args.js";

export interface ConvertFileOptions {
  cwd: string;
  args?: string[];
}

export function convertFile(opts: ConvertFileOptions): string {
  const args = opts.args ?? [];
  const [input] = positionals(args, ["--out", "-o"]);
  if (!input) throw new Error("Usage: convert <storage.html> [--out dir]");

  const settings = loadSettings();
  const source = path.resolve(opts.cwd, input);
  const html = fs.readFileSync(source, "utf8");
  const markdown = convertStorageOffline(html, settings.converter);

  const outDir = path.resolve(opts.cwd, optionValue(args, "--out", "-o") ?? settings.outputDir);
  fs.mkdirSync(outDir, { recursive: true });
  const target = path.join(outDir, `${path.basename(source, path.extname(source))}.md`);
  fs.writeFileSync(target, markdown + "\n", "utf8");
  console.log(`[convert] Wrote ${path.relative(opts.cwd, target) || target}`);
  return target;
}
