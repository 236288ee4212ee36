/**
 * Converter settings from the environment.
 *
 * Client credentials are read by `fromEnv`/`slackFromEnv` next to each client;
 * this module covers what shapes the Markdown and where it is written.
 */

import type { CalloutStyle, ConverterOptions } from "./conversion.js";

export interface Settings {
  converter: ConverterOptions;
  outputDir: string;
}

const CALLOUT_STYLES: readonly CalloutStyle[] = ["blockquote", "markers"];

function isCalloutStyle(value: string): value is CalloutStyle {
  return CALLOUT_STYLES.some((style) => style === value);
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const converter: ConverterOptions = {
    siteBaseUrl: env.CONFLUENCE_BASE_URL || env.CONFLUENCE_URL || "",
    issueTrackerBaseUrl: env.JIRA_BASE_URL || "",
  };

  const headingLevel = env.CANVAS_MAX_HEADING_LEVEL?.trim();
  if (headingLevel) {
    const level = Number(headingLevel);
    if (!Number.isInteger(level) || level < 1 || level > 6) {
      throw new Error(`CANVAS_MAX_HEADING_LEVEL must be an integer from 1 to 6, got "${headingLevel}"`);
    }
    converter.maxHeadingLevel = level;
  }

  const style = env.CANVAS_CALLOUT_STYLE?.trim().toLowerCase();
  if (style) {
    if (!isCalloutStyle(style)) {
      throw new Error(`CANVAS_CALLOUT_STYLE must be one of ${CALLOUT_STYLES.join(", ")}, got "${style}"`);
    }
    converter.calloutStyle = style;
  }

  return { converter, outputDir: env.OUTPUT_DIR || "output" };
}
