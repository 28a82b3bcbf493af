// Console reporter utilities: line formatting for command output.
// Functions return lines; commands decide where they go.

import chalk from "chalk";
import type { CacheData } from "../core/types.js";
import type { CacheInfo } from "../core/cache.js";

export type ListKind = "tools" | "resources" | "prompts" | "all";

export const LIST_KINDS: readonly ListKind[] = ["tools", "resources", "prompts", "all"];

export function isListKind(value: string): value is ListKind {
  return LIST_KINDS.some((kind) => kind === value);
}

export interface FormatOptions {
  json: boolean;
  color: boolean;
}

/**
 * One line per item: `tool:<name>`, `resource:<uri>`, `prompt:<name>`, or
 * the item as compact JSON.
 */
export function formatListing(data: CacheData, kind: ListKind, options: FormatOptions): string[] {
  const lines: string[] = [];
  const include = (k: Exclude<ListKind, "all">) => kind === "all" || kind === k;

  if (include("tools")) {
    for (const tool of data.tools) lines.push(formatItem("tool", tool.name, tool, options));
  }
  if (include("resources")) {
    for (const res of data.resources) lines.push(formatItem("resource", res.uri, res, options));
  }
  if (include("prompts")) {
    for (const prompt of data.prompts) {
      lines.push(formatItem("prompt", prompt.name, prompt, options));
    }
  }

  return lines;
}

function formatItem(prefix: string, label: string, item: unknown, options: FormatOptions): string {
  if (options.json) return JSON.stringify(item);
  return (options.color ? chalk.dim(prefix + ":") : prefix + ":") + label;
}

export function formatCacheInfo(info: CacheInfo): string[] {
  if (info.totalFiles === 0) {
    return ["Cache is empty", `Cache directory: ${info.cacheDir}`];
  }

  const lines = [
    `Cache directory: ${info.cacheDir}`,
    `Total files: ${info.totalFiles}`,
    `Total size: ${info.totalSize} bytes (${(info.totalSize / 1024).toFixed(2)} KB)`,
    "",
    "Cache entries:",
  ];

  for (const file of info.files) {
    lines.push(
      `  ${file.name}:`,
      `    Size: ${file.size} bytes`,
      `    Modified: ${formatTimestamp(file.modifiedTime)}`,
      `    Tools: ${file.toolsCount}, Resources: ${file.resourcesCount}, ` +
        `Prompts: ${file.promptsCount}`,
      ""
    );
  }

  return lines;
}

/** Local time as `YYYY-MM-DD HH:MM:SS`. */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}
