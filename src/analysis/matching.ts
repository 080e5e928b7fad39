/**
 * String and file matching helpers.
 */

import * as fs from "fs";
import { BOT_NAME_PATTERNS } from "./patterns";

/**
 * Return every non-empty field that matches at least one of the patterns, sorted.
 */
export function findPatternsInList(
  patterns: readonly RegExp[],
  ...fields: Array<string | null | undefined>
): string[] {
  const matches: string[] = [];

  for (const field of fields) {
    if (!field) continue;
    if (patterns.some((pattern) => pattern.test(field))) {
      matches.push(field);
    }
  }

  return matches.sort();
}

/**
 * Whether an account or author name belongs to a bot.
 */
export function isBotName(name: string): boolean {
  return findPatternsInList(BOT_NAME_PATTERNS, name).length > 0;
}

/**
 * Read a text file and return its lines with trailing whitespace removed.
 */
export function readLines(filePath: string): string[] {
  const content = fs.readFileSync(filePath, "utf-8");
  const lines = content.split(/\r?\n/);

  // A terminating newline does not start another line
  if (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }

  return lines.map((line) => line.trimEnd());
}
