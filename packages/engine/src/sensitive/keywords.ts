/**
 * Sensitive keyword lists.
 */

import { existsSync, readFileSync } from "node:fs";
import { isAbsolute, resolve } from "node:path";

import { logger } from "../logger.js";

/** Used when no keyword file is configured or the file is missing. */
export const DEFAULT_SENSITIVE_KEYWORDS: readonly string[] = [
  "password",
  "secret",
  "token",
  "ssn",
  "phone",
  "national_id",
];

/**
 * Parse a keyword file's content. Content containing a comma is read as a
 * comma-separated list, anything else as one keyword per line. Keywords are
 * trimmed and lower-cased; blanks and duplicates are dropped.
 */
export function parseKeywordList(content: string): string[] {
  const text = content.trim();
  const parts = text.includes(",") ? text.split(",") : text.split(/\r?\n/);
  const seen = new Set<string>();
  for (const part of parts) {
    const kw = part.trim().toLowerCase();
    if (kw) seen.add(kw);
  }
  return [...seen];
}

/**
 * Load keywords from `file` (resolved against `baseDir` when relative).
 * Falls back to DEFAULT_SENSITIVE_KEYWORDS when no file is given or it
 * cannot be read.
 */
export function loadSensitiveKeywords(file?: string, baseDir: string = process.cwd()): string[] {
  if (!file) return [...DEFAULT_SENSITIVE_KEYWORDS];

  const path = isAbsolute(file) ? file : resolve(baseDir, file);
  if (!existsSync(path)) {
    logger.warn(`Sensitive keywords file not found: ${path}. Using built-in defaults.`);
    return [...DEFAULT_SENSITIVE_KEYWORDS];
  }

  try {
    return parseKeywordList(readFileSync(path, "utf-8"));
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    logger.warn(`Could not read sensitive keywords file ${path}: ${detail}. Using built-in defaults.`);
    return [...DEFAULT_SENSITIVE_KEYWORDS];
  }
}
