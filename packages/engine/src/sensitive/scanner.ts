/**
 * Sensitive-field scanner.
 *
 * Samples the newest log records for an API and reports which sensitive
 * keywords appear in their header or body text.
 */

import { InvalidInputError } from "../errors.js";
import { logger } from "../logger.js";
import { round2 } from "../math.js";
import type { LogStore } from "../sources/log-store.js";
import type { KeywordExposure, LogRecord, SensitiveExposure } from "../types.js";
import { DEFAULT_SENSITIVE_KEYWORDS } from "./keywords.js";

export const DEFAULT_SAMPLE_SIZE = 1000;

/**
 * Count keyword occurrences over already-fetched records. Matching is a
 * case-insensitive substring test; keywords are expected lower-cased.
 */
export function scanRecords(records: readonly LogRecord[], keywords: readonly string[]): SensitiveExposure {
  const total = records.length;
  const tallies = keywords.map((keyword) => ({ keyword, count: 0, inHeaders: 0, inBody: 0 }));

  for (const record of records) {
    const headers = record.headerText.toLowerCase();
    const body = record.bodyText.toLowerCase();
    for (const t of tallies) {
      const inHeaders = headers.includes(t.keyword);
      const inBody = body.includes(t.keyword);
      if (!inHeaders && !inBody) continue;
      t.count++;
      if (inHeaders) t.inHeaders++;
      if (inBody) t.inBody++;
    }
  }

  const sensitiveKeywords: Record<string, KeywordExposure> = Object.fromEntries(
    tallies
      .filter((t) => t.count > 0)
      .map((t): [string, KeywordExposure] => [
        t.keyword,
        {
          count: t.count,
          percentage: round2((t.count / total) * 100),
          inHeaders: t.inHeaders,
          inBody: t.inBody,
          exists: true,
        },
      ]),
  );

  return {
    totalLogsChecked: total,
    sensitiveKeywords,
    hasSensitiveData: Object.keys(sensitiveKeywords).length > 0,
  };
}

export interface SensitiveFieldScannerOptions {
  logStore: LogStore;
  keywords?: readonly string[];
}

export class SensitiveFieldScanner {
  private logStore: LogStore;
  private keywords: string[];

  constructor(options: SensitiveFieldScannerOptions) {
    this.logStore = options.logStore;
    this.keywords = [
      ...new Set((options.keywords ?? DEFAULT_SENSITIVE_KEYWORDS).map((k) => k.trim().toLowerCase()).filter(Boolean)),
    ];
  }

  /**
   * Scan the newest `sampleSize` records of an API. A failed fetch yields an
   * error-flagged record with zero counts instead of throwing.
   */
  async scan(entityId: string, sampleSize: number = DEFAULT_SAMPLE_SIZE): Promise<SensitiveExposure> {
    if (!Number.isInteger(sampleSize) || sampleSize < 1) {
      throw new InvalidInputError(`Sample size must be a positive integer, got ${sampleSize}`);
    }

    let records: LogRecord[];
    try {
      records = await this.logStore.fetchRecentRecords(entityId, sampleSize);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      logger.warn(`Sensitive-field sample for ${entityId} unavailable: ${detail}`);
      return { error: detail, totalLogsChecked: 0, sensitiveKeywords: {}, hasSensitiveData: false };
    }

    logger.debug(`scanning ${records.length} records of ${entityId} for ${this.keywords.length} keywords`);
    return scanRecords(records.slice(0, sampleSize), this.keywords);
  }
}
