/**
 * In-memory log store.
 *
 * Holds individual log entries and computes the same aggregation shapes the
 * Elasticsearch store returns. Used by tests and by the CLI's offline
 * `--fixtures` mode.
 */

import { readFileSync } from "node:fs";

import { z } from "zod";

import { ERROR_STATUS_THRESHOLD } from "../calibration.js";
import { InvalidInputError } from "../errors.js";
import { AGG } from "../traffic/aggregator.js";
import { HOURLY_AGG, TIMELINE_AGG, type TimelineInterval } from "../traffic/timeline.js";
import type { DateRange, LogRecord } from "../types.js";
import type { LogStore } from "./log-store.js";

export const LogEntrySchema = z.object({
  entityId: z.string(),
  entityName: z.string().optional(),
  timestamp: z.string(),
  clientIp: z.string().optional(),
  user: z.string().optional(),
  responseTimeMs: z.number().nonnegative().optional(),
  status: z.number().int(),
  headers: z.string().default(""),
  body: z.string().default(""),
});

export type LogEntry = z.input<typeof LogEntrySchema>;
type ParsedEntry = z.output<typeof LogEntrySchema> & { at: number };

const FixtureFileSchema = z.object({ entries: z.array(LogEntrySchema) });

const INTERVAL_MS: Record<TimelineInterval, number> = {
  "1m": 60_000,
  "5m": 300_000,
  "1h": 3_600_000,
  "1d": 86_400_000,
};

// ---------------------------------------------------------------------------
// Aggregation helpers
// ---------------------------------------------------------------------------

interface TermBucket {
  key: string;
  doc_count: number;
}

/** Terms aggregation: count descending, then key ascending. */
function terms(values: Array<string | undefined>, size: number): { buckets: TermBucket[] } {
  const counts = new Map<string, number>();
  for (const v of values) {
    if (v === undefined) continue;
    counts.set(v, (counts.get(v) ?? 0) + 1);
  }
  const buckets = [...counts.entries()]
    .map(([key, doc_count]) => ({ key, doc_count }))
    .sort((a, b) => b.doc_count - a.doc_count || a.key.localeCompare(b.key))
    .slice(0, size);
  return { buckets };
}

function avg(values: Array<number | undefined>): { value: number | null } {
  const present = values.filter((v): v is number => v !== undefined);
  if (present.length === 0) return { value: null };
  return { value: present.reduce((s, v) => s + v, 0) / present.length };
}

function errorCount(entries: ParsedEntry[]): { doc_count: number } {
  return { doc_count: entries.filter((e) => e.status >= ERROR_STATUS_THRESHOLD).length };
}

/**
 * Fixed-interval histogram from the first to the last populated bucket,
 * empty buckets in between included.
 */
function histogram<T>(
  entries: ParsedEntry[],
  widthMs: number,
  extra: (inBucket: ParsedEntry[]) => T,
): Array<{ key_as_string: string; doc_count: number } & T> {
  if (entries.length === 0) return [];
  const slot = (at: number) => Math.floor(at / widthMs) * widthMs;
  const groups = new Map<number, ParsedEntry[]>();
  for (const e of entries) {
    const key = slot(e.at);
    const group = groups.get(key);
    if (group) group.push(e);
    else groups.set(key, [e]);
  }

  const keys = [...groups.keys()];
  const first = Math.min(...keys);
  const last = Math.max(...keys);
  const buckets: Array<{ key_as_string: string; doc_count: number } & T> = [];
  for (let key = first; key <= last; key += widthMs) {
    const inBucket = groups.get(key) ?? [];
    buckets.push({
      key_as_string: new Date(key).toISOString(),
      doc_count: inBucket.length,
      ...extra(inBucket),
    });
  }
  return buckets;
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

export class InMemoryLogStore implements LogStore {
  readonly name = "memory";
  private entries: ParsedEntry[];

  constructor(entries: LogEntry[] = []) {
    this.entries = entries.map((raw) => {
      const entry = LogEntrySchema.parse(raw);
      const at = Date.parse(entry.timestamp);
      if (Number.isNaN(at)) {
        throw new InvalidInputError(`Invalid log entry timestamp '${entry.timestamp}'`);
      }
      return { ...entry, at };
    });
  }

  /** Load entries from a JSON file of the form `{ "entries": [...] }`. */
  static fromFile(path: string): InMemoryLogStore {
    const parsed = FixtureFileSchema.safeParse(JSON.parse(readFileSync(path, "utf-8")));
    if (!parsed.success) {
      throw new InvalidInputError(`Invalid fixture file ${path}: ${parsed.error.issues[0]?.message ?? "unknown error"}`);
    }
    return new InMemoryLogStore(parsed.data.entries);
  }

  /** Distinct API ids present in the store, in first-seen order. */
  entityIds(): string[] {
    return [...new Set(this.entries.map((e) => e.entityId))];
  }

  async fetchTrafficAggregation(range: DateRange, entityId?: string): Promise<unknown> {
    const inRange = this.select(range, entityId);
    const byEntity = new Map<string, ParsedEntry[]>();
    for (const e of inRange) {
      const group = byEntity.get(e.entityId);
      if (group) group.push(e);
      else byEntity.set(e.entityId, [e]);
    }

    const buckets = [...byEntity.entries()]
      .sort((a, b) => b[1].length - a[1].length || a[0].localeCompare(b[0]))
      .map(([key, group]) => ({
        key,
        doc_count: group.length,
        [AGG.name]: terms(group.map((e) => e.entityName), 1),
        [AGG.byHour]: { buckets: histogram(group, INTERVAL_MS["1h"], () => ({})) },
        [AGG.uniqueIps]: { value: new Set(group.flatMap((e) => e.clientIp ?? [])).size },
        [AGG.uniqueUsers]: { value: new Set(group.flatMap((e) => e.user ?? [])).size },
        [AGG.topIps]: terms(group.map((e) => e.clientIp), 10),
        [AGG.topUsers]: terms(group.map((e) => e.user), 10),
        [AGG.avgResponseTime]: avg(group.map((e) => e.responseTimeMs)),
        [AGG.statusCodes]: terms(group.map((e) => String(e.status)), 20),
        [AGG.errorCount]: errorCount(group),
      }));

    return { aggregations: { [AGG.entities]: { buckets } } };
  }

  async fetchRecentRecords(entityId: string, limit: number): Promise<LogRecord[]> {
    return this.entries
      .filter((e) => e.entityId === entityId)
      .sort((a, b) => b.at - a.at)
      .slice(0, limit)
      .map((e) => ({ headerText: e.headers, bodyText: e.body, timestamp: e.timestamp }));
  }

  async fetchTimeline(
    entityId: string,
    range: DateRange,
    interval: TimelineInterval,
  ): Promise<unknown> {
    const buckets = histogram(this.select(range, entityId), INTERVAL_MS[interval], (inBucket) => ({
      avg_response_time: avg(inBucket.map((e) => e.responseTimeMs)),
      error_count: errorCount(inBucket),
    }));
    return { aggregations: { [TIMELINE_AGG]: { buckets } } };
  }

  async fetchHourlyHistogram(entityId: string, range: DateRange): Promise<unknown> {
    const buckets = histogram(this.select(range, entityId), INTERVAL_MS["1h"], () => ({}));
    return { aggregations: { [HOURLY_AGG]: { buckets } } };
  }

  private select(range: DateRange, entityId?: string): ParsedEntry[] {
    const from = range.start.getTime();
    const to = range.end.getTime();
    return this.entries.filter(
      (e) => e.at >= from && e.at <= to && (entityId === undefined || e.entityId === entityId),
    );
  }
}
