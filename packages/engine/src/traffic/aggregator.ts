/**
 * Traffic statistics aggregator.
 *
 * Turns a log-store aggregation response (one bucket per API, each with
 * hourly, actor, latency and status sub-aggregations) into a flat
 * TrafficStats record per API.
 *
 * Every sub-aggregation is read defensively: a missing or malformed field
 * falls back to 0 or an empty list and never drops the whole API record.
 */

import { z } from "zod";

import {
  BURST_MULTIPLIER,
  PEAK_HOURS_COUNT,
  TOP_ACTORS_LIMIT,
} from "../calibration.js";
import { InvalidInputError } from "../errors.js";
import { logger } from "../logger.js";
import { round2 } from "../math.js";
import type { ActorCount, TrafficStats } from "../types.js";

// ---------------------------------------------------------------------------
// Aggregation names (shared with the query builders)
// ---------------------------------------------------------------------------

export const AGG = {
  entities: "apis",
  name: "api_name",
  byHour: "by_hour",
  uniqueIps: "unique_ips",
  uniqueUsers: "unique_users",
  topIps: "top_ips",
  topUsers: "top_users",
  avgResponseTime: "avg_response_time",
  statusCodes: "status_codes",
  errorCount: "error_count",
} as const;

const HOUR_MS = 3_600_000;

// ---------------------------------------------------------------------------
// Lenient bucket schemas
// ---------------------------------------------------------------------------

const BucketListSchema = z.object({ buckets: z.array(z.unknown()) });

const TermBucketSchema = z.object({
  key: z.union([z.string(), z.number()]).transform(String),
  doc_count: z.number().nonnegative().catch(0),
});

const HourBucketSchema = z.object({
  key_as_string: z.string().optional().catch(undefined),
  doc_count: z.number().nonnegative().catch(0),
});

export type HourBucket = z.infer<typeof HourBucketSchema>;

const MetricValueSchema = z.object({ value: z.number() });
const DocCountSchema = z.object({ doc_count: z.number().nonnegative() });

const EntityBucketSchema = z
  .object({
    key: z.union([z.string(), z.number()]).transform(String),
    doc_count: z.number().nonnegative().catch(0),
  })
  .passthrough();

const AggregationResponseSchema = z.object({
  aggregations: z.object({
    [AGG.entities]: BucketListSchema,
  }),
});

/** Parse each bucket of a terms/histogram aggregation, dropping bad ones. */
function bucketsOf<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, agg: unknown): T[] {
  const list = BucketListSchema.safeParse(agg);
  if (!list.success) return [];
  const out: T[] = [];
  for (const raw of list.data.buckets) {
    const parsed = schema.safeParse(raw);
    if (parsed.success) out.push(parsed.data);
  }
  return out;
}

function metricValue(agg: unknown): number {
  const parsed = MetricValueSchema.safeParse(agg);
  return parsed.success && Number.isFinite(parsed.data.value) ? parsed.data.value : 0;
}

function filteredCount(agg: unknown): number {
  const parsed = DocCountSchema.safeParse(agg);
  return parsed.success ? parsed.data.doc_count : 0;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Hour of day encoded in a bucket timestamp string, e.g. 14 for
 * "2025-11-10T14:00:00.000Z" or "2025-11-10 14:00:00". The date and any
 * offset are ignored. Returns null when the string has no readable hour.
 */
export function hourOfDay(timestamp: string): number | null {
  const sep = timestamp.includes("T") ? "T" : " ";
  const idx = timestamp.indexOf(sep);
  if (idx === -1) return null;
  const hourPart = timestamp.slice(idx + 1).split(":")[0];
  if (!/^\d{1,2}$/.test(hourPart)) return null;
  const hour = Number(hourPart);
  return hour <= 23 ? hour : null;
}

/**
 * Top hours of day by accumulated volume, returned ascending. Rank only
 * decides which hours are kept.
 */
export function peakHoursOf(hourly: HourBucket[]): number[] {
  const byHour = new Map<number, number>();
  for (const b of hourly) {
    if (!b.key_as_string) continue;
    const hour = hourOfDay(b.key_as_string);
    if (hour === null) {
      logger.debug(`skipping unreadable bucket timestamp '${b.key_as_string}'`);
      continue;
    }
    byHour.set(hour, (byHour.get(hour) ?? 0) + b.doc_count);
  }

  // Array.prototype.sort is stable: equal counts keep first-seen order.
  return [...byHour.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, PEAK_HOURS_COUNT)
    .map(([hour]) => hour)
    .sort((a, b) => a - b);
}

function busiestBucket(hourly: HourBucket[]): HourBucket | null {
  let best: HourBucket | null = null;
  for (const b of hourly) {
    if (best === null || b.doc_count > best.doc_count) best = b;
  }
  return best;
}

function topActors(agg: unknown): ActorCount[] {
  return bucketsOf(TermBucketSchema, agg)
    .slice(0, TOP_ACTORS_LIMIT)
    .map((b) => ({ actor: b.key, count: b.doc_count }));
}

/** Hours covered by the range, never less than one. */
export function rangeHours(start: Date, end: Date): number {
  return Math.max((end.getTime() - start.getTime()) / HOUR_MS, 1);
}

export function assertValidRange(start: Date, end: Date): void {
  if (Number.isNaN(start.getTime()) || Number.isNaN(end.getTime())) {
    throw new InvalidInputError("Date range contains an invalid date");
  }
  if (end.getTime() < start.getTime()) {
    throw new InvalidInputError(
      `End date ${end.toISOString()} is before start date ${start.toISOString()}`,
    );
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/** The record produced for an API with no traffic in the range. */
export function emptyTrafficStats(entityName = "Unknown"): TrafficStats {
  return {
    entityName,
    totalRequests: 0,
    avgRequestsPerHour: 0,
    maxRequestsPerHour: 0,
    maxRequestsPerMinute: 0,
    peakHour: null,
    peakHours: [],
    uniqueIps: 0,
    uniqueUsers: 0,
    topIps: [],
    topUsers: [],
    avgResponseTimeMs: 0,
    statusCodes: {},
    errorCount: 0,
    errorRate: 0,
    successRate: 100,
  };
}

/**
 * Build TrafficStats for a single API bucket.
 */
export function statsFromBucket(
  bucket: Record<string, unknown>,
  totalRequests: number,
  hours: number,
): TrafficStats {
  const nameBuckets = bucketsOf(TermBucketSchema, bucket[AGG.name]);
  const hourly = bucketsOf(HourBucketSchema, bucket[AGG.byHour]);

  // An API with no documents has no busiest hour, whatever buckets came back.
  const busiest = totalRequests > 0 ? busiestBucket(hourly) : null;
  const maxRequestsPerHour = busiest?.doc_count ?? 0;

  const statusCodes: Record<string, number> = {};
  for (const sc of bucketsOf(TermBucketSchema, bucket[AGG.statusCodes])) {
    statusCodes[sc.key] = sc.doc_count;
  }

  const errorCount = filteredCount(bucket[AGG.errorCount]);
  const errorRate = totalRequests > 0 ? (errorCount / totalRequests) * 100 : 0;

  return {
    entityName: nameBuckets[0]?.key ?? "Unknown",
    totalRequests,
    avgRequestsPerHour: round2(totalRequests / hours),
    maxRequestsPerHour,
    maxRequestsPerMinute: Math.floor((maxRequestsPerHour / 60) * BURST_MULTIPLIER),
    peakHour: busiest?.key_as_string ?? null,
    peakHours: totalRequests > 0 ? peakHoursOf(hourly) : [],
    uniqueIps: Math.trunc(metricValue(bucket[AGG.uniqueIps])),
    uniqueUsers: Math.trunc(metricValue(bucket[AGG.uniqueUsers])),
    topIps: topActors(bucket[AGG.topIps]),
    topUsers: topActors(bucket[AGG.topUsers]),
    avgResponseTimeMs: round2(metricValue(bucket[AGG.avgResponseTime])),
    statusCodes,
    errorCount,
    errorRate: round2(errorRate),
    successRate: round2(100 - errorRate),
  };
}

/**
 * Aggregate a raw traffic aggregation response into per-API statistics.
 *
 * Throws InvalidInputError for a reversed or unparseable date range. A
 * response without the expected top-level aggregation yields an empty map.
 */
export function aggregateTrafficStats(
  raw: unknown,
  start: Date,
  end: Date,
): Record<string, TrafficStats> {
  assertValidRange(start, end);

  const parsed = AggregationResponseSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn("traffic aggregation response has no per-API buckets");
    return {};
  }

  const hours = rangeHours(start, end);
  // Entries rather than assignment, so ids such as "__proto__" stay own keys.
  const entries: [string, TrafficStats][] = [];

  for (const rawBucket of parsed.data.aggregations[AGG.entities].buckets) {
    const bucket = EntityBucketSchema.safeParse(rawBucket);
    if (!bucket.success) {
      logger.debug("skipping API bucket without a key");
      continue;
    }
    entries.push([bucket.data.key, statsFromBucket(bucket.data, bucket.data.doc_count, hours)]);
  }

  return Object.fromEntries(entries);
}
