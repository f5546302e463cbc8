/**
 * Timeline and hour-of-day heatmap parsing for a single API.
 */

import { z } from "zod";

import { logger } from "../logger.js";
import type { HourlyDistribution, TimelinePoint } from "../types.js";
import { hourOfDay } from "./aggregator.js";

export const TIMELINE_AGG = "timeline";
export const HOURLY_AGG = "by_hour";

/** Histogram intervals accepted by the timeline query. */
export const TIMELINE_INTERVALS = ["1m", "5m", "1h", "1d"] as const;
export type TimelineInterval = (typeof TIMELINE_INTERVALS)[number];

const INTERVALS: ReadonlySet<string> = new Set(TIMELINE_INTERVALS);

export function isTimelineInterval(v: string): v is TimelineInterval {
  return INTERVALS.has(v);
}

const TimelineBucketSchema = z.object({
  key_as_string: z.string(),
  doc_count: z.number().nonnegative().catch(0),
  avg_response_time: z.object({ value: z.number() }).catch({ value: 0 }),
  error_count: z.object({ doc_count: z.number().nonnegative() }).catch({ doc_count: 0 }),
});

const HistogramBucketSchema = z.object({
  key_as_string: z.string(),
  doc_count: z.number().nonnegative().catch(0),
});

function bucketsUnder(raw: unknown, name: string): unknown[] {
  const parsed = z
    .object({ aggregations: z.record(z.object({ buckets: z.array(z.unknown()) })) })
    .safeParse(raw);
  if (!parsed.success) return [];
  return parsed.data.aggregations[name]?.buckets ?? [];
}

/**
 * Requests, mean latency and errors per histogram interval.
 */
export function parseTimeline(raw: unknown): TimelinePoint[] {
  const points: TimelinePoint[] = [];
  for (const b of bucketsUnder(raw, TIMELINE_AGG)) {
    const parsed = TimelineBucketSchema.safeParse(b);
    if (!parsed.success) continue;
    points.push({
      timestamp: parsed.data.key_as_string,
      requests: parsed.data.doc_count,
      avgResponseTime: parsed.data.avg_response_time.value,
      errors: parsed.data.error_count.doc_count,
    });
  }
  return points;
}

/**
 * Fold an hourly histogram into 24 hour-of-day slots for a heatmap.
 * Buckets whose timestamp carries no readable hour are skipped.
 */
export function hourlyDistribution(raw: unknown): HourlyDistribution {
  const slots = new Array<number>(24).fill(0);
  for (const b of bucketsUnder(raw, HOURLY_AGG)) {
    const parsed = HistogramBucketSchema.safeParse(b);
    if (!parsed.success) continue;
    const hour = hourOfDay(parsed.data.key_as_string);
    if (hour === null) {
      logger.debug(`skipping unreadable bucket timestamp '${parsed.data.key_as_string}'`);
      continue;
    }
    slots[hour] += parsed.data.doc_count;
  }

  return {
    hourlyDistribution: slots,
    maxTraffic: Math.max(...slots),
    totalRequests: slots.reduce((sum, n) => sum + n, 0),
  };
}
