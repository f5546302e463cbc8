/**
 * Pluggable log-store interface.
 *
 * The engine never talks to a search cluster directly. Traffic aggregation,
 * sensitive-field sampling and timelines all go through a LogStore.
 */

import type { TimelineInterval } from "../traffic/timeline.js";
import type { DateRange, LogRecord } from "../types.js";

// ---------------------------------------------------------------------------
// Field mapping
// ---------------------------------------------------------------------------

/** Names of the log document fields the queries read. */
export interface LogFieldMap {
  entity: string;
  name: string;
  clientIp: string;
  user: string;
  responseTime: string;
  status: string;
  headers: string;
  body: string;
  timestamp: string;
}

export const DEFAULT_FIELDS: LogFieldMap = {
  entity: "api",
  name: "apn",
  clientIp: "hr1ra.keyword",
  user: "uok.keyword",
  responseTime: "trt",
  status: "sc",
  headers: "fcrh",
  body: "fcrb",
  timestamp: "@timestamp",
};

// ---------------------------------------------------------------------------
// Interface
// ---------------------------------------------------------------------------

export interface LogStore {
  /** Human-readable name for logs and errors, e.g. "elasticsearch". */
  readonly name: string;

  /**
   * Raw per-API aggregation response for the range, optionally filtered to
   * one API. Shape: `{ aggregations: { apis: { buckets: [...] } } }`.
   * Throws UpstreamUnavailableError when the store cannot answer.
   */
  fetchTrafficAggregation(range: DateRange, entityId?: string): Promise<unknown>;

  /** The newest `limit` records for an API, newest first. */
  fetchRecentRecords(entityId: string, limit: number): Promise<LogRecord[]>;

  /** Raw `{ aggregations: { timeline: { buckets } } }` response. */
  fetchTimeline(entityId: string, range: DateRange, interval: TimelineInterval): Promise<unknown>;

  /** Raw `{ aggregations: { by_hour: { buckets } } }` response. */
  fetchHourlyHistogram(entityId: string, range: DateRange): Promise<unknown>;
}
