/**
 * Elasticsearch log store.
 *
 * Talks to the `_search` endpoint via native fetch. Query bodies are built by
 * the exported pure functions below so they can be inspected in tests.
 */

import { z } from "zod";

import { ERROR_STATUS_THRESHOLD } from "../calibration.js";
import { UpstreamUnavailableError } from "../errors.js";
import { logger } from "../logger.js";
import { AGG } from "../traffic/aggregator.js";
import { HOURLY_AGG, TIMELINE_AGG, type TimelineInterval } from "../traffic/timeline.js";
import type { DateRange, LogRecord } from "../types.js";
import { DEFAULT_FIELDS, type LogFieldMap, type LogStore } from "./log-store.js";

const SOURCE = "elasticsearch";
const DEFAULT_URL = "http://localhost:9200";
export const DEFAULT_INDEX_PATTERN = "gateway-logs-*";

/** Upper bound on distinct APIs returned by one aggregation. */
const MAX_ENTITY_BUCKETS = 10_000;
const TOP_TERMS_SIZE = 10;
const STATUS_TERMS_SIZE = 20;

export interface ElasticsearchOptions {
  url?: string;
  indexPattern?: string;
  username?: string;
  password?: string;
  fields?: Partial<LogFieldMap>;
}

type Query = Record<string, unknown>;

// ---------------------------------------------------------------------------
// Query builders
// ---------------------------------------------------------------------------

function rangeClause(range: DateRange, fields: LogFieldMap): Query {
  return {
    range: {
      [fields.timestamp]: {
        gte: range.start.toISOString(),
        lte: range.end.toISOString(),
      },
    },
  };
}

function errorFilter(fields: LogFieldMap): Query {
  return { filter: { range: { [fields.status]: { gte: ERROR_STATUS_THRESHOLD } } } };
}

export function buildTrafficQuery(
  range: DateRange,
  entityId: string | undefined,
  fields: LogFieldMap = DEFAULT_FIELDS,
): Query {
  const must: Query[] = [rangeClause(range, fields)];
  if (entityId) must.push({ term: { [fields.entity]: entityId } });

  return {
    size: 0,
    query: { bool: { must } },
    aggs: {
      [AGG.entities]: {
        terms: { field: fields.entity, size: MAX_ENTITY_BUCKETS },
        aggs: {
          [AGG.name]: { terms: { field: fields.name, size: 1 } },
          [AGG.byHour]: {
            date_histogram: { field: fields.timestamp, fixed_interval: "1h" },
          },
          [AGG.uniqueIps]: { cardinality: { field: fields.clientIp } },
          [AGG.uniqueUsers]: { cardinality: { field: fields.user } },
          [AGG.topIps]: { terms: { field: fields.clientIp, size: TOP_TERMS_SIZE } },
          [AGG.topUsers]: { terms: { field: fields.user, size: TOP_TERMS_SIZE } },
          [AGG.avgResponseTime]: { avg: { field: fields.responseTime } },
          [AGG.statusCodes]: { terms: { field: fields.status, size: STATUS_TERMS_SIZE } },
          [AGG.errorCount]: errorFilter(fields),
        },
      },
    },
  };
}

export function buildRecentRecordsQuery(
  entityId: string,
  limit: number,
  fields: LogFieldMap = DEFAULT_FIELDS,
): Query {
  return {
    size: limit,
    query: { bool: { must: [{ term: { [fields.entity]: entityId } }] } },
    sort: [{ [fields.timestamp]: "desc" }],
    _source: [fields.headers, fields.body, fields.timestamp],
  };
}

export function buildTimelineQuery(
  entityId: string,
  range: DateRange,
  interval: TimelineInterval,
  fields: LogFieldMap = DEFAULT_FIELDS,
): Query {
  return {
    size: 0,
    query: {
      bool: { must: [{ term: { [fields.entity]: entityId } }, rangeClause(range, fields)] },
    },
    aggs: {
      [TIMELINE_AGG]: {
        date_histogram: { field: fields.timestamp, fixed_interval: interval },
        aggs: {
          avg_response_time: { avg: { field: fields.responseTime } },
          error_count: errorFilter(fields),
        },
      },
    },
  };
}

export function buildHourlyQuery(
  entityId: string,
  range: DateRange,
  fields: LogFieldMap = DEFAULT_FIELDS,
): Query {
  return {
    size: 0,
    query: {
      bool: { must: [{ term: { [fields.entity]: entityId } }, rangeClause(range, fields)] },
    },
    aggs: {
      [HOURLY_AGG]: {
        date_histogram: { field: fields.timestamp, calendar_interval: "hour" },
      },
    },
  };
}

// ---------------------------------------------------------------------------
// Response parsing
// ---------------------------------------------------------------------------

const HitsResponseSchema = z.object({
  hits: z.object({
    hits: z.array(z.object({ _source: z.record(z.unknown()).catch({}) }).passthrough()),
  }),
});

function asText(value: unknown): string {
  if (value === undefined || value === null) return "";
  if (typeof value === "string") return value;
  return JSON.stringify(value);
}

/** Map a search response's hits onto LogRecords, in response order. */
export function parseRecentRecords(
  raw: unknown,
  fields: LogFieldMap = DEFAULT_FIELDS,
): LogRecord[] {
  const parsed = HitsResponseSchema.safeParse(raw);
  if (!parsed.success) return [];
  return parsed.data.hits.hits.map((hit) => {
    const ts = hit._source[fields.timestamp];
    return {
      headerText: asText(hit._source[fields.headers]),
      bodyText: asText(hit._source[fields.body]),
      timestamp: typeof ts === "string" ? ts : null,
    };
  });
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

export class ElasticsearchLogStore implements LogStore {
  readonly name = SOURCE;
  private baseUrl: string;
  private indexPattern: string;
  private authHeader: string | undefined;
  private fields: LogFieldMap;

  constructor(options: ElasticsearchOptions = {}) {
    this.baseUrl = (options.url ?? DEFAULT_URL).replace(/\/$/, "");
    this.indexPattern = options.indexPattern ?? DEFAULT_INDEX_PATTERN;
    this.fields = { ...DEFAULT_FIELDS, ...options.fields };
    if (options.username) {
      const token = Buffer.from(`${options.username}:${options.password ?? ""}`).toString("base64");
      this.authHeader = `Basic ${token}`;
    }
  }

  async fetchTrafficAggregation(range: DateRange, entityId?: string): Promise<unknown> {
    return this.search(buildTrafficQuery(range, entityId, this.fields));
  }

  async fetchRecentRecords(entityId: string, limit: number): Promise<LogRecord[]> {
    const raw = await this.search(buildRecentRecordsQuery(entityId, limit, this.fields));
    return parseRecentRecords(raw, this.fields);
  }

  async fetchTimeline(
    entityId: string,
    range: DateRange,
    interval: TimelineInterval,
  ): Promise<unknown> {
    return this.search(buildTimelineQuery(entityId, range, interval, this.fields));
  }

  async fetchHourlyHistogram(entityId: string, range: DateRange): Promise<unknown> {
    return this.search(buildHourlyQuery(entityId, range, this.fields));
  }

  private async search(body: Query): Promise<unknown> {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.authHeader) headers.Authorization = this.authHeader;

    const url = `${this.baseUrl}/${this.indexPattern}/_search`;
    let response: Response;
    try {
      response = await fetch(url, { method: "POST", headers, body: JSON.stringify(body) });
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      logger.warn(`search request to ${this.baseUrl} failed: ${detail}`);
      throw new UpstreamUnavailableError(SOURCE, detail);
    }

    if (!response.ok) {
      const text = await response.text().catch(() => "");
      logger.warn(`search returned HTTP ${response.status}`);
      throw new UpstreamUnavailableError(SOURCE, text.slice(0, 200), response.status);
    }

    try {
      const data: unknown = await response.json();
      return data;
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      logger.warn(`search returned a body that is not JSON: ${detail}`);
      throw new UpstreamUnavailableError(SOURCE, "invalid JSON response", response.status);
    }
  }
}
