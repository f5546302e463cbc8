/**
 * Derived traffic and exposure records shared across the engine.
 */

export interface DateRange {
  start: Date;
  end: Date;
}

export interface ActorCount {
  /** Client IP or user key. */
  actor: string;
  count: number;
}

export interface KeywordExposure {
  /** Sampled records containing the keyword in either field. */
  count: number;
  /** count / totalLogsChecked × 100, two decimals. */
  percentage: number;
  inHeaders: number;
  inBody: number;
  exists: true;
}

export interface SensitiveExposure {
  totalLogsChecked: number;
  /** Only keywords with at least one match appear here. */
  sensitiveKeywords: Record<string, KeywordExposure>;
  hasSensitiveData: boolean;
  /** Set when the sample could not be fetched; counts are then zero. */
  error?: string;
}

export interface TrafficStats {
  entityName: string;
  totalRequests: number;
  avgRequestsPerHour: number;
  maxRequestsPerHour: number;
  /** Estimated from the busiest hour with a burst multiplier, not measured. */
  maxRequestsPerMinute: number;
  /** Timestamp string of the busiest hourly bucket. */
  peakHour: string | null;
  /** Up to five hours of day (0–23), ascending. */
  peakHours: number[];
  /** Approximate (sketch-based) distinct client IPs. */
  uniqueIps: number;
  /** Approximate (sketch-based) distinct users. */
  uniqueUsers: number;
  topIps: ActorCount[];
  topUsers: ActorCount[];
  avgResponseTimeMs: number;
  statusCodes: Record<string, number>;
  errorCount: number;
  errorRate: number;
  successRate: number;
  /** Merged in from the sensitive-field scan before scoring. */
  sensitiveData?: SensitiveExposure;
}

/** One raw log record sampled for sensitive-field scanning. */
export interface LogRecord {
  headerText: string;
  bodyText: string;
  timestamp: string | null;
}

export interface TimelinePoint {
  timestamp: string;
  requests: number;
  avgResponseTime: number;
  errors: number;
}

export interface HourlyDistribution {
  /** Request counts indexed by hour of day (0–23). */
  hourlyDistribution: number[];
  maxTraffic: number;
  totalRequests: number;
}
