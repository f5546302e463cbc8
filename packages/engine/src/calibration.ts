/**
 * Heuristic calibration constants.
 *
 * These are fixed domain values, not derived ones. Changing any of them
 * changes scores for existing deployments.
 */

import type { Severity } from "./schemas.js";

// ── Traffic aggregation ─────────────────────────────────────────────────

/** Applied to max-per-hour / 60 to estimate the busiest minute. */
export const BURST_MULTIPLIER = 1.5;

/** Number of hour-of-day slots reported as peak hours. */
export const PEAK_HOURS_COUNT = 5;

/** Length of the top-IP and top-user lists. */
export const TOP_ACTORS_LIMIT = 5;

/** Status codes at or above this count as errors. */
export const ERROR_STATUS_THRESHOLD = 400;

// ── Component rules ─────────────────────────────────────────────────────

/** IP whitelist is suggested when distinct client IPs are in (0, this]. */
export const IP_WHITELIST_MAX_ACTORS = 10;

/** Above this many requests in the busiest hour, missing throttling is high severity. */
export const HIGH_TRAFFIC_PER_HOUR = 1000;

/** Suggested throttle limit = observed max per hour × this. */
export const THROTTLE_HEADROOM = 1.2;

/** Missing quota is reported above this total request count. */
export const QUOTA_VOLUME_THRESHOLD = 10_000;

/** Score for a missing quota policy. */
export const QUOTA_BASELINE_SCORE = 50;

/** Minimum total requests before an allowed-hours suggestion is made. */
export const ALLOWED_HOURS_MIN_REQUESTS = 100;

/** Business hours, inclusive on both ends (08:00–18:59). */
export const BUSINESS_HOURS = { first: 8, last: 18 } as const;

/** At most this many peak hours counts as "concentrated" traffic. */
export const CONCENTRATED_HOURS_MAX = 8;

export const SEVERE_SPIKE_RATIO = 10;
export const SPIKE_RATIO = 5;

export interface ThresholdStep {
  /** Strictly-greater-than bound. */
  above: number;
  score: number;
  severity: Severity;
}

/** Error-rate (%) steps, checked top to bottom. */
export const ERROR_RATE_STEPS: readonly ThresholdStep[] = [
  { above: 20, score: 30, severity: "critical" },
  { above: 10, score: 60, severity: "high" },
  { above: 5, score: 80, severity: "medium" },
];

export const CLIENT_SSL_WEIGHT = 0.6;
export const BACKEND_SSL_WEIGHT = 0.4;

/** Offending endpoints named in an SSL recommendation. */
export const SSL_NAMED_ENDPOINTS = 3;

/**
 * Logging penalty keyed by the highest exposure percentage. The last step
 * (above -Infinity) catches everything at or below 1 %.
 */
export const LOGGING_PENALTY_STEPS: readonly ThresholdStep[] = [
  { above: 80, score: 10, severity: "critical" },
  { above: 50, score: 20, severity: "critical" },
  { above: 20, score: 40, severity: "high" },
  { above: 10, score: 50, severity: "high" },
  { above: 5, score: 60, severity: "medium" },
  { above: 1, score: 70, severity: "low" },
  { above: -Infinity, score: 80, severity: "low" },
];

/** Keywords quoted in a logging recommendation. */
export const LOGGING_NAMED_KEYWORDS = 5;

// ── Security levels ─────────────────────────────────────────────────────

export const LEVEL_THRESHOLDS = [
  { min: 90, level: "Excellent" },
  { min: 75, level: "Good" },
  { min: 60, level: "Fair" },
  { min: 40, level: "Poor" },
] as const;
