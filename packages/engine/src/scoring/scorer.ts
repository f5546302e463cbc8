/**
 * Weighted multi-factor security scorer.
 *
 * `score()` is pure: no I/O, inputs are never mutated, and identical inputs
 * produce identical reports. Weights are taken as given; checking that they
 * sum to 1 happens when configuration is loaded.
 */

import { LEVEL_THRESHOLDS } from "../calibration.js";
import { logger } from "../logger.js";
import { round2 } from "../math.js";
import {
  COMPONENT_NAMES,
  type ComponentName,
  type ConfigurationSnapshot,
  type Recommendation,
  type ScoreReport,
  type ScoringWeights,
  type SecurityLevel,
} from "../schemas.js";
import type { TrafficStats } from "../types.js";
import {
  type ComponentResult,
  scoreAllowedHours,
  scoreAuthentication,
  scoreErrorRate,
  scoreIpWhitelist,
  scoreLogging,
  scoreQuota,
  scoreSslTls,
  scoreThrottling,
  scoreTrafficAnomaly,
} from "./components.js";

export const DEFAULT_WEIGHTS: Readonly<Record<ComponentName, number>> = {
  ip_whitelist_coverage: 0.15,
  throttling_configured: 0.15,
  quota_configured: 0.05,
  authentication_strength: 0.2,
  allowed_hours: 0.05,
  traffic_anomaly: 0.05,
  error_rate: 0.05,
  ssl_tls_status: 0.1,
  logging_status: 0.2,
};

/** Every component, evaluated in COMPONENT_NAMES order. */
function evaluate(
  config: ConfigurationSnapshot,
  stats: TrafficStats,
): Record<ComponentName, ComponentResult> {
  return {
    ip_whitelist_coverage: scoreIpWhitelist(config, stats),
    throttling_configured: scoreThrottling(config, stats),
    quota_configured: scoreQuota(config, stats),
    authentication_strength: scoreAuthentication(config),
    allowed_hours: scoreAllowedHours(config, stats),
    traffic_anomaly: scoreTrafficAnomaly(stats),
    error_rate: scoreErrorRate(stats),
    ssl_tls_status: scoreSslTls(config),
    logging_status: scoreLogging(stats),
  };
}

function scoresOf(results: Record<ComponentName, ComponentResult>): Record<ComponentName, number> {
  return {
    ip_whitelist_coverage: results.ip_whitelist_coverage.score,
    throttling_configured: results.throttling_configured.score,
    quota_configured: results.quota_configured.score,
    authentication_strength: results.authentication_strength.score,
    allowed_hours: results.allowed_hours.score,
    traffic_anomaly: results.traffic_anomaly.score,
    error_rate: results.error_rate.score,
    ssl_tls_status: results.ssl_tls_status.score,
    logging_status: results.logging_status.score,
  };
}

/** Level boundaries are inclusive lower bounds: 90 is Excellent, 89.999 is Good. */
export function securityLevelFor(score: number): SecurityLevel {
  for (const t of LEVEL_THRESHOLDS) {
    if (score >= t.min) return t.level;
  }
  return "Critical";
}

export class SecurityScorer {
  private readonly weights: ScoringWeights;

  constructor(weights: ScoringWeights = DEFAULT_WEIGHTS) {
    this.weights = { ...weights };
  }

  score(config: ConfigurationSnapshot, stats: TrafficStats): ScoreReport {
    const results = evaluate(config, stats);

    let total = 0;
    const recommendations: Recommendation[] = [];
    for (const name of COMPONENT_NAMES) {
      total += results[name].score * (this.weights[name] ?? 0);
      recommendations.push(...results[name].recommendations);
    }

    logger.debug(`scored ${config.id}: ${total.toFixed(2)} (${recommendations.length} recommendations)`);

    return Object.freeze({
      componentScores: Object.freeze(scoresOf(results)),
      totalScore: round2(total),
      securityLevel: securityLevelFor(total),
      recommendations: Object.freeze(recommendations.map((r) => Object.freeze(r))),
    });
  }
}
