import type { EntityAnalysis } from "../analyzer.js";
import { ConfigurationSnapshotSchema, type ConfigurationSnapshot, type ScoreReport } from "../schemas.js";
import { emptyTrafficStats } from "../traffic/aggregator.js";
import type { TrafficStats } from "../types.js";

/** A snapshot with the given request policies, enabled unless `!` prefixed. */
export function makeConfig(
  kinds: string[] = [],
  overrides: Partial<ConfigurationSnapshot> = {},
): ConfigurationSnapshot {
  const request = kinds.map((k, i) =>
    k.startsWith("!") ? { type: k.slice(1), enabled: false, order: i } : { type: k, order: i },
  );
  return {
    ...ConfigurationSnapshotSchema.parse({ id: "orders", name: "Orders API", policies: { request } }),
    ...overrides,
  };
}

export function makeStats(overrides: Partial<TrafficStats> = {}): TrafficStats {
  return { ...emptyTrafficStats("Orders API"), ...overrides };
}

const ALL_HUNDRED: ScoreReport["componentScores"] = {
  ip_whitelist_coverage: 100,
  throttling_configured: 100,
  quota_configured: 100,
  authentication_strength: 100,
  allowed_hours: 100,
  traffic_anomaly: 100,
  error_rate: 100,
  ssl_tls_status: 100,
  logging_status: 100,
};

export function makeAnalysis(
  name: string,
  report: Partial<ScoreReport>,
  stats: Partial<TrafficStats> = {},
): EntityAnalysis {
  return {
    entityId: name.toLowerCase(),
    entityName: name,
    range: { start: new Date("2025-03-01T00:00:00.000Z"), end: new Date("2025-03-08T00:00:00.000Z") },
    configuration: makeConfig([], { id: name.toLowerCase(), name }),
    stats: makeStats({ entityName: name, ...stats }),
    report: {
      componentScores: ALL_HUNDRED,
      totalScore: 100,
      securityLevel: "Excellent",
      recommendations: [],
      ...report,
    },
    degraded: [],
    generatedAt: "2025-03-08T00:00:00.000Z",
  };
}
