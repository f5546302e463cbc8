import { describe, expect, it } from "vitest";

import { makeAnalysis } from "../../__tests__/helpers.js";
import type { Recommendation } from "../../schemas.js";
import { policyCoverage } from "../coverage.js";
import { complianceReport, executiveSummary, summarizeRecommendations } from "../summary.js";

const NOW = new Date("2025-03-08T09:00:00.000Z");

function rec(severity: Recommendation["severity"], category: string): Recommendation {
  return { severity, category, message: `${category} issue`, action: `fix ${category}` };
}

const A = makeAnalysis(
  "A",
  {
    totalScore: 80,
    securityLevel: "Good",
    componentScores: {
      ip_whitelist_coverage: 0,
      throttling_configured: 100,
      quota_configured: 50,
      authentication_strength: 100,
      allowed_hours: 100,
      traffic_anomaly: 100,
      error_rate: 100,
      ssl_tls_status: 100,
      logging_status: 100,
    },
    recommendations: [rec("critical", "authentication"), rec("medium", "quota")],
  },
  { errorRate: 2 },
);

const B = makeAnalysis(
  "B",
  {
    totalScore: 45,
    securityLevel: "Poor",
    componentScores: {
      ip_whitelist_coverage: 100,
      throttling_configured: 0,
      quota_configured: 50,
      authentication_strength: 0,
      allowed_hours: 100,
      traffic_anomaly: 100,
      error_rate: 80,
      ssl_tls_status: 100,
      logging_status: 100,
    },
    recommendations: [rec("high", "throttling")],
  },
  { errorRate: 7 },
);

describe("summarizeRecommendations", () => {
  it("counts by category and severity", () => {
    expect(summarizeRecommendations([rec("high", "ssl_tls"), rec("medium", "ssl_tls"), rec("low", "quota")])).toEqual({
      ssl_tls: { count: 2, critical: 0, high: 1, medium: 1, low: 0 },
      quota: { count: 1, critical: 0, high: 0, medium: 0, low: 1 },
    });
  });
});

describe("executiveSummary", () => {
  it("aggregates scores, levels and issues", () => {
    const summary = executiveSummary([A, B], undefined, NOW);

    expect(summary.generatedAt).toBe("2025-03-08T09:00:00.000Z");
    expect(summary.summary).toEqual({
      totalApis: 2,
      averageSecurityScore: 62.5,
      apisByLevel: { Excellent: 0, Good: 1, Fair: 0, Poor: 1, Critical: 0 },
      totalRecommendations: 3,
      criticalIssues: 1,
      highPriorityIssues: 1,
    });
    expect(summary.topIssues.critical).toEqual([{ apiName: "A", ...rec("critical", "authentication") }]);
    expect(summary.topIssues.high.map((r) => r.apiName)).toEqual(["B"]);
    expect(summary.topIssues.medium.map((r) => r.category)).toEqual(["quota"]);
    expect(summary.securityCoverage).toBeNull();
    expect(Object.keys(summary.recommendationsSummary).sort()).toEqual(["authentication", "quota", "throttling"]);
  });

  it("takes the API total from coverage when given", () => {
    const coverage = policyCoverage([A.configuration, B.configuration, A.configuration]);
    const summary = executiveSummary([A], coverage, NOW);
    expect(summary.summary.totalApis).toBe(3);
    expect(summary.securityCoverage).toBe(coverage);
  });

  it("caps each issue list at ten", () => {
    const many = makeAnalysis("Many", {
      recommendations: Array.from({ length: 12 }, () => rec("high", "throttling")),
    });
    expect(executiveSummary([many], undefined, NOW).topIssues.high).toHaveLength(10);
  });

  it("averages to zero with no analyses", () => {
    expect(executiveSummary([], undefined, NOW).summary.averageSecurityScore).toBe(0);
  });
});

describe("complianceReport", () => {
  it("runs every check against every API", () => {
    const report = complianceReport([A, B], NOW);

    expect(report.totalApis).toBe(2);
    expect(report.summary).toEqual({ totalChecks: 10, passed: 5, failed: 5 });
    expect(report.compliancePercentage).toBe(50);
    expect(report.checks.authentication_required).toEqual({
      name: "Authentication Required",
      passed: 1,
      failed: 1,
      apisFailed: ["B"],
    });
    expect(report.checks.ip_whitelist_configured.apisFailed).toEqual(["A"]);
    expect(report.checks.low_error_rate.apisFailed).toEqual(["B"]);
    expect(report.checks.security_score_acceptable.apisFailed).toEqual(["B"]);
  });

  it("is empty for no analyses", () => {
    const report = complianceReport([], NOW);
    expect(report.compliancePercentage).toBe(0);
    expect(report.summary).toEqual({ totalChecks: 0, passed: 0, failed: 0 });
  });
});
