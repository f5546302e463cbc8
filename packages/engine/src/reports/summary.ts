/**
 * Fleet-level reports built from per-API analyses: the executive summary
 * and the compliance checklist.
 */

import type { EntityAnalysis } from "../analyzer.js";
import { round2 } from "../math.js";
import type { Recommendation, SecurityLevel, Severity } from "../schemas.js";
import type { PolicyCoverage } from "./coverage.js";

// ---------------------------------------------------------------------------
// Executive summary
// ---------------------------------------------------------------------------

const TOP_ISSUES_LIMIT = 10;

export interface AttributedRecommendation extends Recommendation {
  apiName: string;
}

export type CategorySummary = Record<Severity, number> & { count: number };

export interface ExecutiveSummary {
  generatedAt: string;
  summary: {
    totalApis: number;
    averageSecurityScore: number;
    apisByLevel: Record<SecurityLevel, number>;
    totalRecommendations: number;
    criticalIssues: number;
    highPriorityIssues: number;
  };
  topIssues: {
    critical: AttributedRecommendation[];
    high: AttributedRecommendation[];
    medium: AttributedRecommendation[];
  };
  securityCoverage: PolicyCoverage | null;
  recommendationsSummary: Record<string, CategorySummary>;
}

export function summarizeRecommendations(
  recommendations: readonly Recommendation[],
): Record<string, CategorySummary> {
  const summary: Record<string, CategorySummary> = {};
  for (const rec of recommendations) {
    const entry = (summary[rec.category] ??= { count: 0, critical: 0, high: 0, medium: 0, low: 0 });
    entry.count++;
    entry[rec.severity]++;
  }
  return summary;
}

/**
 * Summarise a set of analyses. `coverage` is included as-is when given.
 * Top issues keep analysis order within each severity.
 */
export function executiveSummary(
  analyses: readonly EntityAnalysis[],
  coverage?: PolicyCoverage,
  now: Date = new Date(),
): ExecutiveSummary {
  const apisByLevel: Record<SecurityLevel, number> = {
    Excellent: 0,
    Good: 0,
    Fair: 0,
    Poor: 0,
    Critical: 0,
  };
  const all: AttributedRecommendation[] = [];
  let scoreSum = 0;

  for (const a of analyses) {
    scoreSum += a.report.totalScore;
    apisByLevel[a.report.securityLevel]++;
    for (const rec of a.report.recommendations) all.push({ apiName: a.entityName, ...rec });
  }

  const bySeverity = (s: Severity) => all.filter((r) => r.severity === s);
  const critical = bySeverity("critical");
  const high = bySeverity("high");

  return {
    generatedAt: now.toISOString(),
    summary: {
      totalApis: coverage?.totalApis ?? analyses.length,
      averageSecurityScore: analyses.length > 0 ? round2(scoreSum / analyses.length) : 0,
      apisByLevel,
      totalRecommendations: all.length,
      criticalIssues: critical.length,
      highPriorityIssues: high.length,
    },
    topIssues: {
      critical: critical.slice(0, TOP_ISSUES_LIMIT),
      high: high.slice(0, TOP_ISSUES_LIMIT),
      medium: bySeverity("medium").slice(0, TOP_ISSUES_LIMIT),
    },
    securityCoverage: coverage ?? null,
    recommendationsSummary: summarizeRecommendations(all),
  };
}

// ---------------------------------------------------------------------------
// Compliance
// ---------------------------------------------------------------------------

export interface ComplianceCheck {
  name: string;
  passed: number;
  failed: number;
  apisFailed: string[];
}

interface CheckDefinition {
  id: string;
  name: string;
  passes: (a: EntityAnalysis) => boolean;
}

export const COMPLIANCE_CHECKS: readonly CheckDefinition[] = [
  {
    id: "authentication_required",
    name: "Authentication Required",
    passes: (a) => a.report.componentScores.authentication_strength >= 50,
  },
  {
    id: "ip_whitelist_configured",
    name: "IP Whitelist Configured",
    passes: (a) => a.report.componentScores.ip_whitelist_coverage >= 50,
  },
  {
    id: "throttling_enabled",
    name: "Throttling Enabled",
    passes: (a) => a.report.componentScores.throttling_configured >= 50,
  },
  {
    id: "low_error_rate",
    name: "Error Rate < 5%",
    passes: (a) => a.stats.errorRate < 5,
  },
  {
    id: "security_score_acceptable",
    name: "Security Score >= 60",
    passes: (a) => a.report.totalScore >= 60,
  },
];

export interface ComplianceReport {
  generatedAt: string;
  totalApis: number;
  compliancePercentage: number;
  checks: Record<string, ComplianceCheck>;
  summary: { totalChecks: number; passed: number; failed: number };
}

export function complianceReport(
  analyses: readonly EntityAnalysis[],
  now: Date = new Date(),
): ComplianceReport {
  const checks: Record<string, ComplianceCheck> = {};
  let passed = 0;

  for (const def of COMPLIANCE_CHECKS) {
    const check: ComplianceCheck = { name: def.name, passed: 0, failed: 0, apisFailed: [] };
    for (const a of analyses) {
      if (def.passes(a)) {
        check.passed++;
      } else {
        check.failed++;
        check.apisFailed.push(a.entityName);
      }
    }
    passed += check.passed;
    checks[def.id] = check;
  }

  const totalChecks = COMPLIANCE_CHECKS.length * analyses.length;
  return {
    generatedAt: now.toISOString(),
    totalApis: analyses.length,
    compliancePercentage: totalChecks > 0 ? round2((passed / totalChecks) * 100) : 0,
    checks,
    summary: { totalChecks, passed, failed: totalChecks - passed },
  };
}
