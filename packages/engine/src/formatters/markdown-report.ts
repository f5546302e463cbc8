/**
 * Markdown security report generator.
 *
 * Produces a standalone markdown document for one analysed API, suitable for
 * attaching to a change request or a compliance ticket.
 */

import type { EntityAnalysis } from "../analyzer.js";
import { COMPONENT_NAMES, type ComponentName, type Severity } from "../schemas.js";
import type { ActorCount } from "../types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ReportOptions {
  timestamp?: string | Date;
}

// ---------------------------------------------------------------------------
// Labels
// ---------------------------------------------------------------------------

export const COMPONENT_LABELS: Record<ComponentName, string> = {
  ip_whitelist_coverage: "IP Whitelist",
  throttling_configured: "Throttling",
  quota_configured: "Quota",
  authentication_strength: "Authentication",
  allowed_hours: "Allowed Hours",
  traffic_anomaly: "Traffic Anomaly",
  error_rate: "Error Rate",
  ssl_tls_status: "SSL/TLS",
  logging_status: "Sensitive Data in Logs",
};

const SEVERITY_LABELS: Record<Severity, string> = {
  critical: "Critical",
  high: "High",
  medium: "Medium",
  low: "Low",
};

function cell(text: string): string {
  return text.replace(/\|/g, "\\|");
}

function hourList(hours: readonly number[]): string {
  if (hours.length === 0) return "-";
  return hours.map((h) => `${String(h).padStart(2, "0")}:00`).join(", ");
}

function consumerRows(list: readonly ActorCount[]): string[] {
  return list.map((c, i) => `| ${i + 1} | ${cell(c.actor)} | ${c.count} |`);
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function generateMarkdownReport(analysis: EntityAnalysis, options?: ReportOptions): string {
  const ts =
    options?.timestamp instanceof Date
      ? options.timestamp.toISOString()
      : options?.timestamp ?? analysis.generatedAt;
  const { report, stats } = analysis;

  const sections: string[] = [];

  sections.push(`# API Security Report: ${analysis.entityName}`);
  sections.push("");
  sections.push(`*Generated: ${ts}*`);
  sections.push("");
  sections.push(`- **API ID:** \`${analysis.entityId}\``);
  sections.push(
    `- **Period:** ${analysis.range.start.toISOString()} to ${analysis.range.end.toISOString()}`,
  );
  if (analysis.degraded.length > 0) {
    sections.push(`- **Degraded data:** ${analysis.degraded.join(", ")}`);
  }
  sections.push("");

  // ── Score ─────────────────────────────────────────────────────────────
  sections.push("## Security Score");
  sections.push("");
  sections.push(`**${report.totalScore}/100 (${report.securityLevel})**`);
  sections.push("");
  sections.push("| Component | Score |");
  sections.push("|-----------|-------|");
  for (const name of COMPONENT_NAMES) {
    sections.push(`| ${COMPONENT_LABELS[name]} | ${report.componentScores[name]} |`);
  }
  sections.push("");

  // ── Traffic ───────────────────────────────────────────────────────────
  sections.push("## Traffic Analysis");
  sections.push("");
  sections.push("| Metric | Value |");
  sections.push("|--------|-------|");
  sections.push(`| Total requests | ${stats.totalRequests} |`);
  sections.push(`| Avg requests/hour | ${stats.avgRequestsPerHour} |`);
  sections.push(`| Max requests/hour | ${stats.maxRequestsPerHour} |`);
  sections.push(`| Est. max requests/minute | ${stats.maxRequestsPerMinute} |`);
  sections.push(`| Peak hours | ${hourList(stats.peakHours)} |`);
  sections.push(`| Unique IPs (approx.) | ${stats.uniqueIps} |`);
  sections.push(`| Unique users (approx.) | ${stats.uniqueUsers} |`);
  sections.push(`| Avg response time | ${stats.avgResponseTimeMs} ms |`);
  sections.push(`| Error rate | ${stats.errorRate}% |`);
  sections.push(`| Success rate | ${stats.successRate}% |`);
  sections.push("");

  // ── Consumers ─────────────────────────────────────────────────────────
  if (stats.topIps.length > 0 || stats.topUsers.length > 0) {
    sections.push("## Top Consumers");
    sections.push("");
    if (stats.topIps.length > 0) {
      sections.push("### By IP");
      sections.push("");
      sections.push("| # | IP | Requests |");
      sections.push("|---|----|----------|");
      sections.push(...consumerRows(stats.topIps));
      sections.push("");
    }
    if (stats.topUsers.length > 0) {
      sections.push("### By User");
      sections.push("");
      sections.push("| # | User | Requests |");
      sections.push("|---|------|----------|");
      sections.push(...consumerRows(stats.topUsers));
      sections.push("");
    }
  }

  // ── Recommendations ───────────────────────────────────────────────────
  sections.push("## Recommendations");
  sections.push("");
  if (report.recommendations.length === 0) {
    sections.push("No recommendations. The API configuration looks good.");
    sections.push("");
  } else {
    report.recommendations.forEach((rec, i) => {
      sections.push(`${i + 1}. **[${SEVERITY_LABELS[rec.severity]}]** ${rec.message}`);
      sections.push(`   - *Action:* ${rec.action}`);
    });
    sections.push("");
  }

  sections.push("---");
  sections.push("*Report generated by gatewise*");
  sections.push("");

  return sections.join("\n");
}
