import {
  COMPONENT_LABELS,
  COMPONENT_NAMES,
  type ComplianceReport,
  type ComponentName,
  type EntityAnalysis,
  type ExecutiveSummary,
  type HourlyDistribution,
  type PolicyCoverage,
  type SecurityLevel,
  type SensitiveExposure,
  type TimelinePoint,
  type TrafficStats,
} from "@gatewise/engine";

// ANSI escape codes
const RESET = "\x1b[0m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RED = "\x1b[31m";
const GREEN = "\x1b[32m";
const YELLOW = "\x1b[33m";
const BLUE = "\x1b[34m";
const CYAN = "\x1b[36m";
const BG_RED = "\x1b[41m";
const BG_GREEN = "\x1b[42m";
const BG_YELLOW = "\x1b[43m";
const BG_BLUE = "\x1b[44m";
const WHITE = "\x1b[37m";

function c(color: string, text: string): string {
  return `${color}${text}${RESET}`;
}

function severityColor(severity: string): string {
  switch (severity) {
    case "critical": return BG_RED + WHITE;
    case "high": return RED;
    case "medium": return YELLOW;
    case "low": return BLUE;
    default: return DIM;
  }
}

function severityBadge(severity: string): string {
  const label = severity.toUpperCase().padEnd(8);
  return c(severityColor(severity), ` ${label} `);
}

function levelColor(level: SecurityLevel): string {
  switch (level) {
    case "Excellent": return BG_GREEN + WHITE;
    case "Good": return BG_BLUE + WHITE;
    case "Fair": return BG_YELLOW + WHITE;
    default: return BG_RED + WHITE;
  }
}

function scoreColor(score: number): string {
  if (score >= 75) return GREEN;
  if (score >= 40) return YELLOW;
  return RED;
}

function bar(score: number, width = 20): string {
  const filled = Math.round((Math.max(0, Math.min(100, score)) / 100) * width);
  return c(scoreColor(score), "█".repeat(filled)) + c(DIM, "░".repeat(width - filled));
}

function banner(title: string): string[] {
  return [
    "",
    c(CYAN, "  ╔══════════════════════════════════════════╗"),
    c(CYAN, "  ║") + c(BOLD, title.padStart(21 + Math.ceil(title.length / 2)).padEnd(42)) + c(CYAN, "║"),
    c(CYAN, "  ╚══════════════════════════════════════════╝"),
    "",
  ];
}

function hh(hour: number): string {
  return `${String(hour).padStart(2, "0")}:00`;
}

// ---------------------------------------------------------------------------
// score
// ---------------------------------------------------------------------------

export function formatScoreTable(analysis: EntityAnalysis): string {
  const { report, stats } = analysis;
  const lines = banner("GATEWISE SECURITY SCORE");

  lines.push(`  API:    ${c(BOLD, analysis.entityName)} ${c(DIM, `(${analysis.entityId})`)}`);
  lines.push(`  Period: ${analysis.range.start.toISOString()} to ${analysis.range.end.toISOString()}`);
  if (analysis.degraded.length > 0) {
    lines.push(c(YELLOW, `  Degraded: ${analysis.degraded.join(", ")} unavailable, scored with empty data`));
  }
  lines.push("");

  const badge = c(levelColor(report.securityLevel), ` ${report.securityLevel} `);
  lines.push(`  Score: ${c(BOLD, String(report.totalScore))}${DIM}/100${RESET}  Level: ${badge}`);
  lines.push("");

  for (const name of COMPONENT_NAMES) {
    const score = report.componentScores[name];
    lines.push(`  ${COMPONENT_LABELS[name].padEnd(24)}${bar(score)} ${String(score).padStart(6)}`);
  }
  lines.push("");

  lines.push(c(DIM, `  ${stats.totalRequests} requests, ${stats.errorRate}% errors, ~${stats.uniqueIps} IPs`));
  lines.push("");

  if (report.recommendations.length === 0) {
    lines.push(c(GREEN, "  No recommendations."));
    lines.push("");
    return lines.join("\n");
  }

  lines.push(c(BOLD, `  RECOMMENDATIONS (${report.recommendations.length})`));
  lines.push("");
  for (const rec of report.recommendations) {
    lines.push(`  ${severityBadge(rec.severity)} ${rec.message}`);
    lines.push(`              ${c(DIM, rec.action)}`);
  }
  lines.push("");

  return lines.join("\n");
}

// ---------------------------------------------------------------------------
// stats
// ---------------------------------------------------------------------------

export function formatStatsTable(stats: Record<string, TrafficStats>): string {
  const lines = banner("GATEWISE TRAFFIC");
  const entries = Object.entries(stats);
  if (entries.length === 0) {
    lines.push(c(DIM, "  No traffic in range."));
    lines.push("");
    return lines.join("\n");
  }

  const idW = 26;
  const nameW = 24;
  lines.push(
    `  ${c(BOLD, "API".padEnd(idW))}${c(BOLD, "NAME".padEnd(nameW))}${c(BOLD, "REQUESTS".padStart(10))}${c(BOLD, "AVG/H".padStart(10))}${c(BOLD, "MAX/H".padStart(8))}${c(BOLD, "ERR%".padStart(8))}${c(BOLD, "IPS".padStart(7))}`,
  );
  lines.push(`  ${"─".repeat(idW + nameW + 43)}`);
  for (const [id, s] of entries) {
    lines.push(
      `  ${c(DIM, id.padEnd(idW))}${s.entityName.slice(0, nameW - 2).padEnd(nameW)}${String(s.totalRequests).padStart(10)}${String(s.avgRequestsPerHour).padStart(10)}${String(s.maxRequestsPerHour).padStart(8)}${String(s.errorRate).padStart(8)}${String(s.uniqueIps).padStart(7)}`,
    );
  }
  lines.push("");
  lines.push(`  ${entries.length} API${entries.length === 1 ? "" : "s"}`);
  lines.push("");
  return lines.join("\n");
}

// ---------------------------------------------------------------------------
// sensitive
// ---------------------------------------------------------------------------

export function formatSensitiveTable(entityId: string, exposure: SensitiveExposure): string {
  const lines = banner("GATEWISE SENSITIVE DATA");
  lines.push(`  API: ${c(BOLD, entityId)}   Logs checked: ${exposure.totalLogsChecked}`);
  lines.push("");

  if (exposure.error !== undefined) {
    lines.push(c(YELLOW, `  Sample unavailable: ${exposure.error}`));
    lines.push("");
    return lines.join("\n");
  }
  if (!exposure.hasSensitiveData) {
    lines.push(c(GREEN, "  No sensitive keywords found."));
    lines.push("");
    return lines.join("\n");
  }

  lines.push(
    `  ${c(BOLD, "KEYWORD".padEnd(20))}${c(BOLD, "LOGS".padStart(8))}${c(BOLD, "%".padStart(9))}${c(BOLD, "HEADERS".padStart(10))}${c(BOLD, "BODY".padStart(8))}`,
  );
  lines.push(`  ${"─".repeat(55)}`);
  for (const [kw, info] of Object.entries(exposure.sensitiveKeywords)) {
    lines.push(
      `  ${c(RED, kw.padEnd(20))}${String(info.count).padStart(8)}${info.percentage.toFixed(2).padStart(9)}${String(info.inHeaders).padStart(10)}${String(info.inBody).padStart(8)}`,
    );
  }
  lines.push("");
  return lines.join("\n");
}

// ---------------------------------------------------------------------------
// timeline
// ---------------------------------------------------------------------------

export function formatTimelineTable(points: TimelinePoint[], hourly: HourlyDistribution): string {
  const lines = banner("GATEWISE TIMELINE");

  if (points.length === 0) {
    lines.push(c(DIM, "  No traffic in range."));
  } else {
    lines.push(
      `  ${c(BOLD, "TIME".padEnd(28))}${c(BOLD, "REQUESTS".padStart(10))}${c(BOLD, "AVG MS".padStart(10))}${c(BOLD, "ERRORS".padStart(8))}`,
    );
    for (const p of points) {
      lines.push(
        `  ${p.timestamp.padEnd(28)}${String(p.requests).padStart(10)}${p.avgResponseTime.toFixed(1).padStart(10)}${String(p.errors).padStart(8)}`,
      );
    }
  }
  lines.push("");

  lines.push(c(BOLD, "  HOUR OF DAY"));
  const max = hourly.maxTraffic;
  hourly.hourlyDistribution.forEach((count, hour) => {
    const width = max > 0 ? Math.round((count / max) * 30) : 0;
    lines.push(`  ${hh(hour)} ${c(CYAN, "█".repeat(width))} ${c(DIM, String(count))}`);
  });
  lines.push("");
  lines.push(`  ${hourly.totalRequests} requests total`);
  lines.push("");
  return lines.join("\n");
}

// ---------------------------------------------------------------------------
// report / overview / weights
// ---------------------------------------------------------------------------

export function formatExecutiveTable(summary: ExecutiveSummary): string {
  const lines = banner("GATEWISE EXECUTIVE SUMMARY");
  const s = summary.summary;

  lines.push(`  APIs:              ${s.totalApis}`);
  lines.push(`  Average score:     ${c(BOLD, String(s.averageSecurityScore))}`);
  lines.push(`  Recommendations:   ${s.totalRecommendations}`);
  lines.push(`  Critical issues:   ${c(s.criticalIssues > 0 ? RED : GREEN, String(s.criticalIssues))}`);
  lines.push(`  High priority:     ${s.highPriorityIssues}`);
  lines.push("");

  lines.push(c(BOLD, "  BY LEVEL"));
  for (const [level, count] of Object.entries(s.apisByLevel)) {
    lines.push(`  ${level.padEnd(12)}${String(count).padStart(5)}`);
  }
  lines.push("");

  for (const sev of ["critical", "high", "medium"] as const) {
    const issues = summary.topIssues[sev];
    if (issues.length === 0) continue;
    lines.push(c(BOLD, `  TOP ${sev.toUpperCase()} (${issues.length})`));
    for (const issue of issues) {
      lines.push(`  ${severityBadge(issue.severity)} ${c(BOLD, issue.apiName)}: ${issue.message}`);
    }
    lines.push("");
  }

  return lines.join("\n");
}

export function formatComplianceTable(report: ComplianceReport): string {
  const lines = banner("GATEWISE COMPLIANCE");

  lines.push(`  APIs: ${report.totalApis}   Compliance: ${c(BOLD, `${report.compliancePercentage}%`)}`);
  lines.push("");
  lines.push(`  ${c(BOLD, "CHECK".padEnd(28))}${c(BOLD, "PASS".padStart(6))}${c(BOLD, "FAIL".padStart(6))}`);
  lines.push(`  ${"─".repeat(40)}`);
  for (const check of Object.values(report.checks)) {
    const fail = check.failed > 0 ? c(RED, String(check.failed).padStart(6)) : String(check.failed).padStart(6);
    lines.push(`  ${check.name.padEnd(28)}${String(check.passed).padStart(6)}${fail}`);
    if (check.apisFailed.length > 0) {
      lines.push(`  ${c(DIM, `  failing: ${check.apisFailed.join(", ")}`)}`);
    }
  }
  lines.push("");
  lines.push(`  ${report.summary.passed}/${report.summary.totalChecks} checks passed`);
  lines.push("");
  return lines.join("\n");
}

export function formatOverviewTable(coverage: PolicyCoverage): string {
  const lines = banner("GATEWISE POLICY COVERAGE");
  lines.push(`  APIs: ${coverage.totalApis}`);
  lines.push("");
  const rows: Array<[string, number, number]> = [
    ["Security policies", coverage.withSecurity, coverage.securityPercentage],
    ["Throttling policies", coverage.withThrottling, coverage.throttlingPercentage],
    ["Authentication", coverage.withAuth, coverage.authPercentage],
  ];
  for (const [label, count, pct] of rows) {
    lines.push(`  ${label.padEnd(22)}${bar(pct)} ${String(count).padStart(5)} (${pct}%)`);
  }
  lines.push("");
  return lines.join("\n");
}

export function formatWeightsTable(weights: Record<ComponentName, number>): string {
  const lines = banner("GATEWISE WEIGHTS");
  let sum = 0;
  for (const name of COMPONENT_NAMES) {
    sum += weights[name];
    lines.push(`  ${name.padEnd(26)}${weights[name].toFixed(2).padStart(6)}`);
  }
  lines.push(`  ${"─".repeat(32)}`);
  lines.push(`  ${"total".padEnd(26)}${sum.toFixed(2).padStart(6)}`);
  lines.push("");
  return lines.join("\n");
}
