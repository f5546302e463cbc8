import { describe, it, expect } from "vitest";
import {
  DEFAULT_WEIGHTS,
  emptyTrafficStats,
  policyCoverage,
  type EntityAnalysis,
} from "@gatewise/engine";
import {
  formatOverviewTable,
  formatScoreTable,
  formatSensitiveTable,
  formatStatsTable,
  formatTimelineTable,
  formatWeightsTable,
} from "../formatter.js";

// eslint-disable-next-line no-control-regex
const ANSI = /\x1b\[[0-9;]*m/g;

function plain(text: string): string {
  return text.replace(ANSI, "");
}

function analysis(overrides: Partial<EntityAnalysis["report"]> = {}): EntityAnalysis {
  return {
    entityId: "orders",
    entityName: "Orders API",
    range: { start: new Date("2025-03-01T00:00:00.000Z"), end: new Date("2025-03-08T00:00:00.000Z") },
    configuration: {
      id: "orders",
      name: "Orders API",
      policies: { request: [], response: [], error: [] },
      clientSsl: { total: 0, sslCount: 0, nonSslList: [], allSsl: false },
      backendSsl: { total: 0, sslCount: 0, nonSslList: [], allSsl: false },
      logsEnabled: false,
      deployedEnvironments: [],
    },
    stats: emptyTrafficStats("Orders API"),
    report: {
      componentScores: { ...DEFAULT_WEIGHTS },
      totalScore: 47.5,
      securityLevel: "Poor",
      recommendations: [],
      ...overrides,
    },
    degraded: [],
    generatedAt: "2025-03-08T00:00:00.000Z",
  };
}

describe("formatScoreTable", () => {
  it("shows the API, score and level", () => {
    const out = plain(formatScoreTable(analysis()));
    expect(out).toContain("API:    Orders API (orders)");
    expect(out).toContain("Score: 47.5/100  Level:  Poor ");
    expect(out).toContain("No recommendations.");
  });

  it("lists recommendations with their action", () => {
    const out = plain(
      formatScoreTable(
        analysis({
          recommendations: [
            { severity: "critical", category: "authentication", message: "No auth.", action: "Add auth." },
          ],
        }),
      ),
    );
    expect(out).toContain("RECOMMENDATIONS (1)");
    expect(out).toContain(" CRITICAL  No auth.");
    expect(out).toContain("Add auth.");
  });

  it("notes degraded steps", () => {
    const out = plain(formatScoreTable({ ...analysis(), degraded: ["traffic"] }));
    expect(out).toContain("Degraded: traffic unavailable, scored with empty data");
  });
});

describe("formatStatsTable", () => {
  it("prints one row per API and a count", () => {
    const out = plain(formatStatsTable({ orders: { ...emptyTrafficStats("Orders API"), totalRequests: 42 } }));
    expect(out).toContain("Orders API");
    expect(out).toContain("1 API");
    expect(out).not.toContain("1 APIs");
  });

  it("says when there is no traffic", () => {
    expect(plain(formatStatsTable({}))).toContain("No traffic in range.");
  });
});

describe("formatSensitiveTable", () => {
  it("prints keyword percentages", () => {
    const out = plain(
      formatSensitiveTable("orders", {
        totalLogsChecked: 4,
        hasSensitiveData: true,
        sensitiveKeywords: { password: { count: 2, percentage: 50, inHeaders: 1, inBody: 2, exists: true } },
      }),
    );
    expect(out).toContain("Logs checked: 4");
    expect(out).toContain(`  ${"password".padEnd(20)}${"2".padStart(8)}${"50.00".padStart(9)}${"1".padStart(10)}${"2".padStart(8)}`);
  });

  it("reports an unavailable sample", () => {
    const out = plain(
      formatSensitiveTable("orders", {
        error: "down",
        totalLogsChecked: 0,
        sensitiveKeywords: {},
        hasSensitiveData: false,
      }),
    );
    expect(out).toContain("Sample unavailable: down");
  });
});

describe("formatTimelineTable", () => {
  it("prints points and the 24-hour heatmap", () => {
    const hourly = new Array<number>(24).fill(0);
    hourly[9] = 5;
    const out = plain(
      formatTimelineTable(
        [{ timestamp: "2025-03-01T09:00:00.000Z", requests: 5, avgResponseTime: 12.34, errors: 1 }],
        { hourlyDistribution: hourly, maxTraffic: 5, totalRequests: 5 },
      ),
    );
    expect(out).toContain("2025-03-01T09:00:00.000Z");
    expect(out).toContain(`  09:00 ${"█".repeat(30)} 5`);
    expect(out).toContain("  23:00  0");
    expect(out).toContain("5 requests total");
  });
});

describe("formatOverviewTable", () => {
  it("shows counts and percentages per category", () => {
    const out = plain(formatOverviewTable(policyCoverage([])));
    expect(out).toContain("APIs: 0");
    expect(out).toContain("(0%)");
  });
});

describe("formatWeightsTable", () => {
  it("lists every component and the total", () => {
    const out = plain(formatWeightsTable({ ...DEFAULT_WEIGHTS }));
    expect(out).toContain(`  ${"authentication_strength".padEnd(26)}  0.20`);
    expect(out).toContain(`  ${"total".padEnd(26)}  1.00`);
  });
});
