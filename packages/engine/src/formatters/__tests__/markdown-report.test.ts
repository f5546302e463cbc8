import { describe, it, expect } from "vitest";

import { makeAnalysis } from "../../__tests__/helpers.js";
import { generateMarkdownReport } from "../markdown-report.js";

const AUTH_REC = {
  severity: "critical" as const,
  category: "authentication",
  message: "No authentication policy configured. API is publicly accessible.",
  action: "Add authentication policy (OAuth2, JWT, or API Key recommended)",
};

describe("generateMarkdownReport", () => {
  it("starts with the API name, timestamp and period", () => {
    const report = generateMarkdownReport(makeAnalysis("Orders", {}));
    const lines = report.split("\n");
    expect(lines[0]).toBe("# API Security Report: Orders");
    expect(lines[2]).toBe("*Generated: 2025-03-08T00:00:00.000Z*");
    expect(lines).toContain("- **API ID:** `orders`");
    expect(lines).toContain("- **Period:** 2025-03-01T00:00:00.000Z to 2025-03-08T00:00:00.000Z");
  });

  it("accepts a timestamp override", () => {
    const report = generateMarkdownReport(makeAnalysis("Orders", {}), {
      timestamp: new Date("2025-04-01T12:00:00.000Z"),
    });
    expect(report).toContain("*Generated: 2025-04-01T12:00:00.000Z*");
  });

  it("shows the total, the level and every component", () => {
    const analysis = makeAnalysis("Orders", {
      totalScore: 47.5,
      securityLevel: "Poor",
      componentScores: {
        ip_whitelist_coverage: 0,
        throttling_configured: 0,
        quota_configured: 50,
        authentication_strength: 0,
        allowed_hours: 100,
        traffic_anomaly: 100,
        error_rate: 100,
        ssl_tls_status: 100,
        logging_status: 100,
      },
    });
    const lines = generateMarkdownReport(analysis).split("\n");
    expect(lines).toContain("**47.5/100 (Poor)**");
    expect(lines).toContain("| Authentication | 0 |");
    expect(lines).toContain("| Quota | 50 |");
    expect(lines).toContain("| Sensitive Data in Logs | 100 |");
  });

  it("renders traffic metrics and escapes pipes in consumer names", () => {
    const analysis = makeAnalysis(
      "Orders",
      {},
      { totalRequests: 1200, errorRate: 2.5, peakHours: [9, 14], topUsers: [{ actor: "a|b", count: 7 }] },
    );
    const lines = generateMarkdownReport(analysis).split("\n");
    expect(lines).toContain("| Total requests | 1200 |");
    expect(lines).toContain("| Error rate | 2.5% |");
    expect(lines).toContain("| Peak hours | 09:00, 14:00 |");
    expect(lines).toContain("### By User");
    expect(lines).toContain("| 1 | a\\|b | 7 |");
    expect(lines).not.toContain("### By IP");
  });

  it("numbers recommendations with their action", () => {
    const lines = generateMarkdownReport(makeAnalysis("Orders", { recommendations: [AUTH_REC] })).split("\n");
    expect(lines).toContain(
      "1. **[Critical]** No authentication policy configured. API is publicly accessible.",
    );
    expect(lines).toContain("   - *Action:* Add authentication policy (OAuth2, JWT, or API Key recommended)");
  });

  it("says so when there is nothing to recommend", () => {
    const report = generateMarkdownReport(makeAnalysis("Orders", {}));
    expect(report).toContain("No recommendations. The API configuration looks good.");
    expect(report).not.toContain("## Top Consumers");
  });

  it("lists degraded steps", () => {
    const analysis = { ...makeAnalysis("Orders", {}), degraded: ["traffic" as const] };
    expect(generateMarkdownReport(analysis)).toContain("- **Degraded data:** traffic");
  });

  it("ends with the footer", () => {
    const report = generateMarkdownReport(makeAnalysis("Orders", {}));
    expect(report.endsWith("---\n*Report generated by gatewise*\n")).toBe(true);
  });
});
