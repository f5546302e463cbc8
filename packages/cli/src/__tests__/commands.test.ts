import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { ConfigurationNotFoundError, InvalidInputError } from "@gatewise/engine";
import { runScore } from "../commands/score.js";
import { runStats } from "../commands/stats.js";
import { runReport } from "../commands/report.js";
import { runWeights } from "../commands/weights.js";
import { runSensitive } from "../commands/sensitive.js";
import { runTimeline } from "../commands/timeline.js";
import { runOverview } from "../commands/overview.js";

const TEST_DIR = join(tmpdir(), `gatewise-cli-test-${Date.now()}`);
const FIXTURES = join(TEST_DIR, "fixtures.json");
const OUTPUT = join(TEST_DIR, "out.json");

function baseArgs(extra: Record<string, string> = {}): Record<string, string> {
  return {
    config: TEST_DIR,
    fixtures: FIXTURES,
    start: "2025-03-01T00:00:00Z",
    end: "2025-03-02T00:00:00Z",
    format: "json",
    output: OUTPUT,
    ...extra,
  };
}

function readOutput(): Record<string, unknown> {
  return JSON.parse(readFileSync(OUTPUT, "utf-8"));
}

describe("commands", () => {
  beforeEach(() => {
    mkdirSync(join(TEST_DIR, "apis"), { recursive: true });
    writeFileSync(join(TEST_DIR, ".gatewise.yml"), "config_dir: apis\n");
    writeFileSync(
      join(TEST_DIR, "apis", "orders.json"),
      JSON.stringify({
        id: "orders",
        name: "Orders API",
        requestPolicyList: [{ _class: "com.gw.PolicyJwtAuthentication" }],
      }),
    );
    writeFileSync(
      join(TEST_DIR, "apis", "billing.yml"),
      "id: billing\nname: Billing API\n",
    );
    writeFileSync(
      FIXTURES,
      JSON.stringify({
        entries: [
          { entityId: "orders", entityName: "Orders API", timestamp: "2025-03-01T10:00:00Z", clientIp: "10.0.0.1", status: 200 },
          { entityId: "orders", entityName: "Orders API", timestamp: "2025-03-01T11:00:00Z", clientIp: "10.0.0.2", status: 200 },
        ],
      }),
    );
    vi.spyOn(process.stderr, "write").mockImplementation(() => true);
  });

  afterEach(() => {
    rmSync(TEST_DIR, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("score writes the analysis as JSON", async () => {
    expect(await runScore(["orders"], baseArgs())).toBe(0);

    expect(readOutput()).toMatchObject({
      entityId: "orders",
      entityName: "Orders API",
      degraded: [],
      stats: { totalRequests: 2, uniqueIps: 2 },
      report: { componentScores: { authentication_strength: 100 } },
    });
  });

  it("score returns 1 below --fail-below", async () => {
    expect(await runScore(["orders"], baseArgs({ "fail-below": "100" }))).toBe(1);
    expect(await runScore(["orders"], baseArgs({ "fail-below": "0" }))).toBe(0);
  });

  it("score writes a markdown report", async () => {
    const md = join(TEST_DIR, "report.md");
    await runScore(["orders"], baseArgs({ format: "markdown", output: md }));
    expect(readFileSync(md, "utf-8").split("\n")[0]).toBe("# API Security Report: Orders API");
  });

  it("score rejects an unknown API and a missing id", async () => {
    await expect(runScore(["ghost"], baseArgs())).rejects.toBeInstanceOf(ConfigurationNotFoundError);
    await expect(runScore([], baseArgs())).rejects.toBeInstanceOf(InvalidInputError);
  });

  it("stats writes per-API traffic", async () => {
    expect(await runStats(baseArgs())).toBe(0);
    expect(Object.keys(readOutput())).toEqual(["orders"]);
  });

  it("stats rejects markdown output", async () => {
    await expect(runStats(baseArgs({ format: "markdown" }))).rejects.toBeInstanceOf(InvalidInputError);
  });

  it("report compliance covers every configured API", async () => {
    expect(await runReport(["compliance"], baseArgs())).toBe(0);
    expect(readOutput()).toMatchObject({
      totalApis: 2,
      checks: { authentication_required: { passed: 1, failed: 1, apisFailed: ["Billing API"] } },
    });
  });

  it("report executive includes policy coverage", async () => {
    await runReport(["executive"], baseArgs());
    expect(readOutput()).toMatchObject({
      summary: { totalApis: 2 },
      securityCoverage: { withAuth: 1, authPercentage: 50 },
    });
  });

  it("report requires a known kind", async () => {
    await expect(runReport(["weekly"], baseArgs())).rejects.toThrow("report requires one of executive, compliance");
  });

  it("weights prints the effective weights", () => {
    writeFileSync(join(TEST_DIR, ".gatewise.yml"), "weights:\n  quota_configured: 0.1\n");
    expect(runWeights(baseArgs())).toBe(0);
    expect(readOutput()).toMatchObject({ quota_configured: 0.1, authentication_strength: 0.2 });
  });

  it("sensitive reports keyword exposure for one API", async () => {
    expect(await runSensitive(["orders"], baseArgs({ "sample-size": "10" }))).toBe(0);
    expect(readOutput()).toEqual({ totalLogsChecked: 2, sensitiveKeywords: {}, hasSensitiveData: false });
  });

  it("timeline returns points and the hour-of-day distribution", async () => {
    expect(await runTimeline(["orders"], baseArgs())).toBe(0);
    const out = readOutput();
    expect(out.timeline).toEqual([
      { timestamp: "2025-03-01T10:00:00.000Z", requests: 1, avgResponseTime: 0, errors: 0 },
      { timestamp: "2025-03-01T11:00:00.000Z", requests: 1, avgResponseTime: 0, errors: 0 },
    ]);
    expect(out.totalRequests).toBe(2);
  });

  it("timeline rejects an unsupported interval", async () => {
    await expect(runTimeline(["orders"], baseArgs({ interval: "2h" }))).rejects.toThrow(
      "--interval must be one of 1m, 5m, 1h, 1d, got '2h'",
    );
  });

  it("overview reads only the configuration store", async () => {
    expect(await runOverview({ config: TEST_DIR, format: "json", output: OUTPUT })).toBe(0);
    expect(readOutput()).toEqual({
      totalApis: 2,
      withSecurity: 0,
      withThrottling: 0,
      withAuth: 1,
      securityPercentage: 0,
      throttlingPercentage: 0,
      authPercentage: 50,
    });
  });
});
