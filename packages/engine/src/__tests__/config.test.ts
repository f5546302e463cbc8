import { describe, it, expect, afterEach, vi } from "vitest";
import { mkdirSync, writeFileSync, existsSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { applyEnvOverrides, checkWeightSum, DEFAULT_CONFIG, loadConfig, resolveConfig } from "../config.js";
import { DEFAULT_WEIGHTS } from "../scoring/scorer.js";

const TEST_DIR = join(tmpdir(), `gatewise-config-test-${Date.now()}`);

function setupConfig(content: string): void {
  mkdirSync(TEST_DIR, { recursive: true });
  writeFileSync(join(TEST_DIR, ".gatewise.yml"), content);
}

function stderrSpy() {
  return vi.spyOn(process.stderr, "write").mockImplementation(() => true);
}

describe("loadConfig", () => {
  afterEach(() => {
    if (existsSync(TEST_DIR)) {
      rmSync(TEST_DIR, { recursive: true, force: true });
    }
    vi.restoreAllMocks();
  });

  it("returns null when no config file exists", () => {
    mkdirSync(TEST_DIR, { recursive: true });
    expect(loadConfig(TEST_DIR)).toBeNull();
  });

  it("parses valid config", () => {
    setupConfig(`
weights:
  authentication_strength: 0.25
  logging_status: 0.15
sensitive_keywords_file: keywords.txt
sample_size: 500
default_range_days: 3
max_range_days: 30
config_dir: ./exports
elasticsearch:
  url: http://es.internal:9200
  index_pattern: gw-*
  username: elastic
fields:
  clientIp: client_ip
`);

    const config = loadConfig(TEST_DIR);
    expect(config?.weights.authentication_strength).toBe(0.25);
    expect(config?.weights.logging_status).toBe(0.15);
    expect(config?.weights.ip_whitelist_coverage).toBe(0.15);
    expect(config?.sensitive_keywords_file).toBe("keywords.txt");
    expect(config?.sample_size).toBe(500);
    expect(config?.default_range_days).toBe(3);
    expect(config?.max_range_days).toBe(30);
    expect(config?.config_dir).toBe("./exports");
    expect(config?.elasticsearch).toEqual({ url: "http://es.internal:9200", index_pattern: "gw-*", username: "elastic" });
    expect(config?.fields).toEqual({ clientIp: "client_ip" });
  });

  it("returns defaults for empty YAML", () => {
    setupConfig("");

    const config = loadConfig(TEST_DIR);
    expect(config).toEqual(DEFAULT_CONFIG);
    expect(config?.weights).not.toBe(DEFAULT_CONFIG.weights);
  });

  it("warns on typo in a weight name", () => {
    const spy = stderrSpy();
    setupConfig(`
weights:
  authentcation_strength: 0.2
`);

    const config = loadConfig(TEST_DIR);
    expect(config?.weights).toEqual(DEFAULT_WEIGHTS);
    expect(spy).toHaveBeenCalledWith(
      "[gatewise] Warning: unknown score component 'authentcation_strength' in weights. Did you mean 'authentication_strength'?\n",
    );
  });

  it("warns when weights do not sum to 1", () => {
    const spy = stderrSpy();
    setupConfig(`
weights:
  logging_status: 0.5
`);

    expect(loadConfig(TEST_DIR)?.weights.logging_status).toBe(0.5);
    expect(spy).toHaveBeenCalledWith("[gatewise] Warning: scoring weights sum to 1.300, expected 1.0\n");
  });

  it("ignores negative weights", () => {
    const spy = stderrSpy();
    setupConfig(`
weights:
  quota_configured: -1
`);

    expect(loadConfig(TEST_DIR)?.weights.quota_configured).toBe(0.05);
    expect(spy).toHaveBeenCalledWith(expect.stringContaining("negative weight for 'quota_configured'"));
  });

  it("warns on unknown top-level keys", () => {
    const spy = stderrSpy();
    setupConfig("sampel_size: 10\n");

    loadConfig(TEST_DIR);
    expect(spy).toHaveBeenCalledWith(
      "[gatewise] Warning: unknown config key 'sampel_size'. Did you mean 'sample_size'?\n",
    );
  });

  it("warns on unknown log fields", () => {
    const spy = stderrSpy();
    setupConfig(`
fields:
  bogus: x
  status: http_status
`);

    expect(loadConfig(TEST_DIR)?.fields).toEqual({ status: "http_status" });
    expect(spy).toHaveBeenCalledWith(expect.stringContaining("unknown log field 'bogus'"));
  });

  it("returns defaults on validation errors", () => {
    const spy = stderrSpy();
    setupConfig("sample_size: -5\n");

    expect(loadConfig(TEST_DIR)?.sample_size).toBe(1000);
    expect(spy).toHaveBeenCalledWith(expect.stringContaining("config validation error at sample_size"));
  });

  it("returns defaults on unparseable YAML", () => {
    const spy = stderrSpy();
    setupConfig("weights: [\n");

    expect(loadConfig(TEST_DIR)).toEqual(DEFAULT_CONFIG);
    expect(spy).toHaveBeenCalledWith(expect.stringContaining("could not parse .gatewise.yml"));
  });

  it("clamps the default range to the maximum", () => {
    stderrSpy();
    setupConfig("default_range_days: 120\n");

    expect(loadConfig(TEST_DIR)?.default_range_days).toBe(90);
  });
});

describe("checkWeightSum", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("accepts sums within tolerance", () => {
    expect(checkWeightSum(DEFAULT_WEIGHTS)).toBe(true);
    expect(checkWeightSum({ ...DEFAULT_WEIGHTS, quota_configured: 0.055 })).toBe(true);
  });

  it("rejects sums outside tolerance", () => {
    stderrSpy();
    expect(checkWeightSum({ authentication_strength: 0.5 })).toBe(false);
  });
});

describe("applyEnvOverrides", () => {
  it("overrides elasticsearch settings from the environment", () => {
    const config = applyEnvOverrides(DEFAULT_CONFIG, {
      GATEWISE_ES_URL: "http://es.test:9200",
      GATEWISE_ES_USERNAME: "elastic",
      GATEWISE_ES_PASSWORD: "test-secret",
    });
    expect(config.elasticsearch).toEqual({
      url: "http://es.test:9200",
      index_pattern: "gateway-logs-*",
      username: "elastic",
      password: "test-secret",
    });
    expect(DEFAULT_CONFIG.elasticsearch.username).toBeUndefined();
  });
});

describe("resolveConfig", () => {
  afterEach(() => {
    rmSync(TEST_DIR, { recursive: true, force: true });
  });

  it("resolves relative paths against the config directory", () => {
    setupConfig("config_dir: apis\nsensitive_keywords_file: kw.txt\n");

    const config = resolveConfig(TEST_DIR, {});
    expect(config.config_dir).toBe(join(TEST_DIR, "apis"));
    expect(config.sensitive_keywords_file).toBe(join(TEST_DIR, "kw.txt"));
  });

  it("falls back to defaults without a config file", () => {
    mkdirSync(TEST_DIR, { recursive: true });

    const config = resolveConfig(TEST_DIR, {});
    expect(config.config_dir).toBe(join(TEST_DIR, "apis"));
    expect(config.sensitive_keywords_file).toBeNull();
  });
});
