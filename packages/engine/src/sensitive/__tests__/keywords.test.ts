import { afterEach, describe, expect, it, vi } from "vitest";
import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { DEFAULT_SENSITIVE_KEYWORDS, loadSensitiveKeywords, parseKeywordList } from "../keywords.js";

const TEST_DIR = join(tmpdir(), `gatewise-keywords-test-${Date.now()}`);

describe("parseKeywordList", () => {
  it("splits on commas when the content has one", () => {
    expect(parseKeywordList("tc, Kimlik ,tel,,")).toEqual(["tc", "kimlik", "tel"]);
  });

  it("reads one keyword per line otherwise", () => {
    expect(parseKeywordList("Password\nSECRET\r\n\n token \n")).toEqual(["password", "secret", "token"]);
  });

  it("drops duplicates", () => {
    expect(parseKeywordList("token,TOKEN, token")).toEqual(["token"]);
  });

  it("returns nothing for blank content", () => {
    expect(parseKeywordList("  \n ")).toEqual([]);
  });
});

describe("loadSensitiveKeywords", () => {
  afterEach(() => {
    rmSync(TEST_DIR, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("uses the built-in list when no file is configured", () => {
    expect(loadSensitiveKeywords()).toEqual([...DEFAULT_SENSITIVE_KEYWORDS]);
  });

  it("reads a file relative to the base directory", () => {
    mkdirSync(TEST_DIR, { recursive: true });
    writeFileSync(join(TEST_DIR, "keywords.txt"), "iban\ncard_number\n");
    expect(loadSensitiveKeywords("keywords.txt", TEST_DIR)).toEqual(["iban", "card_number"]);
  });

  it("warns and falls back when the file is missing", () => {
    const stderrSpy = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    expect(loadSensitiveKeywords("missing.txt", TEST_DIR)).toEqual([...DEFAULT_SENSITIVE_KEYWORDS]);
    expect(stderrSpy).toHaveBeenCalledWith(expect.stringContaining("Sensitive keywords file not found"));
  });
});
