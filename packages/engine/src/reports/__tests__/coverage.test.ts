import { describe, expect, it } from "vitest";

import { makeConfig } from "../../__tests__/helpers.js";
import { policyCoverage } from "../coverage.js";

describe("policyCoverage", () => {
  it("counts APIs with at least one policy of each category", () => {
    const coverage = policyCoverage([
      makeConfig(["!PolicyIpWhite", "PolicyJwtAuthentication"]),
      makeConfig(["PolicyApiBasedQuota", "PolicyBasicAuthentication", "PolicyEndpointRateLimit"]),
      makeConfig([]),
      makeConfig(["PolicyUnknown"]),
    ]);

    expect(coverage).toEqual({
      totalApis: 4,
      withSecurity: 1,
      withThrottling: 1,
      withAuth: 2,
      securityPercentage: 25,
      throttlingPercentage: 25,
      authPercentage: 50,
    });
  });

  it("reports zero percentages for an empty fleet", () => {
    expect(policyCoverage([])).toEqual({
      totalApis: 0,
      withSecurity: 0,
      withThrottling: 0,
      withAuth: 0,
      securityPercentage: 0,
      throttlingPercentage: 0,
      authPercentage: 0,
    });
  });
});
