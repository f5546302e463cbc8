/**
 * Fleet policy coverage: how many APIs carry at least one policy of each
 * coarse category. Presence counts whether or not the policy is enabled.
 */

import { round2 } from "../math.js";
import { allPolicies, classifyPolicy, type PolicyCategory } from "../policies.js";
import type { ConfigurationSnapshot } from "../schemas.js";

export interface PolicyCoverage {
  totalApis: number;
  withSecurity: number;
  withThrottling: number;
  withAuth: number;
  securityPercentage: number;
  throttlingPercentage: number;
  authPercentage: number;
}

function percent(part: number, whole: number): number {
  return whole > 0 ? round2((part / whole) * 100) : 0;
}

export function policyCoverage(configs: readonly ConfigurationSnapshot[]): PolicyCoverage {
  const counts: Record<PolicyCategory, number> = { security: 0, throttling: 0, authentication: 0 };

  for (const config of configs) {
    const present = new Set<PolicyCategory>();
    for (const p of allPolicies(config)) {
      const category = classifyPolicy(p.type);
      if (category) present.add(category);
    }
    for (const category of present) counts[category]++;
  }

  const total = configs.length;
  return {
    totalApis: total,
    withSecurity: counts.security,
    withThrottling: counts.throttling,
    withAuth: counts.authentication,
    securityPercentage: percent(counts.security, total),
    throttlingPercentage: percent(counts.throttling, total),
    authPercentage: percent(counts.authentication, total),
  };
}
