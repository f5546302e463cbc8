/**
 * Gateway policy taxonomy.
 *
 * The gateway identifies a policy by the last segment of its dotted class
 * name ("com.example.policy.PolicyIpWhite" -> "PolicyIpWhite"). Only the
 * kinds listed here are tracked; any other tag classifies as nothing.
 */

import type { ConfigurationSnapshot, PolicyRef } from "./schemas.js";

export const POLICY_KINDS = [
  // Access control
  "PolicyIpWhite",
  "PolicyIpBlack",
  "PolicyAllowedHours",
  "PolicyClientBanner",
  "PolicySaml",
  "PolicyCondition",
  // Rate limiting
  "PolicyApiBasedThrottling",
  "PolicyEndpointRateLimit",
  "PolicyApiBasedQuota",
  // Authentication
  "PolicyApiAuthentication",
  "PolicyBasicAuthentication",
  "PolicyDigestAuthentication",
  "PolicyBase64Authentication",
  "PolicyJwtAuthentication",
  "PolicyOauth2Authentication",
  "PolicyMTLSAuthentication",
] as const;

export type PolicyKind = (typeof POLICY_KINDS)[number];

const KNOWN_KINDS: ReadonlySet<string> = new Set(POLICY_KINDS);

export function isPolicyKind(tag: string): tag is PolicyKind {
  return KNOWN_KINDS.has(tag);
}

export const IP_WHITELIST_KINDS: readonly PolicyKind[] = ["PolicyIpWhite"];
export const THROTTLING_KINDS: readonly PolicyKind[] = ["PolicyApiBasedThrottling", "PolicyEndpointRateLimit"];
export const QUOTA_KINDS: readonly PolicyKind[] = ["PolicyApiBasedQuota"];
export const ALLOWED_HOURS_KINDS: readonly PolicyKind[] = ["PolicyAllowedHours"];

/** Strong token or certificate based authentication. */
export const STRONG_AUTH_KINDS: readonly PolicyKind[] = [
  "PolicyOauth2Authentication",
  "PolicyJwtAuthentication",
  "PolicyMTLSAuthentication",
];
/** Generic API-key style authentication. */
export const STANDARD_AUTH_KINDS: readonly PolicyKind[] = ["PolicyApiAuthentication"];
/** Password-style schemes that send reusable credentials. */
export const BASIC_AUTH_KINDS: readonly PolicyKind[] = [
  "PolicyBasicAuthentication",
  "PolicyDigestAuthentication",
  "PolicyBase64Authentication",
];

/** Coarse categories used by the fleet coverage overview. */
export type PolicyCategory = "security" | "throttling" | "authentication";

const CATEGORY_BY_KIND: Record<PolicyKind, PolicyCategory> = {
  PolicyIpWhite: "security",
  PolicyIpBlack: "security",
  PolicyAllowedHours: "security",
  PolicyClientBanner: "security",
  PolicySaml: "security",
  PolicyCondition: "security",
  PolicyApiBasedThrottling: "throttling",
  PolicyEndpointRateLimit: "throttling",
  PolicyApiBasedQuota: "throttling",
  PolicyApiAuthentication: "authentication",
  PolicyBasicAuthentication: "authentication",
  PolicyDigestAuthentication: "authentication",
  PolicyBase64Authentication: "authentication",
  PolicyJwtAuthentication: "authentication",
  PolicyOauth2Authentication: "authentication",
  PolicyMTLSAuthentication: "authentication",
};

/** Extract the policy tag from a fully-qualified class name. */
export function policyTypeFromClass(fullClass: string): string {
  const idx = fullClass.lastIndexOf(".");
  return idx === -1 ? fullClass : fullClass.slice(idx + 1);
}

export function classifyPolicy(tag: string): PolicyCategory | null {
  return isPolicyKind(tag) ? CATEGORY_BY_KIND[tag] : null;
}

/** Request, response and error policies, in that order. */
export function allPolicies(config: ConfigurationSnapshot): PolicyRef[] {
  return [
    ...config.policies.request,
    ...config.policies.response,
    ...config.policies.error,
  ];
}

export function enabledKinds(config: ConfigurationSnapshot): Set<PolicyKind> {
  const kinds = new Set<PolicyKind>();
  for (const p of allPolicies(config)) {
    if (p.enabled && isPolicyKind(p.type)) kinds.add(p.type);
  }
  return kinds;
}

export function hasEnabledPolicy(
  config: ConfigurationSnapshot,
  kinds: readonly PolicyKind[],
): boolean {
  const enabled = enabledKinds(config);
  return kinds.some((k) => enabled.has(k));
}

export type AuthStrength = "none" | "basic" | "standard" | "strong";

/** Strongest enabled authentication class on the API. */
export function authenticationStrength(config: ConfigurationSnapshot): AuthStrength {
  const enabled = enabledKinds(config);
  if (STRONG_AUTH_KINDS.some((k) => enabled.has(k))) return "strong";
  if (STANDARD_AUTH_KINDS.some((k) => enabled.has(k))) return "standard";
  if (BASIC_AUTH_KINDS.some((k) => enabled.has(k))) return "basic";
  return "none";
}
