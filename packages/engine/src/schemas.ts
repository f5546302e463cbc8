import { z } from "zod";

// ---------------------------------------------------------------------------
// Recommendations
// ---------------------------------------------------------------------------

export const SeveritySchema = z.enum(["critical", "high", "medium", "low"]);

export type Severity = z.infer<typeof SeveritySchema>;

export const RecommendationSchema = z.object({
  severity: SeveritySchema,
  /** Short machine-readable area, e.g. "throttling", "ssl_tls". */
  category: z.string(),
  message: z.string(),
  action: z.string(),
});

export type Recommendation = z.infer<typeof RecommendationSchema>;

// ---------------------------------------------------------------------------
// Score components and weights
// ---------------------------------------------------------------------------

/** The nine score components, in evaluation order. */
export const COMPONENT_NAMES = [
  "ip_whitelist_coverage",
  "throttling_configured",
  "quota_configured",
  "authentication_strength",
  "allowed_hours",
  "traffic_anomaly",
  "error_rate",
  "ssl_tls_status",
  "logging_status",
] as const;

export const ComponentNameSchema = z.enum(COMPONENT_NAMES);

export type ComponentName = z.infer<typeof ComponentNameSchema>;

/** Weight per component. A component with no weight contributes nothing. */
export type ScoringWeights = Partial<Record<ComponentName, number>>;

export const SecurityLevelSchema = z.enum(["Critical", "Poor", "Fair", "Good", "Excellent"]);

export type SecurityLevel = z.infer<typeof SecurityLevelSchema>;

export interface ScoreReport {
  readonly componentScores: Readonly<Record<ComponentName, number>>;
  /** Weighted sum, rounded to two decimals. */
  readonly totalScore: number;
  readonly securityLevel: SecurityLevel;
  /** Concatenated in component evaluation order, never re-sorted. */
  readonly recommendations: readonly Recommendation[];
}

// ---------------------------------------------------------------------------
// Configuration snapshot
// ---------------------------------------------------------------------------

export const PolicyRefSchema = z.object({
  /** Policy kind tag, e.g. "PolicyIpWhite". Unknown tags are kept as-is. */
  type: z.string(),
  enabled: z.boolean().default(true),
  order: z.number().int().default(0),
});

export type PolicyRef = z.infer<typeof PolicyRefSchema>;

export const PolicySetSchema = z.object({
  request: z.array(PolicyRefSchema).default([]),
  response: z.array(PolicyRefSchema).default([]),
  error: z.array(PolicyRefSchema).default([]),
});

export type PolicySet = z.infer<typeof PolicySetSchema>;

export const NonSslEndpointSchema = z.object({
  /** Environment name for client deployments, address for backends. */
  name: z.string(),
  url: z.string(),
});

export type NonSslEndpoint = z.infer<typeof NonSslEndpointSchema>;

export const SslCoverageSchema = z.object({
  total: z.number().int().nonnegative().default(0),
  sslCount: z.number().int().nonnegative().default(0),
  nonSslList: z.array(NonSslEndpointSchema).default([]),
  allSsl: z.boolean().default(false),
});

export type SslCoverage = z.infer<typeof SslCoverageSchema>;

export const DeployedEnvironmentSchema = z.object({
  name: z.string(),
  url: z.string(),
  protocol: z.string().optional(),
});

export type DeployedEnvironment = z.infer<typeof DeployedEnvironmentSchema>;

export const ConfigurationSnapshotSchema = z.object({
  id: z.string(),
  name: z.string(),
  policies: PolicySetSchema.default({}),
  clientSsl: SslCoverageSchema.default({}),
  backendSsl: SslCoverageSchema.default({}),
  /** Informational only; not scored. */
  logsEnabled: z.boolean().default(false),
  deployedEnvironments: z.array(DeployedEnvironmentSchema).default([]),
});

export type ConfigurationSnapshot = z.infer<typeof ConfigurationSnapshotSchema>;
