// ---------------------------------------------------------------------------
// @gatewise/engine
//
// API gateway security scoring engine, used by the CLI.
// ---------------------------------------------------------------------------

// Data model
export {
  SeveritySchema,
  RecommendationSchema,
  COMPONENT_NAMES,
  ComponentNameSchema,
  SecurityLevelSchema,
  PolicyRefSchema,
  PolicySetSchema,
  SslCoverageSchema,
  ConfigurationSnapshotSchema,
  type Severity,
  type Recommendation,
  type ComponentName,
  type ScoringWeights,
  type SecurityLevel,
  type ScoreReport,
  type PolicyRef,
  type PolicySet,
  type NonSslEndpoint,
  type SslCoverage,
  type DeployedEnvironment,
  type ConfigurationSnapshot,
} from "./schemas.js";

export type {
  DateRange,
  ActorCount,
  KeywordExposure,
  SensitiveExposure,
  TrafficStats,
  LogRecord,
  TimelinePoint,
  HourlyDistribution,
} from "./types.js";

// Errors
export {
  UpstreamUnavailableError,
  ConfigurationNotFoundError,
  InvalidInputError,
} from "./errors.js";

// Policies
export {
  POLICY_KINDS,
  isPolicyKind,
  policyTypeFromClass,
  classifyPolicy,
  hasEnabledPolicy,
  authenticationStrength,
  type PolicyKind,
  type PolicyCategory,
  type AuthStrength,
} from "./policies.js";

// Traffic
export {
  aggregateTrafficStats,
  emptyTrafficStats,
  hourOfDay,
} from "./traffic/aggregator.js";
export {
  parseTimeline,
  hourlyDistribution,
  isTimelineInterval,
  TIMELINE_INTERVALS,
  type TimelineInterval,
} from "./traffic/timeline.js";
export { resolveDateRange, type ResolveDateRangeOptions } from "./traffic/date-range.js";

// Sensitive data
export {
  DEFAULT_SENSITIVE_KEYWORDS,
  parseKeywordList,
  loadSensitiveKeywords,
} from "./sensitive/keywords.js";
export {
  SensitiveFieldScanner,
  scanRecords,
  DEFAULT_SAMPLE_SIZE,
  type SensitiveFieldScannerOptions,
} from "./sensitive/scanner.js";

// Scoring
export { SecurityScorer, securityLevelFor, DEFAULT_WEIGHTS } from "./scoring/scorer.js";
export type { ComponentResult } from "./scoring/components.js";

// Collaborators
export {
  createLogStore,
  type CreateLogStoreOptions,
  type LogStore,
  type LogFieldMap,
  DEFAULT_FIELDS,
  ElasticsearchLogStore,
  InMemoryLogStore,
} from "./sources/index.js";
export type { LogEntry } from "./sources/memory-log-store.js";
export {
  InMemoryConfigurationStore,
  DirectoryConfigurationStore,
  type ConfigurationStore,
} from "./sources/config-store.js";
export { normalizeProxyDocument } from "./sources/proxy-document.js";

// Orchestration
export {
  analyzeEntity,
  analyzeAll,
  getTrafficStats,
  getTimeline,
  getHourlyDistribution,
  type AnalyzerDeps,
  type EntityAnalysis,
  type DegradedStep,
} from "./analyzer.js";

// Reports
export { policyCoverage, type PolicyCoverage } from "./reports/coverage.js";
export {
  executiveSummary,
  complianceReport,
  summarizeRecommendations,
  type ExecutiveSummary,
  type ComplianceReport,
  type ComplianceCheck,
  type AttributedRecommendation,
} from "./reports/summary.js";
export { generateMarkdownReport, COMPONENT_LABELS, type ReportOptions } from "./formatters/markdown-report.js";

// Config
export {
  loadConfig,
  resolveConfig,
  applyEnvOverrides,
  checkWeightSum,
  DEFAULT_CONFIG,
  CONFIG_FILE,
  type GatewiseConfig,
  type ElasticsearchConfig,
} from "./config.js";

// Logging
export { logger } from "./logger.js";
