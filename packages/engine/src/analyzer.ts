/**
 * Analysis orchestrator.
 *
 * Pipeline per API:
 *   1. Load the configuration snapshot (missing -> ConfigurationNotFoundError)
 *   2. Fetch and aggregate traffic for the date range
 *   3. Sample recent records and scan them for sensitive keywords
 *   4. Merge the exposure into the traffic stats and score
 *
 * An unreachable log store degrades steps 2 and 3 to zero records; the API
 * is still scored and the degraded steps are listed on the result.
 */

import { ConfigurationNotFoundError, UpstreamUnavailableError } from "./errors.js";
import { logger } from "./logger.js";
import type { ConfigurationSnapshot, ScoreReport } from "./schemas.js";
import { DEFAULT_SAMPLE_SIZE, SensitiveFieldScanner } from "./sensitive/scanner.js";
import { SecurityScorer } from "./scoring/scorer.js";
import type { ConfigurationStore } from "./sources/config-store.js";
import type { LogStore } from "./sources/log-store.js";
import { aggregateTrafficStats, assertValidRange, emptyTrafficStats } from "./traffic/aggregator.js";
import { hourlyDistribution, parseTimeline, type TimelineInterval } from "./traffic/timeline.js";
import type { DateRange, HourlyDistribution, TimelinePoint, TrafficStats } from "./types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AnalyzerDeps {
  logStore: LogStore;
  configStore: ConfigurationStore;
  /** Defaults to a scorer with DEFAULT_WEIGHTS. */
  scorer?: SecurityScorer;
  /** Defaults to DEFAULT_SENSITIVE_KEYWORDS. */
  keywords?: readonly string[];
  /** Records sampled per API for the sensitive-field scan. Defaults to 1000. */
  sampleSize?: number;
}

export type DegradedStep = "traffic" | "sensitive_data";

export interface EntityAnalysis {
  entityId: string;
  entityName: string;
  range: DateRange;
  configuration: ConfigurationSnapshot;
  /** Traffic stats with the sensitive-field exposure merged in. */
  stats: TrafficStats;
  report: ScoreReport;
  /** Steps that fell back to zero records because a store was unreachable. */
  degraded: DegradedStep[];
  generatedAt: string;
}

// ---------------------------------------------------------------------------
// Traffic
// ---------------------------------------------------------------------------

interface TrafficFetch {
  stats: Record<string, TrafficStats>;
  degraded: boolean;
}

async function fetchTraffic(logStore: LogStore, range: DateRange, entityId?: string): Promise<TrafficFetch> {
  try {
    const raw = await logStore.fetchTrafficAggregation(range, entityId);
    return { stats: aggregateTrafficStats(raw, range.start, range.end), degraded: false };
  } catch (err) {
    if (!(err instanceof UpstreamUnavailableError)) throw err;
    logger.warn(`Traffic statistics unavailable, scoring with empty traffic: ${err.message}`);
    return { stats: {}, degraded: true };
  }
}

/** Per-API traffic stats without scoring; propagates store failures. */
export async function getTrafficStats(
  logStore: LogStore,
  range: DateRange,
  entityId?: string,
): Promise<Record<string, TrafficStats>> {
  assertValidRange(range.start, range.end);
  const raw = await logStore.fetchTrafficAggregation(range, entityId);
  return aggregateTrafficStats(raw, range.start, range.end);
}

export async function getTimeline(
  logStore: LogStore,
  entityId: string,
  range: DateRange,
  interval: TimelineInterval = "1h",
): Promise<TimelinePoint[]> {
  assertValidRange(range.start, range.end);
  return parseTimeline(await logStore.fetchTimeline(entityId, range, interval));
}

export async function getHourlyDistribution(
  logStore: LogStore,
  entityId: string,
  range: DateRange,
): Promise<HourlyDistribution> {
  assertValidRange(range.start, range.end);
  return hourlyDistribution(await logStore.fetchHourlyHistogram(entityId, range));
}

// ---------------------------------------------------------------------------
// Scoring
// ---------------------------------------------------------------------------

async function scoreWithTraffic(
  deps: AnalyzerDeps,
  configuration: ConfigurationSnapshot,
  traffic: TrafficFetch,
  range: DateRange,
): Promise<EntityAnalysis> {
  const degraded: DegradedStep[] = traffic.degraded ? ["traffic"] : [];
  const base = Object.hasOwn(traffic.stats, configuration.id)
    ? traffic.stats[configuration.id]
    : emptyTrafficStats(configuration.name);

  const scanner = new SensitiveFieldScanner({ logStore: deps.logStore, keywords: deps.keywords });
  const exposure = await scanner.scan(configuration.id, deps.sampleSize ?? DEFAULT_SAMPLE_SIZE);
  if (exposure.error !== undefined) degraded.push("sensitive_data");

  const stats: TrafficStats = { ...base, sensitiveData: exposure };
  const report = (deps.scorer ?? new SecurityScorer()).score(configuration, stats);

  return {
    entityId: configuration.id,
    entityName: configuration.name,
    range,
    configuration,
    stats,
    report,
    degraded,
    generatedAt: new Date().toISOString(),
  };
}

/**
 * Analyse and score one API. Throws ConfigurationNotFoundError when the
 * configuration store has no snapshot for it, InvalidInputError for a
 * reversed range.
 */
export async function analyzeEntity(
  deps: AnalyzerDeps,
  entityId: string,
  range: DateRange,
): Promise<EntityAnalysis> {
  assertValidRange(range.start, range.end);

  const configuration = await deps.configStore.fetchConfiguration(entityId);
  if (!configuration) throw new ConfigurationNotFoundError(entityId);

  const traffic = await fetchTraffic(deps.logStore, range, entityId);
  return scoreWithTraffic(deps, configuration, traffic, range);
}

/**
 * Analyse every API the configuration store knows, with one traffic query
 * for the whole fleet. Results follow the store's order.
 */
export async function analyzeAll(deps: AnalyzerDeps, range: DateRange): Promise<EntityAnalysis[]> {
  assertValidRange(range.start, range.end);

  const configurations = await deps.configStore.listConfigurations();
  const traffic = await fetchTraffic(deps.logStore, range);

  const results: EntityAnalysis[] = [];
  for (const configuration of configurations) {
    results.push(await scoreWithTraffic(deps, configuration, traffic, range));
  }
  logger.debug(`analysed ${results.length} APIs`);
  return results;
}
