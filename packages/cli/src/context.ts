import { resolve } from "node:path";
import {
  DirectoryConfigurationStore,
  SecurityScorer,
  createLogStore,
  loadSensitiveKeywords,
  resolveConfig,
  resolveDateRange,
  type AnalyzerDeps,
  type ConfigurationStore,
  type DateRange,
  type GatewiseConfig,
  type LogStore,
} from "@gatewise/engine";
import { readPositiveInt } from "./args.js";

export interface CommandContext {
  config: GatewiseConfig;
  logStore: LogStore;
  configStore: ConfigurationStore;
  range: DateRange;
  deps: AnalyzerDeps;
}

/**
 * Resolve config, stores and the date range from the shared flags:
 * --config, --fixtures, --start, --end and --sample-size.
 */
export function buildContext(args: Record<string, string>): CommandContext {
  const config = resolveConfig(resolve(args["config"] ?? "."));

  const logStore: LogStore = args["fixtures"]
    ? createLogStore({ kind: "fixtures", path: resolve(args["fixtures"]) })
    : createLogStore({
        kind: "elasticsearch",
        url: config.elasticsearch.url,
        indexPattern: config.elasticsearch.index_pattern,
        username: config.elasticsearch.username,
        password: config.elasticsearch.password,
        fields: config.fields,
      });

  const configStore = new DirectoryConfigurationStore(config.config_dir);

  const range = resolveDateRange({
    start: args["start"],
    end: args["end"],
    defaultDays: config.default_range_days,
    maxDays: config.max_range_days,
  });

  const deps: AnalyzerDeps = {
    logStore,
    configStore,
    scorer: new SecurityScorer(config.weights),
    keywords: loadSensitiveKeywords(config.sensitive_keywords_file ?? undefined),
    sampleSize: readPositiveInt(args, "sample-size") ?? config.sample_size,
  };

  return { config, logStore, configStore, range, deps };
}
