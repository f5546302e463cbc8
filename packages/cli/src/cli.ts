#!/usr/bin/env node

import {
  ConfigurationNotFoundError,
  InvalidInputError,
  UpstreamUnavailableError,
} from "@gatewise/engine";
import { parseArgs } from "./args.js";
import { runScore } from "./commands/score.js";
import { runStats } from "./commands/stats.js";
import { runSensitive } from "./commands/sensitive.js";
import { runTimeline } from "./commands/timeline.js";
import { runReport } from "./commands/report.js";
import { runOverview } from "./commands/overview.js";
import { runWeights } from "./commands/weights.js";

const VERSION = "0.1.0";

function printHelp(): void {
  process.stdout.write(`
\x1b[36mgatewise\x1b[0m - API gateway security scoring
\x1b[2mv${VERSION}\x1b[0m

\x1b[1mUSAGE\x1b[0m
  gatewise score <api-id>               Score one API (config + traffic)
  gatewise stats [--api <id>]           Traffic statistics per API
  gatewise sensitive <api-id>           Scan recent logs for sensitive keywords
  gatewise timeline <api-id>            Traffic timeline and hour-of-day heatmap
  gatewise report executive             Executive summary across all APIs
  gatewise report compliance            Compliance checklist across all APIs
  gatewise overview                     Policy coverage across all APIs
  gatewise weights                      Print effective scoring weights
  gatewise version                      Print version

\x1b[1mOPTIONS\x1b[0m
  --format <fmt>               Output: table, json, markdown (default: table; markdown for score only)
  --output <file>              Write report to file
  --start <iso-date>           Range start (default: end minus default_range_days)
  --end <iso-date>             Range end (default: now)
  --sample-size <n>            Logs sampled for the sensitive-data scan (default: 1000)
  --interval <i>               Timeline interval: 1m, 5m, 1h, 1d (default: 1h)
  --fixtures <file>            Read logs from a JSON fixture file instead of Elasticsearch
  --config <dir>               Directory holding .gatewise.yml (default: .)
  --fail-below <score>         Exit 1 if the total score is below this (score only)

\x1b[1mEXAMPLES\x1b[0m
  gatewise score orders-api                                 Score with the last 7 days of traffic
  gatewise score orders-api --format markdown --output r.md Markdown report to file
  gatewise score orders-api --fail-below 60                 CI gate on the total score
  gatewise stats --start 2025-01-01 --end 2025-01-31        Traffic for January
  gatewise report compliance --format json                  Compliance report as JSON

\x1b[1mGLOBAL OPTIONS\x1b[0m
  --verbose                    Set log level to debug
  --quiet                      Suppress info/warn output

\x1b[1mENVIRONMENT\x1b[0m
  GATEWISE_ES_URL                   Elasticsearch URL
  GATEWISE_ES_INDEX                 Index pattern
  GATEWISE_ES_USERNAME              Basic auth user
  GATEWISE_ES_PASSWORD              Basic auth password
  GATEWISE_LOG_LEVEL                Log level: debug, info, warn, error, silent

`);
}

async function main(): Promise<number> {
  const rawArgs = process.argv.slice(2);

  if (rawArgs.length === 0 || rawArgs.includes("--help") || rawArgs.includes("-h")) {
    printHelp();
    return 0;
  }

  if (rawArgs.includes("--version") || rawArgs.includes("-v")) {
    process.stdout.write(`gatewise v${VERSION}\n`);
    return 0;
  }

  const { command, args, positional } = parseArgs(rawArgs);

  switch (command) {
    case "version":
      process.stdout.write(`gatewise v${VERSION}\n`);
      return 0;

    case "help":
      printHelp();
      return 0;

    case "score":
      return runScore(positional, args);

    case "stats":
      return runStats(args);

    case "sensitive":
      return runSensitive(positional, args);

    case "timeline":
      return runTimeline(positional, args);

    case "report":
      return runReport(positional, args);

    case "overview":
      return runOverview(args);

    case "weights":
      return runWeights(args);

    default:
      process.stderr.write(`Unknown command: ${command}\n`);
      printHelp();
      return 1;
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    if (
      err instanceof InvalidInputError ||
      err instanceof ConfigurationNotFoundError ||
      err instanceof UpstreamUnavailableError
    ) {
      process.stderr.write(`[gatewise] Error: ${err.message}\n`);
    } else {
      const detail = err instanceof Error ? err.stack ?? err.message : String(err);
      process.stderr.write(`[gatewise] Fatal: ${detail}\n`);
    }
    process.exitCode = 1;
  });
