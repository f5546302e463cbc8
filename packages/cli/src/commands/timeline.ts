import {
  getHourlyDistribution,
  getTimeline,
  InvalidInputError,
  isTimelineInterval,
  TIMELINE_INTERVALS,
} from "@gatewise/engine";
import { readFormat } from "../args.js";
import { buildContext } from "../context.js";
import { formatTimelineTable } from "../formatter.js";
import { emit, toJson } from "../output.js";

export async function runTimeline(positional: string[], args: Record<string, string>): Promise<number> {
  const entityId = positional[0];
  if (!entityId) throw new InvalidInputError("timeline requires an API id");

  const format = readFormat(args);
  if (format === "markdown") throw new InvalidInputError("timeline supports --format table or json");

  const interval = args["interval"] ?? "1h";
  if (!isTimelineInterval(interval)) {
    throw new InvalidInputError(`--interval must be one of ${TIMELINE_INTERVALS.join(", ")}, got '${interval}'`);
  }

  const ctx = buildContext(args);
  const timeline = await getTimeline(ctx.logStore, entityId, ctx.range, interval);
  const hourly = await getHourlyDistribution(ctx.logStore, entityId, ctx.range);

  emit(
    format === "json" ? toJson({ timeline, ...hourly }) : formatTimelineTable(timeline, hourly),
    args["output"],
  );
  return 0;
}
