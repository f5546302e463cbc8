import { getTrafficStats, InvalidInputError } from "@gatewise/engine";
import { readFormat } from "../args.js";
import { buildContext } from "../context.js";
import { formatStatsTable } from "../formatter.js";
import { emit, toJson } from "../output.js";

export async function runStats(args: Record<string, string>): Promise<number> {
  const format = readFormat(args);
  if (format === "markdown") throw new InvalidInputError("stats supports --format table or json");

  const ctx = buildContext(args);
  const stats = await getTrafficStats(ctx.logStore, ctx.range, args["api"]);

  emit(format === "json" ? toJson(stats) : formatStatsTable(stats), args["output"]);
  return 0;
}
