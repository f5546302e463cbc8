import {
  analyzeAll,
  complianceReport,
  executiveSummary,
  InvalidInputError,
  policyCoverage,
} from "@gatewise/engine";
import { readFormat } from "../args.js";
import { buildContext } from "../context.js";
import { formatComplianceTable, formatExecutiveTable } from "../formatter.js";
import { emit, toJson } from "../output.js";

export const REPORT_KINDS = ["executive", "compliance"] as const;

export async function runReport(positional: string[], args: Record<string, string>): Promise<number> {
  const kind = positional[0];
  if (kind !== "executive" && kind !== "compliance") {
    throw new InvalidInputError(`report requires one of ${REPORT_KINDS.join(", ")}`);
  }

  const format = readFormat(args);
  if (format === "markdown") throw new InvalidInputError("report supports --format table or json");

  const ctx = buildContext(args);
  const analyses = await analyzeAll(ctx.deps, ctx.range);

  if (kind === "executive") {
    const coverage = policyCoverage(analyses.map((a) => a.configuration));
    const summary = executiveSummary(analyses, coverage);
    emit(format === "json" ? toJson(summary) : formatExecutiveTable(summary), args["output"]);
  } else {
    const report = complianceReport(analyses);
    emit(format === "json" ? toJson(report) : formatComplianceTable(report), args["output"]);
  }
  return 0;
}
