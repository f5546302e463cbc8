import { analyzeEntity, generateMarkdownReport, InvalidInputError } from "@gatewise/engine";
import { readFormat, readScore } from "../args.js";
import { buildContext } from "../context.js";
import { formatScoreTable } from "../formatter.js";
import { emit, toJson } from "../output.js";

/**
 * Score one API. Returns the process exit code: 1 when --fail-below is set
 * and the total score is under it.
 */
export async function runScore(positional: string[], args: Record<string, string>): Promise<number> {
  const entityId = positional[0];
  if (!entityId) throw new InvalidInputError("score requires an API id");

  const format = readFormat(args);
  const failBelow = readScore(args, "fail-below");
  const ctx = buildContext(args);

  const analysis = await analyzeEntity(ctx.deps, entityId, ctx.range);

  switch (format) {
    case "json":
      emit(toJson(analysis), args["output"]);
      break;
    case "markdown":
      emit(generateMarkdownReport(analysis), args["output"]);
      break;
    case "table":
      emit(formatScoreTable(analysis), args["output"]);
      break;
  }

  if (failBelow !== undefined && analysis.report.totalScore < failBelow) {
    process.stderr.write(
      `[gatewise] Score ${analysis.report.totalScore} is below --fail-below ${failBelow}\n`,
    );
    return 1;
  }
  return 0;
}
