import { InvalidInputError, SensitiveFieldScanner } from "@gatewise/engine";
import { readFormat } from "../args.js";
import { buildContext } from "../context.js";
import { formatSensitiveTable } from "../formatter.js";
import { emit, toJson } from "../output.js";

export async function runSensitive(positional: string[], args: Record<string, string>): Promise<number> {
  const entityId = positional[0];
  if (!entityId) throw new InvalidInputError("sensitive requires an API id");

  const format = readFormat(args);
  if (format === "markdown") throw new InvalidInputError("sensitive supports --format table or json");

  const ctx = buildContext(args);
  const scanner = new SensitiveFieldScanner({ logStore: ctx.logStore, keywords: ctx.deps.keywords });
  const exposure = await scanner.scan(entityId, ctx.deps.sampleSize);

  emit(format === "json" ? toJson(exposure) : formatSensitiveTable(entityId, exposure), args["output"]);
  return exposure.error !== undefined ? 1 : 0;
}
