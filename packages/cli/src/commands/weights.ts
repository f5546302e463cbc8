import { InvalidInputError, resolveConfig } from "@gatewise/engine";
import { resolve } from "node:path";
import { readFormat } from "../args.js";
import { formatWeightsTable } from "../formatter.js";
import { emit, toJson } from "../output.js";

/** Print the effective scoring weights after config merging. */
export function runWeights(args: Record<string, string>): number {
  const format = readFormat(args);
  if (format === "markdown") throw new InvalidInputError("weights supports --format table or json");

  const config = resolveConfig(resolve(args["config"] ?? "."));
  emit(format === "json" ? toJson(config.weights) : formatWeightsTable(config.weights), args["output"]);
  return 0;
}
