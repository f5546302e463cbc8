import { DirectoryConfigurationStore, InvalidInputError, policyCoverage, resolveConfig } from "@gatewise/engine";
import { resolve } from "node:path";
import { readFormat } from "../args.js";
import { formatOverviewTable } from "../formatter.js";
import { emit, toJson } from "../output.js";

/** Fleet policy coverage; reads only the configuration store. */
export async function runOverview(args: Record<string, string>): Promise<number> {
  const format = readFormat(args);
  if (format === "markdown") throw new InvalidInputError("overview supports --format table or json");

  const config = resolveConfig(resolve(args["config"] ?? "."));
  const store = new DirectoryConfigurationStore(config.config_dir);
  const coverage = policyCoverage(await store.listConfigurations());

  emit(format === "json" ? toJson(coverage) : formatOverviewTable(coverage), args["output"]);
  return 0;
}
