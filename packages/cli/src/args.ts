import { InvalidInputError } from "@gatewise/engine";

export const BOOLEAN_FLAGS = new Set(["help", "version", "verbose", "quiet"]);

export const KNOWN_FLAGS = new Set([
  ...BOOLEAN_FLAGS,
  "format", "output", "start", "end", "sample-size", "fixtures",
  "fail-below", "config", "api", "interval",
]);

export interface ParsedArgs {
  command: string;
  args: Record<string, string>;
  positional: string[];
}

/**
 * Split argv (without the node and script entries) into a command, flags
 * and positionals. Unknown flags warn; a value flag without a value throws.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const command = argv[0] || "";
  const args: Record<string, string> = {};
  const positional: string[] = [];

  for (let i = 1; i < argv.length; i++) {
    const arg = argv[i];
    if (arg.startsWith("--")) {
      const key = arg.slice(2);

      if (!KNOWN_FLAGS.has(key)) {
        process.stderr.write(`[gatewise] Warning: unknown flag --${key}\n`);
      }

      if (BOOLEAN_FLAGS.has(key)) {
        args[key] = "true";
      } else {
        if (i + 1 >= argv.length || argv[i + 1].startsWith("--")) {
          throw new InvalidInputError(`--${key} requires a value`);
        }
        args[key] = argv[++i];
      }
    } else if (arg.startsWith("-") && arg.length > 1) {
      const key = arg.slice(1);
      if (key === "h") args["help"] = "true";
      else if (key === "v") args["version"] = "true";
      else args[key] = argv[++i] || "";
    } else {
      positional.push(arg);
    }
  }

  // Handle --verbose / --quiet
  if (args["verbose"] === "true") {
    process.env.GATEWISE_LOG_LEVEL = "debug";
  } else if (args["quiet"] === "true") {
    process.env.GATEWISE_LOG_LEVEL = "error";
  }

  return { command, args, positional };
}

// ---------------------------------------------------------------------------
// Typed flag readers
// ---------------------------------------------------------------------------

export const OUTPUT_FORMATS = ["table", "json", "markdown"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

function isOutputFormat(v: string): v is OutputFormat {
  return (OUTPUT_FORMATS as readonly string[]).includes(v);
}

export function readFormat(args: Record<string, string>): OutputFormat {
  const raw = args["format"] ?? "table";
  if (!isOutputFormat(raw)) {
    throw new InvalidInputError(`--format must be one of ${OUTPUT_FORMATS.join(", ")}, got '${raw}'`);
  }
  return raw;
}

export function readPositiveInt(args: Record<string, string>, key: string): number | undefined {
  const raw = args[key];
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidInputError(`--${key} must be a positive integer, got '${raw}'`);
  }
  return n;
}

export function readScore(args: Record<string, string>, key: string): number | undefined {
  const raw = args[key];
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(n) || n < 0 || n > 100) {
    throw new InvalidInputError(`--${key} must be a number between 0 and 100, got '${raw}'`);
  }
  return n;
}
