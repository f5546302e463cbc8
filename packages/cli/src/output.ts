import { writeFileSync } from "node:fs";
import { resolve } from "node:path";

/** Write a rendered report to `output` when given, else to stdout. */
export function emit(text: string, output?: string): void {
  if (output) {
    writeFileSync(resolve(output), text.endsWith("\n") ? text : `${text}\n`);
    process.stderr.write(`[gatewise] Report written to ${output}\n`);
    return;
  }
  process.stdout.write(text.endsWith("\n") ? text : `${text}\n`);
}

export function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}
