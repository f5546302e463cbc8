import { InvalidInputError } from "../errors.js";
import type { DateRange } from "../types.js";

const DAY_MS = 86_400_000;

export interface ResolveDateRangeOptions {
  /** ISO-8601 start; defaults to `end` minus `defaultDays`. */
  start?: string;
  /** ISO-8601 end; defaults to `now`. */
  end?: string;
  defaultDays: number;
  maxDays: number;
  now?: Date;
}

function parseDate(label: string, value: string): Date {
  const d = new Date(value);
  if (Number.isNaN(d.getTime())) {
    throw new InvalidInputError(`Invalid ${label} date '${value}'`);
  }
  return d;
}

/**
 * Resolve CLI/query date inputs into an explicit range.
 *
 * A reversed range or one longer than `maxDays` is rejected, never swapped
 * or clipped.
 */
export function resolveDateRange(opts: ResolveDateRangeOptions): DateRange {
  const end = opts.end ? parseDate("end", opts.end) : (opts.now ?? new Date());
  const start = opts.start
    ? parseDate("start", opts.start)
    : new Date(end.getTime() - opts.defaultDays * DAY_MS);

  if (end.getTime() < start.getTime()) {
    throw new InvalidInputError(
      `End date ${end.toISOString()} is before start date ${start.toISOString()}`,
    );
  }

  const days = (end.getTime() - start.getTime()) / DAY_MS;
  if (days > opts.maxDays) {
    throw new InvalidInputError(
      `Date range of ${Math.ceil(days)} days exceeds the maximum of ${opts.maxDays}`,
    );
  }

  return { start, end };
}
