/**
 * Minimal structured logger for @gatewise/engine.
 *
 * Respects GATEWISE_LOG_LEVEL env var (debug | info | warn | error | silent).
 * Writes to stderr so stdout stays clean for CLI/CI output.
 */

const LEVELS = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 } as const;
type Level = keyof typeof LEVELS;

function isLevel(raw: string): raw is Level {
  return Object.prototype.hasOwnProperty.call(LEVELS, raw);
}

function parseLevel(raw: string | undefined): number {
  if (!raw) return LEVELS.info;
  const key = raw.toLowerCase();
  return isLevel(key) ? LEVELS[key] : LEVELS.info;
}

// Read on every call: the CLI flips the env var after modules are loaded.
function currentLevel(): number {
  return parseLevel(process.env.GATEWISE_LOG_LEVEL);
}

function write(at: number, msg: string): void {
  if (currentLevel() <= at) process.stderr.write(`[gatewise] ${msg}\n`);
}

export const logger = {
  debug(msg: string) { write(LEVELS.debug, msg); },
  info(msg: string)  { write(LEVELS.info, msg); },
  warn(msg: string)  { write(LEVELS.warn, msg); },
  error(msg: string) { write(LEVELS.error, msg); },
};
