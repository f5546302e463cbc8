/**
 * Error types shared by the engine and its collaborator adapters.
 */

/**
 * A log store or configuration store could not be reached, or answered with
 * a non-success status.
 */
export class UpstreamUnavailableError extends Error {
  readonly name = "UpstreamUnavailableError";
  readonly source: string;
  readonly status: number | undefined;

  constructor(source: string, detail: string, status?: number) {
    const code = status !== undefined ? ` (HTTP ${status})` : "";
    super(`${source} unavailable${code}: ${detail}`);
    this.source = source;
    this.status = status;
    Object.setPrototypeOf(this, UpstreamUnavailableError.prototype);
  }
}

/**
 * The configuration store holds no snapshot for the requested API.
 */
export class ConfigurationNotFoundError extends Error {
  readonly name = "ConfigurationNotFoundError";
  readonly entityId: string;

  constructor(entityId: string) {
    super(`No configuration found for API '${entityId}'`);
    this.entityId = entityId;
    Object.setPrototypeOf(this, ConfigurationNotFoundError.prototype);
  }
}

/**
 * Caller-supplied input is unusable (reversed date range, bad sample size, ...).
 */
export class InvalidInputError extends Error {
  readonly name = "InvalidInputError";

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, InvalidInputError.prototype);
  }
}
