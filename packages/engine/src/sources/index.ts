/**
 * Log-store factory.
 *
 * Creates the appropriate LogStore from configuration.
 */

import { InvalidInputError } from "../errors.js";
import type { LogStore } from "./log-store.js";
import { ElasticsearchLogStore, type ElasticsearchOptions } from "./elasticsearch.js";
import { InMemoryLogStore } from "./memory-log-store.js";

export type CreateLogStoreOptions =
  | ({ kind: "elasticsearch" } & ElasticsearchOptions)
  | { kind: "fixtures"; path: string }
  | { kind: "memory" };

/**
 * Create a LogStore from a config object.
 *
 * ```ts
 * const store = createLogStore({ kind: "elasticsearch", url: "http://localhost:9200" });
 * ```
 */
export function createLogStore(options: CreateLogStoreOptions): LogStore {
  switch (options.kind) {
    case "elasticsearch": {
      return new ElasticsearchLogStore(options);
    }
    case "fixtures": {
      if (!options.path) throw new InvalidInputError("path is required for the fixtures log store");
      return InMemoryLogStore.fromFile(options.path);
    }
    case "memory": {
      return new InMemoryLogStore();
    }
  }
}

export type { LogStore, LogFieldMap } from "./log-store.js";
export { DEFAULT_FIELDS } from "./log-store.js";
export { ElasticsearchLogStore } from "./elasticsearch.js";
export { InMemoryLogStore } from "./memory-log-store.js";
