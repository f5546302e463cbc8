/**
 * Configuration-store interface and its file-backed and in-memory adapters.
 */

import { readdir, readFile } from "node:fs/promises";
import { extname, join } from "node:path";

import yaml from "js-yaml";

import { UpstreamUnavailableError } from "../errors.js";
import { logger } from "../logger.js";
import type { ConfigurationSnapshot } from "../schemas.js";
import { normalizeProxyDocument } from "./proxy-document.js";

export interface ConfigurationStore {
  readonly name: string;

  /** Snapshot for one API, or null when the store has none. */
  fetchConfiguration(entityId: string): Promise<ConfigurationSnapshot | null>;

  /** Every snapshot the store holds, in a stable order. */
  listConfigurations(): Promise<ConfigurationSnapshot[]>;
}

// ---------------------------------------------------------------------------
// In-memory
// ---------------------------------------------------------------------------

export class InMemoryConfigurationStore implements ConfigurationStore {
  readonly name = "memory";
  private byId = new Map<string, ConfigurationSnapshot>();

  constructor(snapshots: ConfigurationSnapshot[] = []) {
    for (const s of snapshots) this.byId.set(s.id, s);
  }

  async fetchConfiguration(entityId: string): Promise<ConfigurationSnapshot | null> {
    return this.byId.get(entityId) ?? null;
  }

  async listConfigurations(): Promise<ConfigurationSnapshot[]> {
    return [...this.byId.values()];
  }
}

// ---------------------------------------------------------------------------
// Directory of exported proxy documents
// ---------------------------------------------------------------------------

const DOCUMENT_EXTENSIONS = new Set([".json", ".yml", ".yaml"]);

/**
 * Reads gateway proxy documents from a directory. Each `.json`, `.yml` or
 * `.yaml` file holds one document or an array of them. Files are re-read on
 * every call.
 */
export class DirectoryConfigurationStore implements ConfigurationStore {
  readonly name = "directory";

  constructor(private readonly dir: string) {}

  async fetchConfiguration(entityId: string): Promise<ConfigurationSnapshot | null> {
    const all = await this.listConfigurations();
    return all.find((s) => s.id === entityId) ?? null;
  }

  async listConfigurations(): Promise<ConfigurationSnapshot[]> {
    let files: string[];
    try {
      files = (await readdir(this.dir)).filter((f) => DOCUMENT_EXTENSIONS.has(extname(f))).sort();
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new UpstreamUnavailableError("configuration store", detail);
    }

    const snapshots: ConfigurationSnapshot[] = [];
    for (const file of files) {
      const path = join(this.dir, file);
      let content: unknown;
      try {
        const raw = await readFile(path, "utf-8");
        content = extname(file) === ".json" ? JSON.parse(raw) : yaml.load(raw);
      } catch (err) {
        const detail = err instanceof Error ? err.message : String(err);
        logger.warn(`Skipping ${path}: ${detail}`);
        continue;
      }

      const docs: unknown[] = Array.isArray(content) ? content : [content];
      for (const doc of docs) {
        try {
          snapshots.push(normalizeProxyDocument(doc));
        } catch (err) {
          const detail = err instanceof Error ? err.message : String(err);
          logger.warn(`Skipping document in ${path}: ${detail}`);
        }
      }
    }
    return snapshots;
  }
}
