import path from "node:path";
import { ContentCache } from "../cache/content-cache.js";
import { loadConfig } from "../config/validator.js";
import { SnapshotFetcher } from "../fetcher/snapshot-fetcher.js";
import type { Transport } from "../fetcher/transport.js";
import type { EnvpinConfig } from "../types/config.js";

export type CommonOptions = {
  configDir?: string;
  envName?: string;
  cwd?: string;
};

export type CommandContext = {
  config: EnvpinConfig;
  cache: ContentCache;
  fetcher: SnapshotFetcher;
};

/** Load config and wire the cache and fetcher it describes. */
export function createContext(opts: CommonOptions & { transport?: Transport }): CommandContext {
  const cwd = opts.cwd ?? process.cwd();
  const config = loadConfig(opts.envName, opts.configDir && path.resolve(cwd, opts.configDir));
  const cache = new ContentCache(path.resolve(cwd, config.cache_dir));
  const fetcher = new SnapshotFetcher({ cache, transport: opts.transport, concurrency: config.concurrency });
  return { config, cache, fetcher };
}
