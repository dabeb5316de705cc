import type { Transport } from "../fetcher/transport.js";
import type { SourceLocator } from "../types/locator.js";
import { createContext, type CommonOptions } from "./context.js";

export type FetchSummary = {
  url: string;
  revision: string;
  contentHash: string;
  path: string;
  bytes: number;
};

/** Fetch one snapshot into the cache, or confirm it is already there. */
export async function fetchSnapshot(
  locator: SourceLocator,
  opts: CommonOptions & { transport?: Transport; signal?: AbortSignal } = {},
): Promise<FetchSummary> {
  const ctx = createContext(opts);
  const snapshot = await ctx.fetcher.fetch(locator, {
    timeoutMs: ctx.config.timeouts?.fetch_ms,
    signal: opts.signal,
  });
  return {
    url: locator.url,
    revision: locator.revision,
    contentHash: snapshot.contentHash,
    path: snapshot.path,
    bytes: snapshot.bytes.byteLength,
  };
}
