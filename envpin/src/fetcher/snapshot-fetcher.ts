import { ContentCache } from "../cache/content-cache.js";
import { sha256Hex } from "../cache/checksum.js";
import { mapBounded, withDeadline, type DeadlineOptions } from "../core/concurrency.js";
import { CancelledError, EnvpinError, FetchError, IntegrityError, errorMessage } from "../errors.js";
import type { Snapshot, SourceLocator } from "../types/locator.js";
import { httpTransport, type Transport } from "./transport.js";

export type FetchOptions = DeadlineOptions;

export type SnapshotFetcherOptions = {
  cache: ContentCache;
  transport?: Transport;
  /** Maximum downloads in flight for fetchAll. */
  concurrency?: number;
};

/** Substitute `{revision}` in the locator URL. */
export function expandUrl(locator: SourceLocator): string {
  return locator.url.split("{revision}").join(encodeURIComponent(locator.revision));
}

/**
 * Fetches snapshots through a content-addressed cache.
 *
 * A locator seen before is served from the cache without touching the transport.
 * No retries happen here; a failed fetch surfaces to the caller as-is.
 */
export class SnapshotFetcher {
  private readonly cache: ContentCache;
  private readonly transport: Transport;
  private readonly concurrency: number;

  constructor(opts: SnapshotFetcherOptions) {
    this.cache = opts.cache;
    this.transport = opts.transport ?? httpTransport;
    this.concurrency = opts.concurrency ?? 4;
  }

  async fetch(locator: SourceLocator, opts: FetchOptions = {}): Promise<Snapshot> {
    if (opts.signal?.aborted) throw new CancelledError("fetch");

    const cached = await this.cache.lookup(locator);
    if (cached) {
      this.verify(locator, cached.contentHash);
      return { locator, ...cached };
    }

    return withDeadline("fetch", (signal) => this.download(locator, signal), opts);
  }

  /** Fetch several locators, at most `concurrency` at a time. Output order matches input. */
  async fetchAll(locators: readonly SourceLocator[], opts: FetchOptions = {}): Promise<Snapshot[]> {
    return mapBounded(locators, this.concurrency, (locator) => this.fetch(locator, opts));
  }

  private async download(locator: SourceLocator, signal: AbortSignal): Promise<Snapshot> {
    const url = expandUrl(locator);

    let body: Uint8Array;
    try {
      const res = await this.transport(url, { signal });
      if (!res.ok) {
        throw new FetchError(locator, `HTTP ${res.status} ${res.statusText}`.trim());
      }
      body = res.body;
    } catch (err) {
      if (err instanceof EnvpinError) throw err;
      if (signal.aborted) throw new CancelledError("fetch");
      throw new FetchError(locator, errorMessage(err), err);
    }

    // Bytes that arrive after a timeout or cancellation are not promoted to the cache.
    if (signal.aborted) throw new CancelledError("fetch");

    this.verify(locator, sha256Hex(body));
    const stored = await this.cache.put(locator, body);
    return { locator, ...stored };
  }

  private verify(locator: SourceLocator, actual: string): void {
    if (locator.sha256 !== undefined && locator.sha256 !== actual) {
      throw new IntegrityError(locator, locator.sha256, actual);
    }
  }
}
