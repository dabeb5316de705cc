import fs from "node:fs/promises";
import path from "node:path";
import { atomicWrite } from "../fs/atomic-write.js";
import { sha256Hex } from "./checksum.js";
import { IntegrityError, ParseError, errorMessage } from "../errors.js";
import { compareStrings } from "../util/order.js";
import type { SourceLocator } from "../types/locator.js";

/** Reference record stored at refs/<locatorKey>.json */
export type CacheRef = {
  url: string;
  revision: string;
  content_hash: string;
  fetched_at: string;
};

export type CachedBlob = {
  contentHash: string;
  path: string;
  bytes: Uint8Array;
};

/** sha256 of `url#revision`; names the ref file for a locator. */
export function locatorKey(locator: SourceLocator): string {
  return sha256Hex(`${locator.url}#${locator.revision}`);
}

function isCacheRef(value: unknown): value is CacheRef {
  return (
    value !== null &&
    typeof value === "object" &&
    "url" in value &&
    typeof value.url === "string" &&
    "revision" in value &&
    typeof value.revision === "string" &&
    "content_hash" in value &&
    typeof value.content_hash === "string" &&
    "fetched_at" in value &&
    typeof value.fetched_at === "string"
  );
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Content-addressed snapshot cache.
 *
 * Layout:
 *   <root>/blobs/<sha256>          snapshot bytes
 *   <root>/refs/<locatorKey>.json  locator → content hash
 *
 * Append-only. Every write goes through a temp file and a rename, so concurrent
 * writers of the same content race harmlessly and a reader never sees a partial blob.
 */
export class ContentCache {
  constructor(readonly root: string) {}

  blobPath(contentHash: string): string {
    return path.join(this.root, "blobs", contentHash);
  }

  refPath(locator: SourceLocator): string {
    return path.join(this.root, "refs", `${locatorKey(locator)}.json`);
  }

  /**
   * Cached bytes for a locator, or null on a miss.
   * A blob whose bytes no longer hash to its name raises IntegrityError.
   */
  async lookup(locator: SourceLocator): Promise<CachedBlob | null> {
    const ref = await this.readRef(this.refPath(locator));
    if (!ref) return null;

    const blobPath = this.blobPath(ref.content_hash);
    let bytes: Uint8Array;
    try {
      bytes = await fs.readFile(blobPath);
    } catch (err) {
      if (isMissing(err)) return null;
      throw err;
    }

    const actual = sha256Hex(bytes);
    if (actual !== ref.content_hash) {
      throw new IntegrityError(locator, ref.content_hash, actual);
    }
    return { contentHash: actual, path: blobPath, bytes };
  }

  /** Store bytes under their hash and point the locator's ref at them. */
  async put(locator: SourceLocator, bytes: Uint8Array): Promise<CachedBlob> {
    const contentHash = sha256Hex(bytes);
    const blobPath = this.blobPath(contentHash);

    if (!(await exists(blobPath))) {
      await atomicWrite(blobPath, bytes);
    }

    const ref: CacheRef = {
      url: locator.url,
      revision: locator.revision,
      content_hash: contentHash,
      fetched_at: new Date().toISOString(),
    };
    await atomicWrite(this.refPath(locator), JSON.stringify(ref, null, 2) + "\n");

    return { contentHash, path: blobPath, bytes };
  }

  /** All refs, sorted by url then revision. Unreadable ref files are skipped. */
  async list(): Promise<CacheRef[]> {
    const refsDir = path.join(this.root, "refs");
    let names: string[];
    try {
      names = await fs.readdir(refsDir);
    } catch (err) {
      if (isMissing(err)) return [];
      throw err;
    }

    const refs: CacheRef[] = [];
    for (const name of names.filter((n) => n.endsWith(".json")).sort()) {
      const ref = await this.readRef(path.join(refsDir, name)).catch(() => null);
      if (ref) refs.push(ref);
    }
    return refs.sort((a, b) => compareStrings(a.url, b.url) || compareStrings(a.revision, b.revision));
  }

  /** Remove every blob and ref. Returns the number of refs removed. */
  async clear(): Promise<number> {
    const count = (await this.list()).length;
    await fs.rm(this.root, { recursive: true, force: true });
    return count;
  }

  private async readRef(refPath: string): Promise<CacheRef | null> {
    let raw: string;
    try {
      raw = await fs.readFile(refPath, "utf8");
    } catch (err) {
      if (isMissing(err)) return null;
      throw err;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new ParseError(`Corrupt cache ref: ${errorMessage(err)}`, refPath, err);
    }
    if (!isCacheRef(parsed)) {
      throw new ParseError("Malformed cache ref: expected url, revision, content_hash and fetched_at", refPath);
    }
    return parsed;
  }
}

async function exists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}
