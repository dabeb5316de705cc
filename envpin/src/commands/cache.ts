import type { CacheRef } from "../cache/content-cache.js";
import { createContext, type CommonOptions } from "./context.js";

export async function listCache(opts: CommonOptions = {}): Promise<CacheRef[]> {
  return createContext(opts).cache.list();
}

/** Drop every cached snapshot. Returns the number of refs removed. */
export async function clearCache(opts: CommonOptions = {}): Promise<number> {
  return createContext(opts).cache.clear();
}
