import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import YAML from "yaml";
import { sha256Hex } from "../src/cache/checksum.js";
import type { Transport } from "../src/fetcher/transport.js";
import type { Snapshot, SourceLocator } from "../src/types/locator.js";

export type PackageSpec = {
  name: string;
  version: string;
  dependencies?: string[];
  default?: boolean;
};

/** Deterministic placeholder hash for a package. */
export function pkgHash(name: string, version: string): string {
  return sha256Hex(`${name}@${version}`);
}

export function snapshotYaml(packages: PackageSpec[], collection = "test-collection"): string {
  return YAML.stringify({
    schema_version: "1",
    collection,
    packages: packages.map((p) => ({
      name: p.name,
      version: p.version,
      hash: pkgHash(p.name, p.version),
      ...(p.dependencies ? { dependencies: p.dependencies } : {}),
      ...(p.default !== undefined ? { default: p.default } : {}),
    })),
  });
}

export const LOCATOR: SourceLocator = {
  url: "https://snapshots.test/collection/{revision}.yaml",
  revision: "release-21.11",
};

/** Snapshot built in memory, bypassing fetcher and cache. */
export function makeSnapshot(content: string, locator: SourceLocator = LOCATOR): Snapshot {
  const bytes = new TextEncoder().encode(content);
  return { locator, contentHash: sha256Hex(bytes), bytes, path: "/dev/null" };
}

export type Route = string | { status: number } | { hang: true };

/** In-process transport stand-in; records every URL requested. */
export function fakeTransport(routes: Record<string, Route>): { transport: Transport; calls: string[] } {
  const calls: string[] = [];
  const transport: Transport = async (url, { signal }) => {
    calls.push(url);
    const route = routes[url];
    if (route === undefined) throw new Error(`getaddrinfo ENOTFOUND ${url}`);
    if (typeof route === "string") {
      return { ok: true, status: 200, statusText: "OK", body: new TextEncoder().encode(route) };
    }
    if ("status" in route) {
      return { ok: false, status: route.status, statusText: "", body: new Uint8Array() };
    }
    return new Promise<never>((_, reject) => {
      signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
    });
  };
  return { transport, calls };
}

export function makeTmpDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `envpin-${prefix}-`));
}
