import path from "node:path";
import { sha256Hex } from "../cache/checksum.js";
import { WriteError } from "../errors.js";
import { atomicWrite } from "../fs/atomic-write.js";
import type { EnvironmentManifest, ManifestEntry } from "../types/manifest.js";
import type { PackageMetadata, ResolvedEnvironment } from "../types/package.js";

/** `<storeRoot>/<contentHash>-<name>-<version>` */
export function storePathFor(storeRoot: string, pkg: PackageMetadata): string {
  return path.join(storeRoot, `${pkg.contentHash}-${pkg.name}-${pkg.version}`);
}

export function buildEntries(env: ResolvedEnvironment, storeRoot: string): ManifestEntry[] {
  return env.packages.map((pkg) => ({
    name: pkg.name,
    version: pkg.version,
    contentHash: pkg.contentHash,
    path: storePathFor(storeRoot, pkg),
  }));
}

/** One JSON object per line, in environment order. */
export function serializeManifest(entries: readonly ManifestEntry[]): string {
  return entries
    .map((e) => JSON.stringify({ name: e.name, version: e.version, contentHash: e.contentHash, path: e.path }) + "\n")
    .join("");
}

/**
 * Manifest Writer — commits a resolved environment for an external launcher.
 * The destination is replaced in one rename; on failure it is left as it was.
 */
export class ManifestWriter {
  constructor(private readonly storeRoot: string) {}

  async write(env: ResolvedEnvironment, destination: string): Promise<EnvironmentManifest> {
    const entries = buildEntries(env, this.storeRoot);
    const payload = serializeManifest(entries);

    try {
      await atomicWrite(destination, payload);
    } catch (err) {
      throw new WriteError(destination, err);
    }

    return { destination, entries, sha256: sha256Hex(payload) };
  }
}
