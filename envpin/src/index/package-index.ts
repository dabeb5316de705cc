import { gunzipSync } from "node:zlib";
import YAML from "yaml";
import { ConflictError, ParseError, errorMessage } from "../errors.js";
import { defaultRegistry, type SchemaRegistry } from "../schema/registry.js";
import { describeLocator, type Snapshot } from "../types/locator.js";
import type { PackageMetadata, SnapshotDocument } from "../types/package.js";
import { compareStrings } from "../util/order.js";

type NameEntry = {
  defaultVersion: string;
  versions: ReadonlyMap<string, PackageMetadata>;
};

/**
 * Read-only view of a snapshot: package name → metadata.
 *
 * A name may carry several versions; exactly one of them is the default that a
 * bare-name lookup returns.
 */
export class PackageIndex {
  private constructor(private readonly byName: ReadonlyMap<string, NameEntry>) {}

  /** Parse snapshot bytes. Deterministic; throws ParseError on malformed content. */
  static parse(snapshot: Snapshot, registry: SchemaRegistry = defaultRegistry()): PackageIndex {
    const source = describeLocator(snapshot.locator);
    const doc = decodeDocument(snapshot.bytes, source, registry);

    const grouped = new Map<string, { versions: Map<string, PackageMetadata>; defaults: string[] }>();
    for (const rec of doc.packages) {
      let group = grouped.get(rec.name);
      if (!group) {
        group = { versions: new Map(), defaults: [] };
        grouped.set(rec.name, group);
      }
      if (group.versions.has(rec.version)) {
        throw new ParseError(`Duplicate package entry ${rec.name}@${rec.version}`, source);
      }
      group.versions.set(
        rec.version,
        Object.freeze({
          name: rec.name,
          version: rec.version,
          contentHash: rec.hash,
          dependencies: Object.freeze([...(rec.dependencies ?? [])]),
        }),
      );
      if (rec.default === true) group.defaults.push(rec.version);
    }

    const byName = new Map<string, NameEntry>();
    for (const [name, group] of grouped) {
      byName.set(name, { defaultVersion: pickDefault(name, group.versions, group.defaults, source), versions: group.versions });
    }
    return new PackageIndex(byName);
  }

  /**
   * Combine indexes in priority order. The first index to define a name's
   * default wins; the same name@version with different hashes is a conflict.
   */
  static merge(indexes: readonly PackageIndex[]): PackageIndex {
    const merged = new Map<string, { defaultVersion: string; versions: Map<string, PackageMetadata> }>();
    for (const index of indexes) {
      for (const [name, entry] of index.byName) {
        const target = merged.get(name);
        if (!target) {
          merged.set(name, { defaultVersion: entry.defaultVersion, versions: new Map(entry.versions) });
          continue;
        }
        for (const [version, pkg] of entry.versions) {
          const existing = target.versions.get(version);
          if (existing && existing.contentHash !== pkg.contentHash) {
            throw new ConflictError(
              name,
              version,
              version,
              `Conflicting definitions of ${name}@${version}: ${existing.contentHash} and ${pkg.contentHash}`,
            );
          }
          if (!existing) target.versions.set(version, pkg);
        }
      }
    }
    return new PackageIndex(merged);
  }

  get size(): number {
    return this.byName.size;
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  /** Default version of `name`, or undefined. */
  lookup(name: string): PackageMetadata | undefined {
    const entry = this.byName.get(name);
    return entry?.versions.get(entry.defaultVersion);
  }

  lookupVersion(name: string, version: string): PackageMetadata | undefined {
    return this.byName.get(name)?.versions.get(version);
  }

  names(): string[] {
    return [...this.byName.keys()].sort(compareStrings);
  }

  versions(name: string): string[] {
    const entry = this.byName.get(name);
    return entry ? [...entry.versions.keys()].sort(compareStrings) : [];
  }

  /** Every package version, sorted by name then version. */
  all(): PackageMetadata[] {
    return this.names().flatMap((name) =>
      this.versions(name).flatMap((version) => {
        const pkg = this.lookupVersion(name, version);
        return pkg ? [pkg] : [];
      }),
    );
  }
}

function isGzip(bytes: Uint8Array): boolean {
  return bytes.length >= 2 && bytes[0] === 0x1f && bytes[1] === 0x8b;
}

function decodeDocument(bytes: Uint8Array, source: string, registry: SchemaRegistry): SnapshotDocument {
  let raw = bytes;
  if (isGzip(bytes)) {
    try {
      raw = gunzipSync(bytes);
    } catch (err) {
      throw new ParseError(`Snapshot is not valid gzip: ${errorMessage(err)}`, source, err);
    }
  }

  let text: string;
  try {
    text = new TextDecoder("utf-8", { fatal: true }).decode(raw);
  } catch (err) {
    throw new ParseError("Snapshot is not valid UTF-8", source, err);
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(text);
  } catch (err) {
    throw new ParseError(`Malformed snapshot: ${errorMessage(err)}`, source, err);
  }

  if (!registry.conforms<SnapshotDocument>("snapshot", parsed)) {
    throw new ParseError(`Snapshot does not match schema: ${registry.errorsFor("snapshot")}`, source);
  }
  return parsed;
}

function pickDefault(
  name: string,
  versions: ReadonlyMap<string, PackageMetadata>,
  defaults: string[],
  source: string,
): string {
  if (defaults.length > 1) {
    throw new ParseError(`Package ${name} marks several versions as default: ${defaults.join(", ")}`, source);
  }
  if (defaults.length === 1) return defaults[0];
  if (versions.size === 1) return [...versions.keys()][0];
  throw new ParseError(`Package ${name} has ${versions.size} versions and none is marked default`, source);
}
