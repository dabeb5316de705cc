/** One package version as recorded in a snapshot. */
export type PackageMetadata = {
  readonly name: string;
  readonly version: string;
  readonly contentHash: string;
  /** Specifiers: `name` or `name@version`. */
  readonly dependencies: readonly string[];
};

/** Dependency-closed, conflict-free set of packages, sorted by name. */
export type ResolvedEnvironment = {
  readonly packages: readonly PackageMetadata[];
};

/** Raw package record in the snapshot document (snapshot.schema.json). */
export type SnapshotPackageRecord = {
  name: string;
  version: string;
  hash: string;
  dependencies?: string[];
  default?: boolean;
};

export type SnapshotDocument = {
  schema_version: string;
  collection?: string;
  packages: SnapshotPackageRecord[];
};
