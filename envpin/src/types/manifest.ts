/** One line of an environment manifest. */
export type ManifestEntry = {
  name: string;
  version: string;
  contentHash: string;
  path: string;
};

/** A manifest that has been committed to disk. */
export type EnvironmentManifest = {
  destination: string;
  entries: ManifestEntry[];
  /** sha256 of the written bytes. */
  sha256: string;
};
