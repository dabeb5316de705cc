/** Identifies exactly one immutable package-collection snapshot. */
export type SourceLocator = {
  url: string;
  revision: string;
  /** Declared sha256 (hex) of the snapshot bytes. Verified after download. */
  sha256?: string;
};

/** Fetched snapshot bytes and where the cache keeps them. */
export type Snapshot = {
  locator: SourceLocator;
  contentHash: string;
  bytes: Uint8Array;
  path: string;
};

export function describeLocator(locator: SourceLocator): string {
  return `${locator.url}#${locator.revision}`;
}
