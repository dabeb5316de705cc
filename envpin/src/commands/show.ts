import { readManifest } from "../manifest/manifest-reader.js";
import type { EnvironmentManifest } from "../types/manifest.js";

/** Read a manifest written by `resolve`. */
export async function showManifest(filePath: string): Promise<EnvironmentManifest> {
  return readManifest(filePath);
}

/** `name@version  path`, one line per entry. */
export function formatManifest(manifest: EnvironmentManifest): string[] {
  return manifest.entries.map((e) => `${e.name}@${e.version}  ${e.path}`);
}
