import fs from "node:fs/promises";
import { sha256Hex } from "../cache/checksum.js";
import { ParseError, errorMessage } from "../errors.js";
import type { EnvironmentManifest, ManifestEntry } from "../types/manifest.js";

function isManifestEntry(value: unknown): value is ManifestEntry {
  return (
    value !== null &&
    typeof value === "object" &&
    "name" in value &&
    typeof value.name === "string" &&
    "version" in value &&
    typeof value.version === "string" &&
    "contentHash" in value &&
    typeof value.contentHash === "string" &&
    "path" in value &&
    typeof value.path === "string"
  );
}

/** Parse JSONL manifest text. Blank lines are ignored. */
export function parseManifest(text: string, source?: string): ManifestEntry[] {
  const entries: ManifestEntry[] = [];
  const lines = text.split("\n");

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (line.length === 0) continue;

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (err) {
      throw new ParseError(`Manifest line ${i + 1} is not JSON: ${errorMessage(err)}`, source, err);
    }
    if (!isManifestEntry(parsed)) {
      throw new ParseError(`Manifest line ${i + 1} lacks name, version, contentHash or path`, source);
    }
    entries.push({ name: parsed.name, version: parsed.version, contentHash: parsed.contentHash, path: parsed.path });
  }
  return entries;
}

export async function readManifest(filePath: string): Promise<EnvironmentManifest> {
  const text = await fs.readFile(filePath, "utf8");
  return { destination: filePath, entries: parseManifest(text, filePath), sha256: sha256Hex(text) };
}
