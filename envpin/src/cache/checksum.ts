import { createHash } from "node:crypto";
import { readFile } from "node:fs/promises";

/** Compute SHA256 hash of a string/buffer. */
export function sha256Hex(content: string | Uint8Array): string {
  return createHash("sha256").update(content).digest("hex");
}

/** Compute SHA256 hash of a file. */
export async function sha256File(filePath: string): Promise<string> {
  return sha256Hex(await readFile(filePath));
}
