import fs from "node:fs";
import YAML from "yaml";
import { ParseError, errorMessage } from "../errors.js";
import { defaultRegistry, type SchemaRegistry } from "../schema/registry.js";
import type { EnvironmentDescriptor } from "../types/descriptor.js";

/** Parse and validate descriptor YAML. */
export function parseDescriptor(
  text: string,
  source?: string,
  registry: SchemaRegistry = defaultRegistry(),
): EnvironmentDescriptor {
  let parsed: unknown;
  try {
    parsed = YAML.parse(text);
  } catch (err) {
    throw new ParseError(`Malformed descriptor: ${errorMessage(err)}`, source, err);
  }

  if (!registry.conforms<EnvironmentDescriptor>("descriptor", parsed)) {
    throw new ParseError(`Invalid descriptor: ${registry.errorsFor("descriptor")}`, source);
  }
  return parsed;
}

export function loadDescriptor(filePath: string, registry?: SchemaRegistry): EnvironmentDescriptor {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf8");
  } catch (err) {
    throw new ParseError(`Cannot read descriptor: ${errorMessage(err)}`, filePath, err);
  }
  return parseDescriptor(text, filePath, registry);
}
