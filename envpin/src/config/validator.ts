import { ParseError, errorMessage } from "../errors.js";
import { defaultRegistry, type SchemaRegistry } from "../schema/registry.js";
import type { EnvpinConfig } from "../types/config.js";
import { loadConfigTree } from "./loader.js";

export type ConfigValidationResult =
  | { valid: true; config: EnvpinConfig; errors: null }
  | { valid: false; errors: string };

/** Validate a loaded config tree against config.schema.json. */
export function validateConfig(
  tree: Record<string, unknown>,
  registry: SchemaRegistry = defaultRegistry(),
): ConfigValidationResult {
  if (registry.conforms<EnvpinConfig>("config", tree)) {
    return { valid: true, config: tree, errors: null };
  }
  return { valid: false, errors: registry.errorsFor("config") };
}

/** Load and validate in one step; throws ParseError when the config is unreadable or invalid. */
export function loadConfig(envName?: string, configDir?: string): EnvpinConfig {
  let tree: Record<string, unknown>;
  try {
    tree = loadConfigTree(envName, configDir);
  } catch (err) {
    throw new ParseError(`Cannot load config: ${errorMessage(err)}`, configDir, err);
  }

  const res = validateConfig(tree);
  if (!res.valid) {
    throw new ParseError(`Invalid config: ${res.errors}`, configDir);
  }
  return res.config;
}
