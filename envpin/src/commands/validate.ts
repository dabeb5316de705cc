import fs from "node:fs";
import path from "node:path";
import { loadConfigTree } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import { loadDescriptor } from "../descriptor/loader.js";
import { errorMessage } from "../errors.js";
import { parseSpecifier } from "../resolver/specifier.js";
import { diag, type Diagnostic } from "./output.js";
import type { CommonOptions } from "./context.js";

export type ValidateResult = { ok: true; warnings: Diagnostic[] } | { ok: false; errors: Diagnostic[] };

/** Check the config layers and, when given, a descriptor, without fetching anything. */
export function validateInputs(opts: CommonOptions & { descriptorPath?: string }): ValidateResult {
  const diagnostics: Diagnostic[] = [];
  const cwd = opts.cwd ?? process.cwd();

  if (opts.configDir && !fs.existsSync(path.resolve(cwd, opts.configDir))) {
    return { ok: false, errors: [diag("error", "CONFIG_DIR_MISSING", `Config directory not found: ${opts.configDir}`)] };
  }

  try {
    const tree = loadConfigTree(opts.envName, opts.configDir && path.resolve(cwd, opts.configDir));
    const res = validateConfig(tree);
    if (!res.valid) {
      diagnostics.push(diag("error", "CONFIG_INVALID", res.errors, { path: opts.configDir }));
    }
  } catch (e) {
    diagnostics.push(diag("error", "CONFIG_UNREADABLE", errorMessage(e), { path: opts.configDir }));
  }

  if (opts.descriptorPath) {
    const descriptorPath = path.resolve(cwd, opts.descriptorPath);
    try {
      const descriptor = loadDescriptor(descriptorPath);
      const seen = new Set<string>();
      for (const raw of descriptor.packages) {
        const { name } = parseSpecifier(raw);
        if (seen.has(name)) {
          diagnostics.push(
            diag("warn", "DESCRIPTOR_DUPLICATE_PACKAGE", `Package requested more than once: ${name}`, { path: descriptorPath }),
          );
        }
        seen.add(name);
      }
    } catch (e) {
      diagnostics.push(diag("error", "DESCRIPTOR_INVALID", errorMessage(e), { path: descriptorPath }));
    }
  }

  return diagnostics.some((d) => d.level === "error")
    ? { ok: false, errors: diagnostics }
    : { ok: true, warnings: diagnostics };
}
