import { ConflictError, NotFoundError } from "../errors.js";
import type { PackageIndex } from "../index/package-index.js";
import type { PackageMetadata, ResolvedEnvironment } from "../types/package.js";
import { compareStrings } from "../util/order.js";
import { formatSpecifier, parseSpecifier, type Specifier } from "./specifier.js";

type Pending = { spec: Specifier; requiredBy?: string };

/**
 * Breadth-first dependency closure of `requested`.
 *
 * Two different versions of one name anywhere in the closure fail with
 * ConflictError; no version is ever picked over another. Output is sorted by name.
 */
export function resolve(index: PackageIndex, requested: Iterable<string>): ResolvedEnvironment {
  const closure = new Map<string, PackageMetadata>();
  const queue: Pending[] = [...new Set(requested)].sort(compareStrings).map((raw) => ({ spec: parseSpecifier(raw) }));

  for (let head = 0; head < queue.length; head++) {
    const { spec, requiredBy } = queue[head];
    const pkg = spec.version === undefined ? index.lookup(spec.name) : index.lookupVersion(spec.name, spec.version);
    if (!pkg) {
      throw new NotFoundError(formatSpecifier(spec), requiredBy);
    }

    const existing = closure.get(pkg.name);
    if (existing) {
      if (existing.version !== pkg.version) {
        throw new ConflictError(pkg.name, existing.version, pkg.version);
      }
      continue;
    }

    closure.set(pkg.name, pkg);
    const parent = `${pkg.name}@${pkg.version}`;
    for (const dep of pkg.dependencies) {
      queue.push({ spec: parseSpecifier(dep), requiredBy: parent });
    }
  }

  return { packages: [...closure.values()].sort((a, b) => compareStrings(a.name, b.name)) };
}

/** Every dependency of every entry is present and names are unique. */
export function isClosed(env: ResolvedEnvironment): boolean {
  const byName = new Map(env.packages.map((p) => [p.name, p]));
  if (byName.size !== env.packages.length) return false;
  return env.packages.every((p) =>
    p.dependencies.every((dep) => {
      const spec = parseSpecifier(dep);
      const found = byName.get(spec.name);
      return found !== undefined && (spec.version === undefined || found.version === spec.version);
    }),
  );
}
