import { ParseError } from "../errors.js";

/** `name` or `name@version`. */
export type Specifier = {
  name: string;
  version?: string;
};

export function parseSpecifier(raw: string): Specifier {
  const at = raw.indexOf("@", 1);
  if (at === -1) {
    if (raw.length === 0) throw new ParseError("Empty package specifier");
    return { name: raw };
  }
  const name = raw.slice(0, at);
  const version = raw.slice(at + 1);
  if (version.length === 0 || version.includes("@")) {
    throw new ParseError(`Invalid package specifier: "${raw}"`);
  }
  return { name, version };
}

export function formatSpecifier(spec: Specifier): string {
  return spec.version === undefined ? spec.name : `${spec.name}@${spec.version}`;
}
