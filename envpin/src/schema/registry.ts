import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

/** Schemas shipped with envpin; other names may be present in a custom directory. */
export type BundledSchema = "config" | "descriptor" | "snapshot";

export type SchemaEntry = {
  name: string;
  version: string;
  filePath: string;
  schema: unknown;
};

export type AjvValidateFn = ((data: unknown) => boolean) & { errors?: unknown };

type Validator = {
  compile: (schema: unknown) => AjvValidateFn;
  errorsText: (errors: unknown) => string;
};

export type SchemaValidation = { valid: boolean; errors: string | null };

export const DEFAULT_SCHEMA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../schemas");

const SCHEMA_SUFFIX = ".schema.json";

/**
 * Schema registry over a directory of `<name>.schema.json` files.
 *
 * Validators are compiled the first time a name is checked. The outcome of the
 * most recent check per name is kept so callers can report it after narrowing.
 */
export class SchemaRegistry {
  private readonly entries = new Map<string, SchemaEntry>();
  private readonly compiled = new Map<string, AjvValidateFn>();
  private readonly lastErrors = new Map<string, string>();
  private readonly ajv = createValidator();

  constructor(private readonly schemaDir: string) {}

  load(): void {
    if (!fs.existsSync(this.schemaDir)) {
      throw new Error(`Schema directory not found: ${this.schemaDir}`);
    }
    for (const file of fs.readdirSync(this.schemaDir)) {
      if (!file.endsWith(SCHEMA_SUFFIX)) continue;
      const filePath = path.join(this.schemaDir, file);
      const schema: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
      const name = file.slice(0, -SCHEMA_SUFFIX.length);
      this.entries.set(name, { name, version: versionOf(schema), filePath, schema });
    }
  }

  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  /** name → version taken from each schema's `$id`. */
  versions(): Record<string, string> {
    return Object.fromEntries(this.names().map((name) => [name, this.entries.get(name)?.version ?? "1.0.0"]));
  }

  getValidator(name: string): AjvValidateFn {
    let validate = this.compiled.get(name);
    if (!validate) {
      const entry = this.entries.get(name);
      if (!entry) throw new Error(`Schema not found: ${name}`);
      validate = this.ajv.compile(entry.schema);
      this.compiled.set(name, validate);
    }
    return validate;
  }

  /**
   * Narrow `data` to the document type the named schema describes.
   * On failure, `errorsFor(name)` holds the rendered ajv errors.
   */
  conforms<T>(name: BundledSchema, data: unknown): data is T {
    const validate = this.getValidator(name);
    if (validate(data)) {
      this.lastErrors.delete(name);
      return true;
    }
    this.lastErrors.set(name, this.ajv.errorsText(validate.errors));
    return false;
  }

  errorsFor(name: string): string {
    return this.lastErrors.get(name) ?? "no errors";
  }

  validate(name: string, data: unknown): SchemaValidation {
    const validate = this.getValidator(name);
    return validate(data) ? { valid: true, errors: null } : { valid: false, errors: this.ajv.errorsText(validate.errors) };
  }
}

/** 2020-12 dialect; every violation is reported, unknown keywords are rejected. */
function createValidator(): Validator {
  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): Validator };
  const add = addFormats as unknown as (ajv: Validator) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: true });
  add(ajv);
  return ajv;
}

function versionOf(schema: unknown): string {
  if (schema !== null && typeof schema === "object" && "$id" in schema && typeof schema.$id === "string") {
    const m = /@(\d+\.\d+\.\d+)/.exec(schema.$id);
    if (m) return m[1];
  }
  return "1.0.0";
}

export function createRegistry(schemaDir: string = DEFAULT_SCHEMA_DIR): SchemaRegistry {
  const registry = new SchemaRegistry(schemaDir);
  registry.load();
  return registry;
}

let shared: SchemaRegistry | null = null;

/** Lazily loaded registry over the bundled schemas. */
export function defaultRegistry(): SchemaRegistry {
  shared ??= createRegistry();
  return shared;
}
