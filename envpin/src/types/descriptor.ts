import type { SourceLocator } from "./locator.js";

/** Input descriptor: which snapshots to pin and which packages to provide. */
export type EnvironmentDescriptor = {
  schema_version: string;
  name?: string;
  sources: SourceLocator[];
  packages: string[];
};
