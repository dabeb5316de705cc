#!/usr/bin/env node

import { Command } from "commander";
import { resolveEnvironment } from "./commands/resolve.js";
import { fetchSnapshot } from "./commands/fetch.js";
import { formatManifest, showManifest } from "./commands/show.js";
import { clearCache, listCache } from "./commands/cache.js";
import { validateInputs } from "./commands/validate.js";
import { EXIT, exitCodeFor } from "./commands/exit-codes.js";
import { Reporter, type OutputFormat } from "./commands/output.js";
import { errorCodeOf, errorMessage } from "./errors.js";

type GlobalOpts = { config?: string; env?: string; format: OutputFormat };

function parseFormat(value: string): OutputFormat {
  if (value !== "human" && value !== "jsonl") {
    throw new Error(`Unknown format: ${value} (expected human|jsonl)`);
  }
  return value;
}

const program = new Command();

program
  .name("envpin")
  .description("Resolve pinned package-collection snapshots into environment manifests")
  .version("0.1.0")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config overlay to apply (config/<name>.yaml)")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human");

function globals(): GlobalOpts {
  return program.opts<GlobalOpts>();
}

program
  .command("resolve")
  .description("Fetch, index and resolve a descriptor, then write its manifest")
  .requiredOption("--descriptor <path>", "Environment descriptor (YAML)")
  .requiredOption("--out <path>", "Manifest destination")
  .action(async (opts: { descriptor: string; out: string }) => {
    const g = globals();
    const reporter = new Reporter(g.format);
    const controller = new AbortController();
    const onSigint = () => controller.abort();
    process.once("SIGINT", onSigint);

    const res = await resolveEnvironment({
      descriptorPath: opts.descriptor,
      out: opts.out,
      configDir: g.config,
      envName: g.env,
      reporter,
      signal: controller.signal,
    }).finally(() => process.off("SIGINT", onSigint));

    if (!res.ok) {
      reporter.error(errorCodeOf(res.error), `${res.stage}: ${res.error.message}`, { details: { stage: res.stage } });
      process.exit(res.exitCode);
    }

    reporter.record(
      { level: "info", code: "OK", destination: res.manifest.destination, packages: res.manifest.entries.length, sha256: res.manifest.sha256 },
      `Wrote ${res.manifest.entries.length} package(s) to ${res.manifest.destination}`,
    );
  });

program
  .command("fetch")
  .description("Fetch a snapshot into the cache")
  .argument("<url>", "Snapshot URL; {revision} is substituted")
  .requiredOption("--revision <rev>", "Pinned revision")
  .option("--sha256 <hex>", "Expected sha256 of the snapshot bytes")
  .action(async (url: string, opts: { revision: string; sha256?: string }) => {
    const g = globals();
    const reporter = new Reporter(g.format);
    const summary = await fetchSnapshot(
      { url, revision: opts.revision, sha256: opts.sha256 },
      { configDir: g.config, envName: g.env },
    );
    reporter.record({ level: "info", code: "FETCHED", ...summary }, `${summary.contentHash}  ${summary.path}`);
  });

program
  .command("show")
  .description("Print the entries of a manifest")
  .argument("<manifest>", "Manifest path")
  .action(async (manifestPath: string) => {
    const reporter = new Reporter(globals().format);
    const manifest = await showManifest(manifestPath);
    if (reporter.format === "jsonl") {
      for (const e of manifest.entries) reporter.record(e, "");
    } else {
      for (const line of formatManifest(manifest)) reporter.record({}, line);
    }
  });

const cache = program.command("cache").description("Inspect or clear the snapshot cache");

cache
  .command("list")
  .description("List cached snapshots")
  .action(async () => {
    const g = globals();
    const reporter = new Reporter(g.format);
    const refs = await listCache({ configDir: g.config, envName: g.env });
    if (refs.length === 0 && reporter.format === "human") {
      reporter.info("CACHE_EMPTY", "Cache is empty.");
      return;
    }
    for (const ref of refs) reporter.record(ref, `${ref.content_hash.slice(0, 12)}  ${ref.url}#${ref.revision}`);
  });

cache
  .command("clear")
  .description("Remove every cached snapshot")
  .action(async () => {
    const g = globals();
    const removed = await clearCache({ configDir: g.config, envName: g.env });
    new Reporter(g.format).info("CACHE_CLEARED", `Removed ${removed} cached snapshot(s).`, { details: { removed } });
  });

program
  .command("validate")
  .description("Validate config and (optionally) a descriptor")
  .option("--descriptor <path>", "Environment descriptor (YAML)")
  .action((opts: { descriptor?: string }) => {
    const g = globals();
    const reporter = new Reporter(g.format);
    const res = validateInputs({ configDir: g.config, envName: g.env, descriptorPath: opts.descriptor });
    if (!res.ok) {
      for (const d of res.errors) reporter.emit(d);
      process.exit(EXIT.INVALID_INPUT);
    }
    for (const d of res.warnings) reporter.emit(d);
    reporter.info("OK", "OK");
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const format = program.opts<Partial<GlobalOpts>>().format ?? "human";
  const reporter = new Reporter(format);
  reporter.error(errorCodeOf(err), errorMessage(err));
  process.exit(exitCodeFor(err));
});
