import path from "node:path";
import { loadDescriptor } from "../descriptor/loader.js";
import type { Transport } from "../fetcher/transport.js";
import { ManifestWriter } from "../manifest/manifest-writer.js";
import { Pipeline, type PipelineState } from "../core/pipeline.js";
import type { Stage } from "../core/state-machine.js";
import type { EnvironmentDescriptor } from "../types/descriptor.js";
import type { EnvironmentManifest } from "../types/manifest.js";
import { createContext, type CommonOptions } from "./context.js";
import { exitCodeFor, type ExitCode } from "./exit-codes.js";
import { Reporter } from "./output.js";

export type ResolveResult =
  | { ok: true; manifest: EnvironmentManifest; state: PipelineState }
  | { ok: false; exitCode: ExitCode; stage: Stage | "setup"; error: Error; state?: PipelineState };

/**
 * Resolve a descriptor into a manifest at `out`.
 * Progress goes to the reporter; the caller prints the outcome.
 */
export async function resolveEnvironment(
  opts: CommonOptions & {
    descriptorPath: string;
    out: string;
    reporter?: Reporter;
    transport?: Transport;
    signal?: AbortSignal;
  },
): Promise<ResolveResult> {
  const cwd = opts.cwd ?? process.cwd();
  const reporter = opts.reporter ?? new Reporter("human");

  let pipeline: Pipeline;
  let descriptor: EnvironmentDescriptor;
  try {
    descriptor = loadDescriptor(path.resolve(cwd, opts.descriptorPath));
    const ctx = createContext(opts);
    pipeline = new Pipeline({
      fetcher: ctx.fetcher,
      writer: new ManifestWriter(ctx.config.store_root),
      timeouts: ctx.config.timeouts,
      onTransition: (from, to) => {
        if (reporter.format === "jsonl") reporter.info("STATE", `${from} -> ${to}`, { details: { from, to } });
      },
    });
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    return { ok: false, exitCode: exitCodeFor(err), stage: "setup", error };
  }

  const res = await pipeline.run({
    sources: descriptor.sources,
    packages: descriptor.packages,
    destination: path.resolve(cwd, opts.out),
    signal: opts.signal,
  });

  if (!res.ok) {
    return { ok: false, exitCode: exitCodeFor(res.error), stage: res.stage, error: res.error, state: res.state };
  }
  return { ok: true, manifest: res.manifest, state: res.state };
}
