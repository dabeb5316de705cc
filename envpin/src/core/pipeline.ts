import { setImmediate as yieldToLoop } from "node:timers/promises";
import { CancelledError, TimeoutError, errorCodeOf } from "../errors.js";
import type { SnapshotFetcher } from "../fetcher/snapshot-fetcher.js";
import { PackageIndex } from "../index/package-index.js";
import type { ManifestWriter } from "../manifest/manifest-writer.js";
import { resolve } from "../resolver/environment-resolver.js";
import { defaultRegistry, type SchemaRegistry } from "../schema/registry.js";
import type { TimeoutsConfig } from "../types/config.js";
import type { Snapshot, SourceLocator } from "../types/locator.js";
import type { EnvironmentManifest } from "../types/manifest.js";
import type { ResolvedEnvironment } from "../types/package.js";
import { withDeadline } from "./concurrency.js";
import { isStage, nextState, type PipelineStatus, type Stage } from "./state-machine.js";

export type PipelineRequest = {
  sources: SourceLocator[];
  packages: string[];
  destination: string;
  signal?: AbortSignal;
};

export type PipelineDeps = {
  fetcher: SnapshotFetcher;
  writer: ManifestWriter;
  registry?: SchemaRegistry;
  timeouts?: TimeoutsConfig;
  /** Millisecond clock for stage durations and the parse deadline. Defaults to Date.now. */
  now?: () => number;
  /** Called after every state change. */
  onTransition?: (from: PipelineStatus, to: PipelineStatus, state: PipelineState) => void;
};

export type StageRecord = { status: "ok" | "failed"; duration_ms: number; error?: string };

export type PipelineState = {
  status: PipelineStatus;
  started_at: string;
  updated_at: string;
  stages: Partial<Record<Stage, StageRecord>>;
  error: { code: string; message: string } | null;
};

export type PipelineResult =
  | { ok: true; state: PipelineState; environment: ResolvedEnvironment; manifest: EnvironmentManifest }
  | { ok: false; state: PipelineState; stage: Stage; error: Error };

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Pipeline — drives fetch → index → resolve → write through the state machine.
 *
 * Halts at the first failure, reporting the stage and cause. A failed run never
 * leaves a manifest at the destination.
 */
export class Pipeline {
  private readonly registry: SchemaRegistry;
  private readonly now: () => number;

  constructor(private readonly deps: PipelineDeps) {
    this.registry = deps.registry ?? defaultRegistry();
    this.now = deps.now ?? Date.now;
  }

  async run(request: PipelineRequest): Promise<PipelineResult> {
    const now = new Date().toISOString();
    const state: PipelineState = { status: "idle", started_at: now, updated_at: now, stages: {}, error: null };
    const { signal } = request;
    const timeouts = this.deps.timeouts ?? {};

    this.advance(state, "start");

    try {
      const snapshots = await this.stage(state, signal, () =>
        this.deps.fetcher.fetchAll(request.sources, { timeoutMs: timeouts.fetch_ms, signal }),
      );

      const index = await this.stage(state, signal, () =>
        withDeadline("parse", () => this.buildIndex(snapshots, timeouts.parse_ms), { timeoutMs: timeouts.parse_ms, signal }),
      );

      const environment = await this.stage(state, signal, async () => resolve(index, request.packages));

      const manifest = await this.stage(state, signal, () => this.deps.writer.write(environment, request.destination));

      return { ok: true, state, environment, manifest };
    } catch (err) {
      const failedAt = state.status;
      const error = toError(err);
      state.error = { code: errorCodeOf(error), message: error.message };
      this.advance(state, "failure");
      // Only stages throw; idle/terminal are never current inside the try block.
      return { ok: false, state, stage: isStage(failedAt) ? failedAt : "fetching", error };
    }
  }

  /**
   * Parsing is synchronous, so the timer in withDeadline only covers the gaps
   * between snapshots. The deadline is also checked after each parse and the merge.
   */
  private async buildIndex(snapshots: Snapshot[], parseMs: number | undefined): Promise<PackageIndex> {
    const deadline = parseMs === undefined ? Infinity : this.now() + parseMs;
    const checkDeadline = () => {
      if (parseMs !== undefined && this.now() > deadline) throw new TimeoutError("parse", parseMs);
    };

    const indexes: PackageIndex[] = [];
    for (const snapshot of snapshots) {
      await yieldToLoop();
      indexes.push(PackageIndex.parse(snapshot, this.registry));
      checkDeadline();
    }
    if (indexes.length === 1) return indexes[0];
    const merged = PackageIndex.merge(indexes);
    checkDeadline();
    return merged;
  }

  private async stage<T>(state: PipelineState, signal: AbortSignal | undefined, fn: () => Promise<T>): Promise<T> {
    const current = state.status;
    if (!isStage(current)) {
      throw new Error(`Pipeline is not in a stage: ${current}`);
    }
    const started = this.now();
    try {
      if (signal?.aborted) throw new CancelledError(current);
      const value = await fn();
      state.stages[current] = { status: "ok", duration_ms: this.now() - started };
      this.advance(state, "success");
      return value;
    } catch (err) {
      state.stages[current] = { status: "failed", duration_ms: this.now() - started, error: toError(err).message };
      throw err;
    }
  }

  private advance(state: PipelineState, event: "start" | "success" | "failure"): void {
    const from = state.status;
    state.status = nextState(from, event);
    state.updated_at = new Date().toISOString();
    this.deps.onTransition?.(from, state.status, state);
  }
}
