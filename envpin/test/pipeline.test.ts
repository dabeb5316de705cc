import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { ContentCache } from "../src/cache/content-cache.js";
import { mapBounded, withDeadline } from "../src/core/concurrency.js";
import { Pipeline } from "../src/core/pipeline.js";
import { STAGES, isTerminal, nextState, type PipelineStatus } from "../src/core/state-machine.js";
import { SnapshotFetcher } from "../src/fetcher/snapshot-fetcher.js";
import { ManifestWriter } from "../src/manifest/manifest-writer.js";
import { readManifest } from "../src/manifest/manifest-reader.js";
import { CancelledError, ConflictError, NotFoundError, TimeoutError } from "../src/errors.js";
import type { Transport } from "../src/fetcher/transport.js";
import { fakeTransport, makeTmpDir, snapshotYaml, type Route } from "./helpers.js";

describe("state-machine", () => {
  it("walks every stage in order on success", () => {
    const seen: PipelineStatus[] = [];
    let status: PipelineStatus = nextState("idle", "start");
    while (!isTerminal(status)) {
      seen.push(status);
      status = nextState(status, "success");
    }
    expect(seen).toEqual([...STAGES]);
    expect(seen).toEqual(["fetching", "indexing", "resolving", "writing"]);
    expect(status).toBe("done");
  });

  it("fails from any non-terminal state", () => {
    for (const s of ["idle", ...STAGES] as const) {
      expect(nextState(s, "failure")).toBe("failed");
    }
  });

  it("rejects events in terminal states", () => {
    expect(() => nextState("done", "success")).toThrow("No transition from terminal state done");
    expect(() => nextState("failed", "start")).toThrow("No transition from terminal state failed");
  });

  it("rejects out-of-order events", () => {
    expect(() => nextState("idle", "success")).toThrow("Invalid event success in state idle");
    expect(() => nextState("fetching", "start")).toThrow("Invalid event start in state fetching");
  });
});

describe("mapBounded", () => {
  it("never exceeds the limit and keeps order", async () => {
    let active = 0;
    let peak = 0;
    const out = await mapBounded([5, 1, 4, 2, 3], 2, async (n) => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((r) => setTimeout(r, n));
      active--;
      return n * 10;
    });
    expect(out).toEqual([50, 10, 40, 20, 30]);
    expect(peak).toBe(2);
  });

  it("throws the lowest-index failure after in-flight work settles", async () => {
    const started: number[] = [];
    const err = await mapBounded([0, 1, 2, 3], 2, async (n) => {
      started.push(n);
      await new Promise((r) => setTimeout(r, n === 0 ? 10 : 1));
      throw new Error(`item ${n}`);
    }).catch((e: unknown) => e);
    expect(err).toMatchObject({ message: "item 0" });
    expect(started).toEqual([0, 1]);
  });

  it("rejects a non-positive limit", async () => {
    await expect(mapBounded([1], 0, async (n) => n)).rejects.toBeInstanceOf(RangeError);
  });
});

describe("withDeadline", () => {
  it("passes through a result that arrives in time", async () => {
    await expect(withDeadline("parse", async () => 42, { timeoutMs: 100 })).resolves.toBe(42);
  });

  it("times out slow work and aborts its signal", async () => {
    let aborted = false;
    const err = await withDeadline(
      "parse",
      (signal) =>
        new Promise<never>(() => {
          signal.addEventListener("abort", () => {
            aborted = true;
          });
        }),
      { timeoutMs: 10 },
    ).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TimeoutError);
    expect(err).toMatchObject({ message: "Timed out after 10ms during parse" });
    expect(aborted).toBe(true);
  });
});

const SNAPSHOT_URL = "https://snapshots.test/nixpkgs/release-21.11.yaml";
const SOURCE = { url: "https://snapshots.test/nixpkgs/{revision}.yaml", revision: "release-21.11" };

const COLLECTION = snapshotYaml([
  { name: "flatbuffers", version: "2.0" },
  { name: "protobuf", version: "3.19.1", dependencies: ["zlib"] },
  { name: "zlib", version: "1.2.11" },
  { name: "openssl", version: "3.0.1", default: true },
  { name: "openssl", version: "1.1.1l" },
  { name: "legacy-tool", version: "0.9", dependencies: ["openssl@1.1.1l", "curl"] },
  { name: "curl", version: "7.80.0", dependencies: ["openssl"] },
]);

describe("pipeline", () => {
  let dir: string;
  let cache: ContentCache;
  let dest: string;

  beforeEach(() => {
    dir = makeTmpDir("pipeline");
    cache = new ContentCache(path.join(dir, "cache"));
    dest = path.join(dir, "out", "env.jsonl");
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function pipelineWith(transport: Transport, timeouts?: { fetch_ms?: number; parse_ms?: number }) {
    const transitions: string[] = [];
    const pipeline = new Pipeline({
      fetcher: new SnapshotFetcher({ cache, transport }),
      writer: new ManifestWriter("/nix/store"),
      timeouts,
      onTransition: (from, to) => transitions.push(`${from}->${to}`),
    });
    return { pipeline, transitions };
  }

  function routes(extra: Record<string, Route> = {}): Record<string, Route> {
    return { [SNAPSHOT_URL]: COLLECTION, ...extra };
  }

  it("runs flatbuffers end to end", async () => {
    const { transport } = fakeTransport(routes());
    const { pipeline, transitions } = pipelineWith(transport);

    const res = await pipeline.run({ sources: [SOURCE], packages: ["flatbuffers"], destination: dest });

    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.environment.packages.map((p) => p.name)).toEqual(["flatbuffers"]);
    expect(res.state.status).toBe("done");
    expect(Object.keys(res.state.stages)).toEqual(["fetching", "indexing", "resolving", "writing"]);
    expect(transitions).toEqual([
      "idle->fetching",
      "fetching->indexing",
      "indexing->resolving",
      "resolving->writing",
      "writing->done",
    ]);
    expect(fs.readFileSync(dest, "utf8").split("\n")).toHaveLength(2);
  });

  it("matches the manifest read back against the resolved environment", async () => {
    const { transport } = fakeTransport(routes());
    const { pipeline } = pipelineWith(transport);

    const res = await pipeline.run({ sources: [SOURCE], packages: ["protobuf", "flatbuffers"], destination: dest });
    expect(res.ok).toBe(true);
    if (!res.ok) return;

    const read = await readManifest(dest);
    expect(read.entries.map((e) => [e.name, e.version, e.contentHash])).toEqual(
      res.environment.packages.map((p) => [p.name, p.version, p.contentHash]),
    );
  });

  it("stops at resolving with NotFoundError and leaves the destination untouched", async () => {
    const { transport } = fakeTransport({ [SNAPSHOT_URL]: snapshotYaml([{ name: "zlib", version: "1.2.11" }]) });
    const { pipeline } = pipelineWith(transport);

    const res = await pipeline.run({ sources: [SOURCE], packages: ["flatbuffers"], destination: dest });

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.stage).toBe("resolving");
    expect(res.error).toBeInstanceOf(NotFoundError);
    expect(res.error.message).toBe("Package not found: flatbuffers");
    expect(res.state.status).toBe("failed");
    expect(res.state.error).toEqual({ code: "NOT_FOUND", message: "Package not found: flatbuffers" });
    expect(fs.existsSync(path.dirname(dest))).toBe(false);
  });

  it("reports conflicts without writing anything", async () => {
    const { transport } = fakeTransport(routes());
    const { pipeline } = pipelineWith(transport);

    const res = await pipeline.run({ sources: [SOURCE], packages: ["legacy-tool"], destination: dest });

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.stage).toBe("resolving");
    expect(res.error).toBeInstanceOf(ConflictError);
    expect(res.state.stages.writing).toBeUndefined();
    expect(fs.existsSync(dest)).toBe(false);
  });

  it("does not touch an existing manifest when resolution fails", async () => {
    fs.mkdirSync(path.dirname(dest), { recursive: true });
    fs.writeFileSync(dest, "previous\n");
    const { transport } = fakeTransport(routes());
    const { pipeline } = pipelineWith(transport);

    await pipeline.run({ sources: [SOURCE], packages: ["does-not-exist"], destination: dest });

    expect(fs.readFileSync(dest, "utf8")).toBe("previous\n");
  });

  it("fails at fetching on transport errors", async () => {
    const { transport } = fakeTransport({ [SNAPSHOT_URL]: { status: 500 } });
    const { pipeline, transitions } = pipelineWith(transport);

    const res = await pipeline.run({ sources: [SOURCE], packages: ["flatbuffers"], destination: dest });

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.stage).toBe("fetching");
    expect(res.state.error?.code).toBe("FETCH_FAILED");
    expect(transitions).toEqual(["idle->fetching", "fetching->failed"]);
  });

  it("fails at indexing on a malformed snapshot", async () => {
    const { transport } = fakeTransport({ [SNAPSHOT_URL]: "schema_version: \"1\"\npackages: {}\n" });
    const { pipeline } = pipelineWith(transport);

    const res = await pipeline.run({ sources: [SOURCE], packages: ["flatbuffers"], destination: dest });

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.stage).toBe("indexing");
    expect(res.state.error?.code).toBe("PARSE_FAILED");
    expect(res.state.stages.fetching?.status).toBe("ok");
    expect(res.state.stages.indexing?.status).toBe("failed");
  });

  it("turns a hung fetch into a TimeoutError", async () => {
    const { transport } = fakeTransport({ [SNAPSHOT_URL]: { hang: true } });
    const { pipeline } = pipelineWith(transport, { fetch_ms: 20 });

    const res = await pipeline.run({ sources: [SOURCE], packages: ["flatbuffers"], destination: dest });

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.stage).toBe("fetching");
    expect(res.error).toBeInstanceOf(TimeoutError);
    expect(await cache.list()).toEqual([]);
  });

  it("fails at indexing when parsing outlasts the parse deadline", async () => {
    const { transport } = fakeTransport(routes());
    let clock = 0;
    const pipeline = new Pipeline({
      fetcher: new SnapshotFetcher({ cache, transport }),
      writer: new ManifestWriter("/nix/store"),
      timeouts: { parse_ms: 500 },
      // every reading of the clock advances it by a second
      now: () => (clock += 1000),
    });

    const res = await pipeline.run({ sources: [SOURCE], packages: ["flatbuffers"], destination: dest });

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.stage).toBe("indexing");
    expect(res.error).toBeInstanceOf(TimeoutError);
    expect(res.error.message).toBe("Timed out after 500ms during parse");
    expect(res.state.stages.indexing?.status).toBe("failed");
    expect(fs.existsSync(dest)).toBe(false);
  });

  it("fails with CancelledError when the caller aborts", async () => {
    const { transport } = fakeTransport({ [SNAPSHOT_URL]: { hang: true } });
    const { pipeline } = pipelineWith(transport);
    const controller = new AbortController();

    const pending = pipeline.run({ sources: [SOURCE], packages: ["flatbuffers"], destination: dest, signal: controller.signal });
    setTimeout(() => controller.abort(), 5);
    const res = await pending;

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error).toBeInstanceOf(CancelledError);
    expect(res.state.status).toBe("failed");
    expect(await cache.list()).toEqual([]);
    expect(fs.existsSync(dest)).toBe(false);
  });

  it("merges several sources fetched in parallel", async () => {
    const overlayUrl = "https://snapshots.test/overlay/r1.yaml";
    const { transport, calls } = fakeTransport(
      routes({ [overlayUrl]: snapshotYaml([{ name: "flatc-plugins", version: "0.1", dependencies: ["flatbuffers"] }]) }),
    );
    const { pipeline } = pipelineWith(transport);

    const res = await pipeline.run({
      sources: [SOURCE, { url: "https://snapshots.test/overlay/{revision}.yaml", revision: "r1" }],
      packages: ["flatc-plugins"],
      destination: dest,
    });

    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.environment.packages.map((p) => p.name)).toEqual(["flatbuffers", "flatc-plugins"]);
    expect([...calls].sort()).toEqual([SNAPSHOT_URL, overlayUrl]);
  });

  it("reuses the cache on a second run", async () => {
    const { transport, calls } = fakeTransport(routes());
    const { pipeline } = pipelineWith(transport);

    await pipeline.run({ sources: [SOURCE], packages: ["zlib"], destination: dest });
    await pipeline.run({ sources: [SOURCE], packages: ["zlib"], destination: dest });

    expect(calls).toHaveLength(1);
  });
});
