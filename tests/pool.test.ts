import { EventEmitter } from "node:events";
import { afterEach, describe, expect, it, vi } from "vitest";
import { createStats } from "../src/lib/batch/stats";
import type { ConversionOutcome } from "../src/lib/convert/types";
import { isAbortError, WorkerPool, type WorkerChild } from "../src/lib/workers/pool";
import type { ParentMessage } from "../src/lib/workers/protocol";

class FakeChild extends EventEmitter implements WorkerChild {
  static nextPid = 1000;
  readonly pid = FakeChild.nextPid++;
  readonly sent: ParentMessage[] = [];
  readonly signals: Array<NodeJS.Signals | undefined> = [];

  send(message: ParentMessage): boolean {
    this.sent.push(message);
    return true;
  }

  kill(signal?: NodeJS.Signals): boolean {
    this.signals.push(signal);
    this.emit("exit", null, signal ?? "SIGTERM");
    return true;
  }

  reply(message: unknown) {
    this.emit("message", message);
  }
}

function outcome(sourcePath: string): ConversionOutcome {
  return {
    sourcePath,
    outputPath: `${sourcePath}.md`,
    success: true,
    error: null,
    converter: "fake",
    attempts: ["fake"],
    elapsedMs: 1,
    inputBytes: 1,
  };
}

const chunkPayload = {
  files: [{ sourcePath: "/in/a.txt", outputDir: "/out" }],
  options: { preserveStructure: true, extractImages: true, includeMetadata: false },
};

function createPool(size = 1, extra: { taskTimeoutMs?: number; maxWorkerMemoryMb?: number } = {}) {
  const children: FakeChild[] = [];
  const pool = new WorkerPool({
    size,
    taskTimeoutMs: extra.taskTimeoutMs ?? 10_000,
    maxWorkerMemoryMb: extra.maxWorkerMemoryMb,
    modulePath: "/virtual/process-child.js",
    fork: () => {
      const child = new FakeChild();
      children.push(child);
      return child;
    },
  });
  return { pool, children };
}

function lastSent(child: FakeChild | undefined): ParentMessage | undefined {
  return child?.sent[child.sent.length - 1];
}

afterEach(() => {
  vi.useRealTimers();
});

describe("WorkerPool", () => {
  it("streams outcomes and resolves with the result", async () => {
    const { pool, children } = createPool();
    const seen: Array<[string, number]> = [];
    const promise = pool.convertChunk(chunkPayload, (o, rss) => seen.push([o.sourcePath, rss]));

    const child = children[0];
    const sent = lastSent(child);
    expect(sent).toMatchObject({ id: 1, method: "convertChunk", payload: chunkPayload });

    child?.reply({ id: 1, method: "convertChunk", heartbeat: true, event: outcome("/in/a.txt"), rssMb: 42 });
    child?.reply({ id: 1, method: "convertChunk", result: [outcome("/in/a.txt")], rssMb: 43 });

    await expect(promise).resolves.toEqual([outcome("/in/a.txt")]);
    expect(seen).toEqual([["/in/a.txt", 42]]);
    expect(pool.memoryMb()).toBe(43);
    await pool.destroy();
  });

  it("queues tasks until a worker is free", async () => {
    const { pool, children } = createPool(1);
    const first = pool.convertChunk(chunkPayload);
    const second = pool.convertChunk(chunkPayload);
    const child = children[0];
    expect(child?.sent).toHaveLength(1);

    child?.reply({ id: 1, method: "convertChunk", result: [], rssMb: 1 });
    await first;
    expect(child?.sent).toHaveLength(2);
    child?.reply({ id: 2, method: "convertChunk", result: [], rssMb: 1 });
    await expect(second).resolves.toEqual([]);
    await pool.destroy();
  });

  it("rejects the task and replaces a worker that crashes", async () => {
    const { pool, children } = createPool(1);
    const promise = pool.convertChunk(chunkPayload);
    children[0]?.emit("exit", 1, null);

    await expect(promise).rejects.toThrow("Worker exited unexpectedly (code 1)");
    expect(children).toHaveLength(2);
    expect(pool.size).toBe(1);
    await pool.destroy();
  });

  it("rejects worker errors", async () => {
    const { pool, children } = createPool(1);
    const promise = pool.convertChunk(chunkPayload);
    children[0]?.reply({ id: 1, error: "pandoc exploded", rssMb: 5 });
    await expect(promise).rejects.toThrow("pandoc exploded");
    await pool.destroy();
  });

  it("ignores malformed messages", async () => {
    const { pool, children } = createPool(1);
    const promise = pool.convertChunk(chunkPayload);
    children[0]?.reply({ id: 1, result: [] });
    children[0]?.reply("garbage");
    children[0]?.reply({ id: 1, method: "convertChunk", result: [], rssMb: 2 });
    await expect(promise).resolves.toEqual([]);
    await pool.destroy();
  });

  it("times out silent tasks but not ones that keep sending heartbeats", async () => {
    vi.useFakeTimers();
    const { pool, children } = createPool(1, { taskTimeoutMs: 1000 });

    const job = pool.runJob({ jobId: "job_1", inputDir: "/in" });
    const child = children[0];
    await vi.advanceTimersByTimeAsync(800);
    child?.reply({ id: 1, method: "runJob", heartbeat: true, event: createStats(0), rssMb: 1 });
    await vi.advanceTimersByTimeAsync(800);
    child?.reply({
      id: 1,
      method: "runJob",
      result: { stats: createStats(0), outputDir: "/out", cancelled: false },
      rssMb: 1,
    });
    await expect(job).resolves.toEqual({ stats: createStats(0), outputDir: "/out", cancelled: false });

    const silent = pool.convertChunk(chunkPayload);
    const assertion = expect(silent).rejects.toThrow("Worker task convertChunk timed out after 1000ms");
    await vi.advanceTimersByTimeAsync(1001);
    await assertion;
    expect(child?.signals).toEqual(["SIGKILL"]);
    expect(children).toHaveLength(2);

    vi.useRealTimers();
    await pool.destroy();
  });

  it("recycles a worker above the memory limit", async () => {
    const { pool, children } = createPool(1, { maxWorkerMemoryMb: 100 });
    const promise = pool.convertChunk(chunkPayload);
    children[0]?.reply({ id: 1, method: "convertChunk", result: [], rssMb: 150 });
    await promise;

    expect(children[0]?.signals).toEqual(["SIGTERM"]);
    expect(children).toHaveLength(2);
    expect(pool.size).toBe(1);
    await pool.destroy();
  });

  it("sends a cancel message when a running job is aborted", async () => {
    const { pool, children } = createPool(1);
    const controller = new AbortController();
    const promise = pool.runJob({ jobId: "job_2", inputDir: "/in" }, { signal: controller.signal });

    controller.abort();
    const error = await promise.catch((err: unknown) => err);
    expect(isAbortError(error)).toBe(true);
    expect(lastSent(children[0])).toEqual({ id: 1, cancel: true });
    await pool.destroy();
  });

  it("rejects pending work and refuses new work after destroy", async () => {
    const { pool, children } = createPool(1);
    const pending = pool.convertChunk(chunkPayload);
    const assertion = expect(pending).rejects.toThrow("Worker pool destroyed");

    await pool.destroy();
    await assertion;
    expect(children[0]?.signals).toEqual(["SIGTERM"]);
    await expect(pool.convertChunk(chunkPayload)).rejects.toThrow("Worker pool destroyed");
  });
});
