import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach } from "vitest";
import type {
  ClusterBackend,
  ClusterHandle,
  JobSubmission,
  JobUpdate,
} from "../src/lib/cluster/types";
import { type Settings, validateSettings } from "../src/lib/config";
import { handlesExtension } from "../src/lib/convert/registry";
import { type Capability, type ParseResult, parsed, parseFailure } from "../src/lib/convert/types";

const created: string[] = [];

afterEach(() => {
  while (created.length > 0) {
    const dir = created.pop();
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
  }
});

/** Temp directory removed after the current test. */
export function tempDir(prefix = "mdconvert-test-"): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  created.push(dir);
  return dir;
}

export function writeFiles(root: string, files: Record<string, string>): void {
  for (const [rel, content] of Object.entries(files)) {
    const full = path.join(root, rel);
    fs.mkdirSync(path.dirname(full), { recursive: true });
    fs.writeFileSync(full, content);
  }
}

export function testSettings(overrides: Record<string, unknown> = {}): Settings {
  return validateSettings({ retryDelayMs: 0, progressIntervalMs: 0, ...overrides }, "test settings");
}

type FakeBehaviour = string | Error | ((filePath: string) => ParseResult | Promise<ParseResult>);

/**
 * Capability that returns fixed Markdown, fails with a message, or defers
 * to a function. `calls` records every path it was asked to parse.
 */
export function fakeCapability(
  name: string,
  extensions: string[],
  behaviour: FakeBehaviour,
): Capability & { calls: string[] } {
  const calls: string[] = [];
  return {
    name,
    extensions,
    calls,
    canHandle: handlesExtension(extensions),
    async parse(filePath) {
      calls.push(filePath);
      if (typeof behaviour === "string") {
        return parsed({ markdown: behaviour, format: path.extname(filePath).slice(1) });
      }
      if (behaviour instanceof Error) return parseFailure(behaviour.message, behaviour);
      return behaviour(filePath);
    },
  };
}

/** In-process backend; tests push updates through `update`. */
export class FakeBackend implements ClusterBackend {
  readonly type = "local" as const;
  readonly submissions: JobSubmission[] = [];
  readonly cancelled: string[] = [];
  stopped = false;
  failSubmit: Error | null = null;
  cancelAccepted = true;
  memoryMb: number | undefined = 300;
  readonly refreshed: string[] = [];
  /** Updates held back until the next `refresh`. */
  readonly pending = new Map<string, JobUpdate>();
  private listeners = new Map<string, (update: JobUpdate) => void>();

  async start(): Promise<ClusterHandle> {
    return {
      type: "local",
      address: "local://test",
      workers: 2,
      threadsPerWorker: 2,
      memoryLimitMb: 512,
      startedAt: 0,
    };
  }

  async submit(job: JobSubmission, onUpdate: (update: JobUpdate) => void): Promise<void> {
    if (this.failSubmit) throw this.failSubmit;
    this.submissions.push(job);
    this.listeners.set(job.jobId, onUpdate);
  }

  async cancel(jobId: string): Promise<boolean> {
    this.cancelled.push(jobId);
    return this.cancelAccepted;
  }

  async refresh(jobId: string): Promise<void> {
    this.refreshed.push(jobId);
    const pending = this.pending.get(jobId);
    if (pending) {
      this.pending.delete(jobId);
      this.update(jobId, pending);
    }
  }

  workerMemoryMb(): number | undefined {
    return this.memoryMb;
  }

  async stop(): Promise<void> {
    this.stopped = true;
  }

  update(jobId: string, update: JobUpdate) {
    this.listeners.get(jobId)?.(update);
  }
}
