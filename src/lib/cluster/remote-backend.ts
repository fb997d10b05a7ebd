import { z } from "zod";
import { ClusterError, DependencyError, errorMessage } from "../errors";
import { createLogger } from "../utils/logger";
import { type ClusterBackend, type ClusterHandle, isTerminal, type JobSubmission, type JobUpdate } from "./types";

const log = createLogger("cluster:remote");

const statsSchema = z.object({
  total: z.number(),
  processed: z.number(),
  failed: z.number(),
  skipped: z.number(),
  startTime: z.number(),
  endTime: z.number().nullable(),
  peakMemoryMb: z.number(),
});

const healthSchema = z.object({
  status: z.literal("ok"),
  cluster: z
    .object({
      workers: z.number(),
      threadsPerWorker: z.number(),
      memoryLimitMb: z.number(),
    })
    .optional(),
});

const remoteJobSchema = z.object({
  id: z.string(),
  status: z.enum(["submitted", "running", "completed", "failed", "cancelled"]),
  totalTasks: z.number(),
  completedTasks: z.number(),
  failedTasks: z.number(),
  error: z.string().optional(),
  stats: statsSchema.optional(),
});

const cancelSchema = z.object({ cancelled: z.boolean() });

export type FetchFn = typeof fetch;

export interface RemoteBackendOptions {
  pollIntervalMs: number;
  requestTimeoutMs?: number;
  fetchFn?: FetchFn;
}

/**
 * Talks to a worker node started with `mdconvert worker`. Job status is
 * pulled by a background poller so status queries stay synchronous.
 */
export class RemoteClusterBackend implements ClusterBackend {
  readonly type = "remote" as const;
  private readonly baseUrl: string;
  private readonly fetchFn: FetchFn;
  private readonly watched = new Map<string, (update: JobUpdate) => void>();
  private poller: NodeJS.Timeout | null = null;
  private polling = false;

  constructor(
    address: string,
    private readonly options: RemoteBackendOptions,
  ) {
    this.baseUrl = address.replace(/\/+$/, "");
    this.fetchFn = options.fetchFn ?? fetch;
  }

  private async request(method: string, route: string, body?: unknown): Promise<Response> {
    return this.fetchFn(`${this.baseUrl}${route}`, {
      method,
      headers: body === undefined ? undefined : { "Content-Type": "application/json" },
      body: body === undefined ? undefined : JSON.stringify(body),
      signal: AbortSignal.timeout(this.options.requestTimeoutMs ?? 10_000),
    });
  }

  async start(): Promise<ClusterHandle> {
    let res: Response;
    try {
      res = await this.request("GET", "/health");
    } catch (err) {
      throw new DependencyError(`Worker node at ${this.baseUrl} is unreachable: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    if (!res.ok) {
      throw new ClusterError(`Worker node at ${this.baseUrl} is unhealthy (HTTP ${res.status})`);
    }
    const health = healthSchema.safeParse(await res.json());
    if (!health.success) {
      throw new ClusterError(`Worker node at ${this.baseUrl} sent an unexpected health response`);
    }

    return {
      type: "remote",
      address: this.baseUrl,
      workers: health.data.cluster?.workers ?? 0,
      threadsPerWorker: health.data.cluster?.threadsPerWorker ?? 0,
      memoryLimitMb: health.data.cluster?.memoryLimitMb ?? 0,
      startedAt: Date.now(),
    };
  }

  async submit(job: JobSubmission, onUpdate: (update: JobUpdate) => void): Promise<void> {
    let res: Response;
    try {
      res = await this.request("POST", "/jobs", job);
    } catch (err) {
      throw new ClusterError(`Could not submit ${job.jobId}: ${errorMessage(err)}`, { cause: err });
    }
    if (!res.ok) {
      const detail = await res.text();
      throw new ClusterError(`Worker node rejected ${job.jobId} (HTTP ${res.status}): ${detail}`);
    }

    this.watched.set(job.jobId, onUpdate);
    this.ensurePoller();
  }

  async cancel(jobId: string): Promise<boolean> {
    const res = await this.request("DELETE", `/jobs/${encodeURIComponent(jobId)}`);
    if (res.status === 404) return false;
    if (!res.ok) throw new ClusterError(`Cancel of ${jobId} failed (HTTP ${res.status})`);
    const parsed = cancelSchema.safeParse(await res.json());
    return parsed.success && parsed.data.cancelled;
  }

  async refresh(jobId: string): Promise<void> {
    const onUpdate = this.watched.get(jobId);
    if (onUpdate) await this.fetchStatus(jobId, onUpdate);
  }

  workerMemoryMb(): number | undefined {
    return undefined;
  }

  async stop(): Promise<void> {
    if (this.poller) clearInterval(this.poller);
    this.poller = null;
    this.watched.clear();
  }

  /** Fetches the current state of every watched job once. */
  async pollOnce(): Promise<void> {
    if (this.polling) return;
    this.polling = true;
    try {
      for (const [jobId, onUpdate] of Array.from(this.watched)) {
        await this.fetchStatus(jobId, onUpdate);
      }
    } finally {
      this.polling = false;
    }
  }

  private async fetchStatus(jobId: string, onUpdate: (update: JobUpdate) => void) {
    try {
      const res = await this.request("GET", `/jobs/${encodeURIComponent(jobId)}`);
      if (res.status === 404) {
        this.watched.delete(jobId);
        onUpdate({ status: "failed", error: "Job is unknown to the worker node" });
        return;
      }
      if (!res.ok) {
        log.warn(`status of ${jobId} unavailable (HTTP ${res.status})`);
        return;
      }
      const parsed = remoteJobSchema.safeParse(await res.json());
      if (!parsed.success) {
        log.warn(`unexpected status payload for ${jobId}`);
        return;
      }
      const { status, totalTasks, completedTasks, failedTasks, error, stats } = parsed.data;
      onUpdate({ status, totalTasks, completedTasks, failedTasks, error, stats });
      if (isTerminal(status)) this.watched.delete(jobId);
    } catch (err) {
      log.warn(`polling ${jobId} failed: ${errorMessage(err)}`);
    }
  }

  private ensurePoller() {
    if (this.poller) return;
    this.poller = setInterval(() => {
      if (this.watched.size === 0) return;
      this.pollOnce().catch((err) => log.warn(`poll failed: ${errorMessage(err)}`));
    }, this.options.pollIntervalMs);
    this.poller.unref();
  }
}
