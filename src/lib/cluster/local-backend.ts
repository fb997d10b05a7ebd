import { WORKER_SETTINGS_ENV } from "../../config";
import type { Settings } from "../config";
import { ClusterError, errorMessage } from "../errors";
import { createLogger } from "../utils/logger";
import { parseMemorySize } from "../utils/memory";
import { isAbortError, resolveProcessWorker, WorkerPool, type WorkerPoolOptions } from "../workers/pool";
import {
  type ClusterBackend,
  type ClusterHandle,
  countsFromStats,
  type JobSubmission,
  type JobUpdate,
} from "./types";

const log = createLogger("cluster:local");

export interface LocalBackendOptions {
  createPool?: (options: WorkerPoolOptions) => WorkerPool;
}

/**
 * Cluster made of `clusterWorkers` forked processes on this machine. Each job
 * occupies one worker for the whole directory run.
 */
export class LocalClusterBackend implements ClusterBackend {
  readonly type = "local" as const;
  private pool: WorkerPool | null = null;
  private readonly controllers = new Map<string, AbortController>();
  private readonly running = new Set<Promise<void>>();

  constructor(
    private readonly settings: Settings,
    private readonly options: LocalBackendOptions = {},
  ) {}

  async start(): Promise<ClusterHandle> {
    const memoryLimitMb = parseMemorySize(this.settings.memoryLimitPerWorker) ?? 2048;
    // Throws DependencyError when the worker entry point is missing.
    resolveProcessWorker();

    const poolOptions: WorkerPoolOptions = {
      size: this.settings.clusterWorkers,
      taskTimeoutMs: this.settings.workerTimeoutMs,
      maxWorkerMemoryMb: memoryLimitMb,
      execArgv: [`--max-old-space-size=${memoryLimitMb}`],
      env: { [WORKER_SETTINGS_ENV]: JSON.stringify(this.settings) },
    };
    this.pool = this.options.createPool
      ? this.options.createPool(poolOptions)
      : new WorkerPool(poolOptions);

    log.info(`started ${this.pool.size} workers (${memoryLimitMb}MB each)`);
    return {
      type: "local",
      address: `local://${process.pid}`,
      workers: this.pool.size,
      threadsPerWorker: this.settings.threadsPerWorker,
      memoryLimitMb,
      startedAt: Date.now(),
    };
  }

  async submit(job: JobSubmission, onUpdate: (update: JobUpdate) => void): Promise<void> {
    const pool = this.pool;
    if (!pool) throw new ClusterError("Local cluster is not running");

    const controller = new AbortController();
    this.controllers.set(job.jobId, controller);

    const run = pool
      .runJob(
        { jobId: job.jobId, inputDir: job.inputDir, outputDir: job.outputDir },
        {
          signal: controller.signal,
          onProgress: (stats) => onUpdate({ status: "running", ...countsFromStats(stats) }),
        },
      )
      .then((result) => {
        onUpdate({
          ...countsFromStats(result.stats),
          status: result.cancelled ? "cancelled" : "completed",
          stats: result.stats,
        });
      })
      .catch((err) => {
        if (isAbortError(err)) {
          onUpdate({ status: "cancelled", error: "Cancelled" });
        } else {
          log.warn(`job ${job.jobId} failed: ${errorMessage(err)}`);
          onUpdate({ status: "failed", error: errorMessage(err) });
        }
      })
      .finally(() => {
        this.controllers.delete(job.jobId);
      });
    this.track(run);
  }

  async cancel(jobId: string): Promise<boolean> {
    const controller = this.controllers.get(jobId);
    if (!controller) return false;
    controller.abort();
    return true;
  }

  // Local jobs push every change as it happens.
  async refresh(_jobId: string): Promise<void> {}

  workerMemoryMb(): number | undefined {
    return this.pool?.memoryMb();
  }

  async stop(): Promise<void> {
    for (const controller of this.controllers.values()) controller.abort();
    const pool = this.pool;
    this.pool = null;
    if (pool) await pool.destroy();
    await Promise.allSettled(this.running);
  }

  private track(promise: Promise<void>) {
    this.running.add(promise);
    promise.finally(() => this.running.delete(promise)).catch((err) => {
      log.debug("tracked job promise rejected", err);
    });
  }
}
