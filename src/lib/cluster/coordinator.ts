import * as path from "node:path";
import { v4 as uuidv4 } from "uuid";
import { defaultOutputDir } from "../batch/coordinator";
import type { Settings } from "../config";
import { ClusterError, ConfigurationError, ConverterError, errorMessage, JobTimeoutError } from "../errors";
import { sleep } from "../utils/file-utils";
import { createLogger } from "../utils/logger";
import { currentRssMb } from "../utils/memory";
import { JobTracker } from "./job-tracker";
import { LocalClusterBackend } from "./local-backend";
import { RemoteClusterBackend } from "./remote-backend";
import {
  type ClusterBackend,
  type ClusterHandle,
  isTerminal,
  type JobRecord,
  type JobUpdate,
  type ResourceUsage,
} from "./types";

const log = createLogger("cluster");

export interface DistributedCoordinatorOptions {
  /** Replaces the backend chosen from `clusterType`. */
  backend?: ClusterBackend;
}

export interface WaitOptions {
  timeoutMs?: number;
  pollIntervalMs?: number;
  onPoll?: (job: JobRecord) => void;
}

/**
 * Submits whole directory runs to a cluster and tracks them as jobs. Status
 * queries never block; waiting is an explicit caller-side loop.
 */
export class DistributedCoordinator {
  private backend: ClusterBackend | null;
  private handle: ClusterHandle | null = null;
  private readonly tracker = new JobTracker();

  constructor(
    private readonly settings: Settings,
    private readonly options: DistributedCoordinatorOptions = {},
  ) {
    this.backend = options.backend ?? null;
  }

  private createBackend(): ClusterBackend {
    if (this.options.backend) return this.options.backend;
    const { clusterType, schedulerAddress } = this.settings;
    if (clusterType === "local") return new LocalClusterBackend(this.settings);
    if (clusterType === "remote") {
      if (!schedulerAddress) {
        throw new ConfigurationError("A scheduler address is required for a remote cluster");
      }
      return new RemoteClusterBackend(schedulerAddress, {
        pollIntervalMs: this.settings.pollIntervalMs,
      });
    }
    throw new ConfigurationError(`Unsupported cluster type: ${String(clusterType)}`);
  }

  async startCluster(): Promise<ClusterHandle> {
    if (this.handle) return this.handle;

    const backend = this.createBackend();
    try {
      this.handle = await backend.start();
    } catch (err) {
      if (err instanceof ConverterError) throw err;
      throw new ClusterError(`Failed to start ${backend.type} cluster: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    this.backend = backend;
    log.info(`${this.handle.type} cluster ready at ${this.handle.address} with ${this.handle.workers} workers`);
    return this.handle;
  }

  getClusterInfo(): ClusterHandle | undefined {
    return this.handle ?? undefined;
  }

  async submitJob(
    inputDir: string,
    outputDir?: string,
    options: { jobId?: string } = {},
  ): Promise<JobRecord> {
    const backend = this.backend;
    if (!this.handle || !backend) {
      throw new ClusterError("Cluster is not running; start it before submitting jobs");
    }
    const active = this.tracker.active().length;
    if (active >= this.settings.maxJobs) {
      throw new ClusterError(`Too many active jobs (${active}/${this.settings.maxJobs})`);
    }

    const jobId = options.jobId ?? `job_${uuidv4()}`;
    if (this.tracker.has(jobId)) {
      throw new ClusterError(`Job ${jobId} already exists`);
    }

    // Remote paths belong to the worker node's filesystem.
    const input = backend.type === "local" ? path.resolve(inputDir) : inputDir;
    const output =
      backend.type === "local"
        ? outputDir
          ? path.resolve(outputDir)
          : defaultOutputDir(input)
        : (outputDir ?? `${input.replace(/[\\/]+$/, "")}_converted`);

    this.tracker.create(jobId, input, output);
    try {
      await backend.submit({ jobId, inputDir: input, outputDir: output }, (update) =>
        this.applyUpdate(jobId, update),
      );
    } catch (err) {
      this.tracker.transition(jobId, "failed", { error: errorMessage(err) });
      if (err instanceof ConverterError) throw err;
      throw new ClusterError(`Submitting ${jobId} failed: ${errorMessage(err)}`, { cause: err });
    }

    log.info(`submitted ${jobId} for ${input}`);
    const record = this.tracker.get(jobId);
    if (!record) throw new ClusterError(`Job ${jobId} vanished after submission`);
    return record;
  }

  private applyUpdate(jobId: string, update: JobUpdate) {
    const { status, error, stats, ...counts } = update;
    this.tracker.updateCounts(jobId, counts);
    if (status && this.tracker.transition(jobId, status, { error, stats })) {
      log.debug(`${jobId} is ${status}`);
    }
  }

  getJobStatus(jobId: string): JobRecord | undefined {
    return this.tracker.get(jobId);
  }

  listJobs(): JobRecord[] {
    return this.tracker.list();
  }

  /** Removes finished jobs from the table; returns how many were dropped. */
  cleanupCompletedJobs(): number {
    return this.tracker.removeFinished();
  }

  /**
   * Polls until the job is terminal. On timeout the job is left as it is and
   * should be treated as abandoned.
   */
  async waitForJob(jobId: string, options: WaitOptions = {}): Promise<JobRecord> {
    const timeoutMs = options.timeoutMs ?? this.settings.jobTimeoutMs;
    const interval = options.pollIntervalMs ?? this.settings.pollIntervalMs;
    const deadline = Date.now() + timeoutMs;

    for (;;) {
      const job = this.tracker.get(jobId);
      if (!job) throw new ClusterError(`Unknown job: ${jobId}`);
      options.onPoll?.(job);
      if (isTerminal(job.status)) return job;

      const remaining = deadline - Date.now();
      if (remaining <= 0) throw new JobTimeoutError(jobId, timeoutMs);
      await sleep(Math.min(interval, remaining));
    }
  }

  /**
   * Requests cancellation. False for unknown or already finished jobs,
   * including jobs the backend reports as finished since the last status
   * update; their real state is fetched instead. A backend error does not
   * block cancellation.
   */
  async cancelJob(jobId: string): Promise<boolean> {
    const job = this.tracker.get(jobId);
    if (!job || isTerminal(job.status)) return false;

    const backend = this.backend;
    if (backend) {
      let accepted = true;
      try {
        accepted = await backend.cancel(jobId);
      } catch (err) {
        log.warn(`backend could not cancel ${jobId}: ${errorMessage(err)}`);
      }
      if (!accepted) {
        log.debug(`${jobId} already finished on the backend`);
        await backend.refresh(jobId);
        return false;
      }
    }
    return this.tracker.transition(jobId, "cancelled", { error: "Cancelled by request" });
  }

  /** Capacity and load of the running cluster; undefined when stopped. */
  getResourceUsage(): ResourceUsage | undefined {
    const handle = this.handle;
    if (!handle) return undefined;
    return {
      clusterType: handle.type,
      workers: handle.workers,
      threadsPerWorker: handle.threadsPerWorker,
      memoryLimitMb: handle.memoryLimitMb,
      workerMemoryMb: this.backend?.workerMemoryMb(),
      coordinatorMemoryMb: currentRssMb(),
      activeJobs: this.tracker.active().length,
      totalJobs: this.tracker.list().length,
    };
  }

  /** Tears the cluster down. Jobs still in flight are abandoned. */
  async stopCluster(): Promise<void> {
    if (!this.handle) return;
    for (const job of this.tracker.active()) {
      this.tracker.transition(job.id, "cancelled", { error: "Cluster stopped before the job finished" });
    }
    const backend = this.backend;
    this.handle = null;
    this.backend = this.options.backend ?? null;
    if (backend) await backend.stop();
    log.info("cluster stopped");
  }
}
