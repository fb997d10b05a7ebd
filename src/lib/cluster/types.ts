import type { BatchStats } from "../batch/types";

export type JobStatus = "submitted" | "running" | "completed" | "failed" | "cancelled";

export const TERMINAL_STATUSES: readonly JobStatus[] = ["completed", "failed", "cancelled"];

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export interface JobRecord {
  id: string;
  status: JobStatus;
  inputDir: string;
  outputDir: string;
  submittedAt: number;
  startedAt: number | null;
  completedAt: number | null;
  totalTasks: number;
  completedTasks: number;
  failedTasks: number;
  error?: string;
  /** Final batch statistics, once the job has finished. */
  stats?: BatchStats;
}

export type ClusterType = "local" | "remote";

export interface ClusterHandle {
  type: ClusterType;
  address: string;
  workers: number;
  threadsPerWorker: number;
  memoryLimitMb: number;
  startedAt: number;
}

export interface TaskCounts {
  totalTasks?: number;
  completedTasks?: number;
  failedTasks?: number;
}

export interface JobUpdate extends TaskCounts {
  status?: JobStatus;
  error?: string;
  stats?: BatchStats;
}

export interface JobSubmission {
  jobId: string;
  inputDir: string;
  outputDir: string;
}

/**
 * Where jobs actually run. `submit` resolves once the job is accepted; all
 * later progress arrives through `onUpdate`.
 */
export interface ClusterBackend {
  readonly type: ClusterType;
  start(): Promise<ClusterHandle>;
  submit(job: JobSubmission, onUpdate: (update: JobUpdate) => void): Promise<void>;
  /** Best effort; false when the job already finished or is unknown. */
  cancel(jobId: string): Promise<boolean>;
  /** Delivers the job's current state through its `onUpdate` callback. */
  refresh(jobId: string): Promise<void>;
  /** Last known resident memory of all workers, when the backend can see it. */
  workerMemoryMb(): number | undefined;
  stop(): Promise<void>;
}

export interface ResourceUsage {
  clusterType: ClusterType;
  workers: number;
  threadsPerWorker: number;
  memoryLimitMb: number;
  workerMemoryMb?: number;
  coordinatorMemoryMb: number;
  activeJobs: number;
  totalJobs: number;
}

/** Task counts as the distributed layer reports them for a batch run. */
export function countsFromStats(stats: BatchStats): Required<TaskCounts> {
  return {
    totalTasks: stats.total - stats.skipped,
    completedTasks: stats.processed,
    failedTasks: stats.failed,
  };
}
