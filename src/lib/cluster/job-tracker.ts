import type { BatchStats } from "../batch/types";
import { createLogger } from "../utils/logger";
import { isTerminal, type JobRecord, type JobStatus, type TaskCounts } from "./types";

const log = createLogger("jobs");

const RANK: Record<JobStatus, number> = {
  submitted: 0,
  running: 1,
  completed: 2,
  failed: 2,
  cancelled: 2,
};

function snapshot(job: JobRecord): JobRecord {
  return Object.freeze({ ...job, stats: job.stats ? Object.freeze({ ...job.stats }) : undefined });
}

/**
 * In-memory job table. Status only moves forward
 * (submitted -> running -> completed | failed | cancelled) and task counts
 * never decrease. Callers only ever see frozen copies.
 */
export class JobTracker {
  private readonly jobs = new Map<string, JobRecord>();

  create(id: string, inputDir: string, outputDir: string, now = Date.now()): JobRecord {
    const job: JobRecord = {
      id,
      status: "submitted",
      inputDir,
      outputDir,
      submittedAt: now,
      startedAt: null,
      completedAt: null,
      totalTasks: 0,
      completedTasks: 0,
      failedTasks: 0,
    };
    this.jobs.set(id, job);
    return snapshot(job);
  }

  get(id: string): JobRecord | undefined {
    const job = this.jobs.get(id);
    return job ? snapshot(job) : undefined;
  }

  has(id: string): boolean {
    return this.jobs.has(id);
  }

  /**
   * Moves a job forward. Returns false (and changes nothing) for unknown
   * jobs, terminal jobs and anything that is not a step forward.
   */
  transition(
    id: string,
    status: JobStatus,
    details: { error?: string; stats?: BatchStats } = {},
    now = Date.now(),
  ): boolean {
    const job = this.jobs.get(id);
    if (!job) return false;
    if (isTerminal(job.status) || RANK[status] <= RANK[job.status]) {
      log.debug(`ignoring ${job.status} -> ${status} for ${id}`);
      return false;
    }

    job.status = status;
    if (status === "running") job.startedAt = now;
    if (isTerminal(status)) {
      if (job.startedAt === null) job.startedAt = now;
      job.completedAt = now;
    }
    if (details.error !== undefined) job.error = details.error;
    if (details.stats) job.stats = { ...details.stats };
    return true;
  }

  /** Raises counts; lower values are ignored. Terminal jobs are frozen. */
  updateCounts(id: string, counts: TaskCounts): boolean {
    const job = this.jobs.get(id);
    if (!job || isTerminal(job.status)) return false;

    const completed = Math.max(job.completedTasks, counts.completedTasks ?? 0);
    const failed = Math.max(job.failedTasks, counts.failedTasks ?? 0);
    job.completedTasks = completed;
    job.failedTasks = failed;
    job.totalTasks = Math.max(job.totalTasks, counts.totalTasks ?? 0, completed + failed);
    return true;
  }

  list(): JobRecord[] {
    return Array.from(this.jobs.values(), snapshot).sort((a, b) => a.submittedAt - b.submittedAt);
  }

  active(): JobRecord[] {
    return this.list().filter((job) => !isTerminal(job.status));
  }

  /** Drops finished jobs and returns how many were removed. */
  removeFinished(): number {
    let removed = 0;
    for (const [id, job] of this.jobs) {
      if (isTerminal(job.status)) {
        this.jobs.delete(id);
        removed += 1;
      }
    }
    return removed;
  }
}
