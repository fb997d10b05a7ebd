import * as path from "node:path";
import { describe, expect, it, vi } from "vitest";
import { createStats } from "../src/lib/batch/stats";
import { DistributedCoordinator } from "../src/lib/cluster/coordinator";
import { JobTracker } from "../src/lib/cluster/job-tracker";
import { ClusterError, ConfigurationError, JobTimeoutError } from "../src/lib/errors";
import { FakeBackend, testSettings } from "./helpers";

async function startedCoordinator(overrides: Record<string, unknown> = {}) {
  const backend = new FakeBackend();
  const coordinator = new DistributedCoordinator(testSettings(overrides), { backend });
  await coordinator.startCluster();
  return { backend, coordinator };
}

describe("DistributedCoordinator", () => {
  it("tracks a job from submission to completion", async () => {
    const { backend, coordinator } = await startedCoordinator();
    const job = await coordinator.submitJob("/data/docs", undefined, { jobId: "job_a" });

    expect(job).toMatchObject({ id: "job_a", status: "submitted", totalTasks: 0 });
    expect(backend.submissions).toEqual([
      { jobId: "job_a", inputDir: path.resolve("/data/docs"), outputDir: path.resolve("/data/docs_converted") },
    ]);

    backend.update("job_a", { status: "running", totalTasks: 10, completedTasks: 4, failedTasks: 1 });
    expect(coordinator.getJobStatus("job_a")).toMatchObject({
      status: "running",
      totalTasks: 10,
      completedTasks: 4,
      failedTasks: 1,
    });

    const stats = { ...createStats(0), total: 10, processed: 9, failed: 1, endTime: 5 };
    backend.update("job_a", { status: "completed", totalTasks: 10, completedTasks: 9, failedTasks: 1, stats });

    const done = coordinator.getJobStatus("job_a");
    expect(done?.status).toBe("completed");
    expect(done?.completedTasks).toBe(9);
    expect(done?.stats).toEqual(stats);
    expect(done?.completedAt).not.toBeNull();
  });

  it("generates job ids", async () => {
    const { coordinator } = await startedCoordinator();
    const job = await coordinator.submitJob("/data/docs");
    expect(job.id).toMatch(/^job_[0-9a-f-]{36}$/);
    expect(coordinator.listJobs().map((j) => j.id)).toEqual([job.id]);
  });

  it("requires a running cluster", async () => {
    const coordinator = new DistributedCoordinator(testSettings(), { backend: new FakeBackend() });
    await expect(coordinator.submitJob("/data/docs")).rejects.toBeInstanceOf(ClusterError);
  });

  it("limits the number of active jobs", async () => {
    const { backend, coordinator } = await startedCoordinator({ maxJobs: 1 });
    await coordinator.submitJob("/a", undefined, { jobId: "one" });
    await expect(coordinator.submitJob("/b")).rejects.toThrow("Too many active jobs (1/1)");

    backend.update("one", { status: "completed" });
    await expect(coordinator.submitJob("/b", undefined, { jobId: "two" })).resolves.toMatchObject({ id: "two" });
  });

  it("marks a job failed when the backend rejects it", async () => {
    const { backend, coordinator } = await startedCoordinator();
    backend.failSubmit = new Error("no capacity");

    await expect(coordinator.submitJob("/a", undefined, { jobId: "bad" })).rejects.toThrow(
      "Submitting bad failed: no capacity",
    );
    expect(coordinator.getJobStatus("bad")).toMatchObject({ status: "failed", error: "no capacity" });
  });

  it("cancels active jobs only", async () => {
    const { backend, coordinator } = await startedCoordinator();
    await coordinator.submitJob("/a", undefined, { jobId: "c1" });

    await expect(coordinator.cancelJob("c1")).resolves.toBe(true);
    expect(backend.cancelled).toEqual(["c1"]);
    expect(coordinator.getJobStatus("c1")?.status).toBe("cancelled");

    await expect(coordinator.cancelJob("c1")).resolves.toBe(false);
    await expect(coordinator.cancelJob("missing")).resolves.toBe(false);

    backend.update("c1", { status: "running", completedTasks: 1 });
    expect(coordinator.getJobStatus("c1")?.status).toBe("cancelled");
    backend.update("c1", { status: "completed", completedTasks: 3 });
    expect(coordinator.getJobStatus("c1")).toMatchObject({ status: "cancelled", completedTasks: 0 });
  });

  it("keeps the backend's final state when the job finished before the cancel", async () => {
    const { backend, coordinator } = await startedCoordinator();
    await coordinator.submitJob("/a", undefined, { jobId: "late" });
    backend.cancelAccepted = false;
    backend.pending.set("late", { status: "completed", totalTasks: 2, completedTasks: 2, failedTasks: 0 });

    await expect(coordinator.cancelJob("late")).resolves.toBe(false);
    expect(backend.refreshed).toEqual(["late"]);
    expect(coordinator.getJobStatus("late")).toMatchObject({ status: "completed", completedTasks: 2 });
  });

  it("still records the cancel when the backend errors", async () => {
    const { backend, coordinator } = await startedCoordinator();
    await coordinator.submitJob("/a", undefined, { jobId: "flaky" });
    backend.cancel = async () => {
      throw new Error("connection reset");
    };

    await expect(coordinator.cancelJob("flaky")).resolves.toBe(true);
    expect(coordinator.getJobStatus("flaky")).toMatchObject({ status: "cancelled", error: "Cancelled by request" });
  });

  it("reports resource usage while the cluster runs", async () => {
    const { backend, coordinator } = await startedCoordinator();
    await coordinator.submitJob("/a", undefined, { jobId: "u1" });
    await coordinator.submitJob("/b", undefined, { jobId: "u2" });
    backend.update("u2", { status: "completed" });

    const usage = coordinator.getResourceUsage();
    expect(usage).toMatchObject({
      clusterType: "local",
      workers: 2,
      threadsPerWorker: 2,
      memoryLimitMb: 512,
      workerMemoryMb: 300,
      activeJobs: 1,
      totalJobs: 2,
    });
    expect(usage?.coordinatorMemoryMb).toBeGreaterThan(0);

    await coordinator.stopCluster();
    expect(coordinator.getResourceUsage()).toBeUndefined();
  });

  it("times out waiting for a job that never finishes", async () => {
    const { coordinator } = await startedCoordinator();
    await coordinator.submitJob("/a", undefined, { jobId: "slow" });
    const onPoll = vi.fn();

    await expect(
      coordinator.waitForJob("slow", { timeoutMs: 30, pollIntervalMs: 5, onPoll }),
    ).rejects.toBeInstanceOf(JobTimeoutError);
    expect(onPoll).toHaveBeenCalled();
    expect(coordinator.getJobStatus("slow")?.status).toBe("submitted");
  });

  it("returns from waitForJob once the job is terminal", async () => {
    const { backend, coordinator } = await startedCoordinator();
    await coordinator.submitJob("/a", undefined, { jobId: "w" });
    setTimeout(() => backend.update("w", { status: "failed", error: "disk full" }), 10);

    const job = await coordinator.waitForJob("w", { timeoutMs: 2000, pollIntervalMs: 5 });
    expect(job).toMatchObject({ status: "failed", error: "disk full" });
  });

  it("abandons in-flight jobs when the cluster stops", async () => {
    const { backend, coordinator } = await startedCoordinator();
    await coordinator.submitJob("/a", undefined, { jobId: "x" });
    await coordinator.submitJob("/b", undefined, { jobId: "y" });
    backend.update("y", { status: "completed" });

    await coordinator.stopCluster();
    expect(backend.stopped).toBe(true);
    expect(coordinator.getJobStatus("x")).toMatchObject({
      status: "cancelled",
      error: "Cluster stopped before the job finished",
    });
    expect(coordinator.getJobStatus("y")?.status).toBe("completed");
    expect(coordinator.getClusterInfo()).toBeUndefined();
    expect(coordinator.cleanupCompletedJobs()).toBe(2);
    expect(coordinator.listJobs()).toEqual([]);
  });

  it("needs a scheduler address for a remote cluster", async () => {
    const coordinator = new DistributedCoordinator(testSettings({ clusterType: "remote" }));
    await expect(coordinator.startCluster()).rejects.toBeInstanceOf(ConfigurationError);
  });

  it("starts once", async () => {
    const { coordinator } = await startedCoordinator();
    const first = coordinator.getClusterInfo();
    await expect(coordinator.startCluster()).resolves.toBe(first);
  });
});

describe("JobTracker", () => {
  it("only moves status forward", () => {
    const tracker = new JobTracker();
    tracker.create("j", "/in", "/out", 100);

    expect(tracker.transition("j", "running", {}, 110)).toBe(true);
    expect(tracker.transition("j", "submitted")).toBe(false);
    expect(tracker.transition("j", "running")).toBe(false);
    expect(tracker.transition("j", "completed", {}, 150)).toBe(true);
    expect(tracker.transition("j", "failed")).toBe(false);
    expect(tracker.get("j")).toMatchObject({ status: "completed", startedAt: 110, completedAt: 150 });
  });

  it("never lowers task counts", () => {
    const tracker = new JobTracker();
    tracker.create("j", "/in", "/out");
    tracker.updateCounts("j", { totalTasks: 10, completedTasks: 5, failedTasks: 1 });
    tracker.updateCounts("j", { totalTasks: 4, completedTasks: 3 });
    expect(tracker.get("j")).toMatchObject({ totalTasks: 10, completedTasks: 5, failedTasks: 1 });

    tracker.updateCounts("j", { completedTasks: 12 });
    expect(tracker.get("j")?.totalTasks).toBe(13);
  });

  it("hands out frozen copies", () => {
    const tracker = new JobTracker();
    const job = tracker.create("j", "/in", "/out");
    expect(Object.isFrozen(job)).toBe(true);
    expect(tracker.transition("missing", "running")).toBe(false);
  });
});
