import { Command, InvalidArgumentError } from "commander";
import ora from "ora";
import { formatStatsSummary } from "../lib/batch/stats";
import { DistributedCoordinator } from "../lib/cluster/coordinator";
import type { ClusterType, JobRecord } from "../lib/cluster/types";
import { JobTimeoutError } from "../lib/errors";
import { formatDuration } from "../lib/utils/file-utils";
import { fail, parseMemoryOption, parsePositiveInt, resolveSettings } from "./shared";

function parseClusterType(value: string): ClusterType {
  if (value === "local" || value === "remote") return value;
  throw new InvalidArgumentError("Expected local or remote.");
}

export function describeJob(job: JobRecord): string[] {
  const lines = [
    `Job ${job.id}: ${job.status}`,
    `  input:  ${job.inputDir}`,
    `  output: ${job.outputDir}`,
    `  tasks:  ${job.completedTasks} completed, ${job.failedTasks} failed of ${job.totalTasks}`,
  ];
  if (job.startedAt && job.completedAt) {
    lines.push(`  took:   ${formatDuration(job.completedAt - job.startedAt)}`);
  }
  if (job.error) lines.push(`  error:  ${job.error}`);
  if (job.stats) {
    for (const line of formatStatsSummary(job.stats)) lines.push(`  ${line}`);
  }
  return lines;
}

export const cluster = new Command("cluster")
  .description("Run a directory conversion as a job on a local or remote cluster")
  .argument("<inputDir>", "Directory to convert (on the worker node for remote clusters)")
  .argument("[outputDir]", "Output directory (defaults to <inputDir>_converted)")
  .option("--type <type>", "Cluster type: local or remote", parseClusterType)
  .option("--scheduler <url>", "Worker node address for remote clusters")
  .option("--workers <n>", "Worker processes for a local cluster", parsePositiveInt)
  .option("--threads <n>", "Concurrent files per worker", parsePositiveInt)
  .option("--memory-limit <size>", "Memory per worker, e.g. 2GB", parseMemoryOption)
  .option("--timeout <seconds>", "Give up waiting after this many seconds", parsePositiveInt)
  .option("--no-progress", "Disable the progress spinner")
  .action(async (inputDir: string, outputDir: string | undefined, _opts, cmd: Command) => {
    const options: {
      type?: ClusterType;
      scheduler?: string;
      workers?: number;
      threads?: number;
      memoryLimit?: string;
      timeout?: number;
      progress: boolean;
    } = cmd.opts();

    let coordinator: DistributedCoordinator | null = null;
    try {
      const settings = resolveSettings(cmd, {
        clusterType: options.type,
        schedulerAddress: options.scheduler,
        clusterWorkers: options.workers,
        threadsPerWorker: options.threads,
        memoryLimitPerWorker: options.memoryLimit,
        jobTimeoutMs: options.timeout ? options.timeout * 1000 : undefined,
      });

      coordinator = new DistributedCoordinator(settings);
      const spinner = options.progress
        ? ora({ text: `Starting ${settings.clusterType} cluster...`, stream: process.stderr }).start()
        : null;

      const handle = await coordinator.startCluster();
      if (spinner) spinner.text = `Submitting to ${handle.address}...`;

      const submitted = await coordinator.submitJob(inputDir, outputDir);

      let job: JobRecord;
      try {
        job = await coordinator.waitForJob(submitted.id, {
          onPoll: (current) => {
            if (!spinner) return;
            const done = current.completedTasks + current.failedTasks;
            spinner.text = `${current.id} ${current.status} (${done}/${current.totalTasks})`;
          },
        });
      } catch (e) {
        if (e instanceof JobTimeoutError) {
          spinner?.fail(e.message);
          await coordinator.cancelJob(submitted.id);
        } else {
          spinner?.fail("Job failed");
        }
        throw e;
      }

      if (job.status === "completed") spinner?.succeed(`Job ${job.id} completed`);
      else spinner?.warn(`Job ${job.id} ${job.status}`);

      for (const line of describeJob(job)) console.log(line);
      if (job.status !== "completed") process.exitCode = 1;
    } catch (error) {
      fail("Cluster run failed", error);
    } finally {
      if (coordinator) await coordinator.stopCluster();
    }
  });
