import * as path from "node:path";
import { Command } from "commander";
import { WORKER_SETTINGS_ENV } from "../config";
import { BatchCoordinator } from "../lib/batch/coordinator";
import { ProcessPoolExecutor } from "../lib/batch/executor";
import { createBatchSpinner } from "../lib/batch/progress";
import { exitCodeFor, formatStatsSummary } from "../lib/batch/stats";
import type { BatchReport } from "../lib/batch/types";
import type { Settings } from "../lib/config";
import { createDefaultRegistry } from "../lib/convert/capabilities";
import {
  fail,
  fromCli,
  parseList,
  parsePositiveInt,
  parsePositiveNumber,
  resolveSettings,
} from "./shared";

const MAX_LISTED_FAILURES = 20;

/** Per-worker recycle threshold: an even share of the batch ceiling. */
export function perWorkerMemoryMb(settings: Pick<Settings, "maxMemoryMb" | "maxWorkers">): number {
  return Math.max(256, Math.floor(settings.maxMemoryMb / Math.max(1, settings.maxWorkers)));
}

export function printReport(report: BatchReport, continueOnError: boolean): void {
  console.log(`\nBatch ${report.cancelled ? "cancelled" : "complete"}: ${report.inputDir} → ${report.outputDir}`);
  for (const line of formatStatsSummary(report.stats)) console.log(`  ${line}`);

  const failures = report.outcomes.filter((o) => !o.success);
  if (failures.length > 0) {
    console.log(`\nFailures${failures.length > MAX_LISTED_FAILURES ? ` (first ${MAX_LISTED_FAILURES})` : ""}:`);
    for (const outcome of failures.slice(0, MAX_LISTED_FAILURES)) {
      const rel = path.relative(report.inputDir, outcome.sourcePath);
      console.log(`  ❌ ${rel}: ${outcome.error?.code} ${outcome.error?.message ?? ""}`);
    }
    if (!continueOnError) {
      console.log("\nStopping with an error status because continue-on-error is off.");
    }
  }
}

export const batch = new Command("batch")
  .description("Convert every document under a directory using a process pool")
  .argument("<inputDir>", "Directory to convert")
  .argument("[outputDir]", "Output directory (defaults to <inputDir>_converted)")
  .option("-w, --workers <n>", "Worker processes", parsePositiveInt)
  .option("--batch-size <n>", "Files per chunk", parsePositiveInt)
  .option("--max-memory <mb>", "Memory ceiling in MB", parsePositiveInt)
  .option("--file-size-limit <mb>", "Skip files larger than this many MB", parsePositiveNumber)
  .option("--extensions <list>", "Only convert these extensions (comma separated)", parseList)
  .option("--continue-on-error", "Exit 0 even when some files failed")
  .option("--no-continue-on-error", "Exit 1 when any file failed")
  .option("--respect-ignore-files", "Skip files matched by .gitignore/.mdconvertignore and hidden files")
  .option("--flat", "Write every output file directly into the output directory")
  .option("--no-progress", "Disable the progress spinner")
  .action(async (inputDir: string, outputDir: string | undefined, _opts, cmd: Command) => {
    const options: {
      workers?: number;
      batchSize?: number;
      maxMemory?: number;
      fileSizeLimit?: number;
      extensions?: string[];
      respectIgnoreFiles?: boolean;
      continueOnError?: boolean;
      flat?: boolean;
      progress: boolean;
    } = cmd.opts();

    let executor: ProcessPoolExecutor | null = null;
    try {
      const settings = resolveSettings(cmd, {
        maxWorkers: options.workers,
        batchSize: options.batchSize,
        maxMemoryMb: options.maxMemory,
        maxFileSizeMb: options.fileSizeLimit,
        extensions: options.extensions,
        respectIgnoreFiles: options.respectIgnoreFiles,
        continueOnError: fromCli(cmd, "continueOnError", options.continueOnError),
        preserveDirectoryStructure: options.flat ? false : undefined,
      });

      executor = new ProcessPoolExecutor({
        size: settings.maxWorkers,
        taskTimeoutMs: settings.workerTimeoutMs,
        maxWorkerMemoryMb: perWorkerMemoryMb(settings),
        env: { [WORKER_SETTINGS_ENV]: JSON.stringify(settings) },
      });

      const root = path.resolve(inputDir);
      const ui = options.progress ? createBatchSpinner(root) : null;
      const coordinator = new BatchCoordinator({
        settings,
        registry: createDefaultRegistry(settings),
        executor,
        handleSignals: true,
        onProgress: ui?.onProgress,
      });

      let report: BatchReport;
      try {
        report = await coordinator.run(root, outputDir);
      } catch (e) {
        ui?.spinner.fail("Batch failed");
        throw e;
      }

      const { stats } = report;
      if (report.cancelled) {
        ui?.spinner.warn(`Cancelled after ${stats.processed + stats.failed} files`);
      } else if (stats.failed > 0) {
        ui?.spinner.warn(`Converted ${stats.processed}/${stats.total} • ${stats.failed} failed`);
      } else {
        ui?.spinner.succeed(`Converted ${stats.processed}/${stats.total}`);
      }

      printReport(report, settings.continueOnError);
      process.exitCode = report.cancelled ? 130 : exitCodeFor(stats, settings.continueOnError);
    } catch (error) {
      fail("Batch conversion failed", error);
    } finally {
      if (executor) await executor.close();
    }
  });
