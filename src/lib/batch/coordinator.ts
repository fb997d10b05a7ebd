import * as path from "node:path";
import type { CapabilityRegistry } from "../convert/registry";
import type { ConversionOutcome } from "../convert/types";
import { ConfigurationError, type FileError, errorMessage, fileError } from "../errors";
import { isDirectory, isWithin, sleep } from "../utils/file-utils";
import { createLogger } from "../utils/logger";
import { currentRssMb } from "../utils/memory";
import { chunkFiles, type DiscoveredFile, discoverFiles } from "./discovery";
import { createStats, isBalanced, snapshotStats } from "./stats";
import type {
  BatchProgress,
  BatchReport,
  BatchSettings,
  BatchStats,
  Chunk,
  ChunkExecutor,
  ChunkFile,
  SkippedFile,
} from "./types";

const log = createLogger("batch");

export interface BatchCoordinatorOptions {
  settings: BatchSettings;
  /** Used to classify files before dispatch; workers build their own. */
  registry: CapabilityRegistry;
  executor: ChunkExecutor;
  onProgress?: (progress: BatchProgress) => void;
  /** Called for every converted or failed file, with the running stats. */
  onOutcome?: (outcome: ConversionOutcome, stats: Readonly<BatchStats>) => void;
  signal?: AbortSignal;
  /** Stop dispatching on SIGINT/SIGTERM. */
  handleSignals?: boolean;
  sampleMemoryMb?: () => number;
}

export function defaultOutputDir(inputDir: string): string {
  const resolved = path.resolve(inputDir);
  return `${resolved}_converted`;
}

function failedOutcome(file: DiscoveredFile | ChunkFile, error: FileError, sizeBytes: number): ConversionOutcome {
  return Object.freeze({
    sourcePath: file.sourcePath,
    outputPath: null,
    success: false,
    error,
    converter: null,
    attempts: Object.freeze([]),
    elapsedMs: 0,
    inputBytes: sizeBytes,
  });
}

/**
 * Converts a directory tree: discovers and classifies files, splits the
 * eligible ones into chunks, keeps at most `executor.capacity` chunks in
 * flight and accounts for every discovered file exactly once.
 *
 * Per-file problems never escape `run`; only setup problems (bad input
 * directory) are thrown.
 */
export class BatchCoordinator {
  private cancelRequested = false;
  private stats: BatchStats = createStats();
  private outcomes: ConversionOutcome[] = [];
  private skippedFiles: SkippedFile[] = [];
  private recorded = new Set<string>();
  private sizes = new Map<string, number>();
  private workerRss = 0;
  private lastProgressAt = 0;
  private eligible = 0;
  private memoryWarned = false;

  constructor(private readonly options: BatchCoordinatorOptions) {}

  /** Stops dispatching new chunks; chunks already running finish. */
  cancel(reason = "cancel requested"): void {
    if (this.cancelRequested) return;
    this.cancelRequested = true;
    log.warn(`${reason}; finishing in-flight chunks`);
  }

  get isCancelled(): boolean {
    return this.cancelRequested;
  }

  async run(inputDir: string, outputDir?: string): Promise<BatchReport> {
    const input = path.resolve(inputDir);
    if (!isDirectory(input)) {
      throw new ConfigurationError(`Input directory does not exist or is not a directory: ${input}`);
    }
    const output = outputDir ? path.resolve(outputDir) : defaultOutputDir(input);
    const { settings, executor, signal } = this.options;

    this.reset();
    const detach = this.attachCancellation(signal);

    try {
      const discovery = await discoverFiles(input, {
        registry: this.options.registry,
        maxFileSizeMb: settings.maxFileSizeMb,
        extensions: settings.extensions,
        respectIgnoreFiles: settings.respectIgnoreFiles,
        excludeDirs: isWithin(input, output) && input !== output ? [output] : [],
      });

      this.stats.total =
        discovery.eligible.length + discovery.tooLarge.length + discovery.unsupported.length;
      this.eligible = discovery.eligible.length;

      for (const skipped of discovery.tooLarge) {
        log.info(
          `skipping ${skipped.path}: ${(skipped.sizeBytes / 1024 / 1024).toFixed(1)}MB exceeds ${settings.maxFileSizeMb}MB`,
        );
        this.recordSkip(skipped);
      }
      for (const file of discovery.unsupported) {
        this.record(
          failedOutcome(
            file,
            fileError("UNSUPPORTED_FORMAT", `No converter for ${path.extname(file.sourcePath) || file.relativePath}`),
            file.sizeBytes,
          ),
        );
      }

      const options = {
        preserveStructure: settings.preserveStructure,
        extractImages: settings.extractImages,
        includeMetadata: settings.includeMetadata,
      };
      const chunks: Chunk[] = chunkFiles(discovery.eligible, settings.batchSize).map(
        (files, index) => ({
          index,
          options,
          files: files.map((file) => {
            this.sizes.set(file.sourcePath, file.sizeBytes);
            return {
              sourcePath: file.sourcePath,
              outputDir: settings.preserveDirectoryStructure
                ? path.join(output, path.dirname(file.relativePath))
                : output,
            };
          }),
        }),
      );

      log.info(
        `${this.stats.total} files found: ${discovery.eligible.length} to convert in ${chunks.length} chunks, ` +
          `${discovery.tooLarge.length} too large, ${discovery.unsupported.length} unsupported`,
      );
      this.reportProgress(undefined, true);

      const inFlight = new Set<Promise<void>>();
      for (const chunk of chunks) {
        while (inFlight.size >= Math.max(1, executor.capacity)) {
          await Promise.race(inFlight);
        }
        if (this.cancelRequested) {
          this.skipChunk(chunk);
          continue;
        }
        const running: Promise<void> = this.runChunk(chunk).finally(() => {
          inFlight.delete(running);
        });
        inFlight.add(running);
      }
      await Promise.all(inFlight);
    } finally {
      detach();
    }

    this.stats.endTime = Date.now();
    if (!isBalanced(this.stats)) {
      log.error(
        `stats out of balance: total ${this.stats.total} != ${this.stats.processed} + ${this.stats.failed} + ${this.stats.skipped}`,
      );
    }
    this.emitProgress(undefined, true);

    return {
      inputDir: input,
      outputDir: output,
      stats: snapshotStats(this.stats),
      outcomes: Object.freeze([...this.outcomes]),
      skippedFiles: Object.freeze([...this.skippedFiles]),
      cancelled: this.cancelRequested,
    };
  }

  private reset() {
    this.cancelRequested = this.options.signal?.aborted ?? false;
    this.stats = createStats();
    this.outcomes = [];
    this.skippedFiles = [];
    this.recorded.clear();
    this.sizes.clear();
    this.workerRss = 0;
    this.lastProgressAt = 0;
    this.eligible = 0;
    this.memoryWarned = false;
  }

  private attachCancellation(signal?: AbortSignal): () => void {
    const onAbort = () => this.cancel("run aborted");
    signal?.addEventListener("abort", onAbort, { once: true });

    const onSignal = (sig: NodeJS.Signals) => this.cancel(`received ${sig}`);
    if (this.options.handleSignals) {
      process.on("SIGINT", onSignal);
      process.on("SIGTERM", onSignal);
    }

    return () => {
      signal?.removeEventListener("abort", onAbort);
      if (this.options.handleSignals) {
        process.off("SIGINT", onSignal);
        process.off("SIGTERM", onSignal);
      }
    };
  }

  /**
   * Runs one chunk, retrying the files that have no outcome yet when the
   * executor reports a chunk-level failure. Never rejects.
   */
  private async runChunk(chunk: Chunk): Promise<void> {
    const { executor, settings } = this.options;
    let remaining = chunk.files;

    for (let attempt = 0; ; attempt++) {
      try {
        const outcomes = await executor.runChunk(
          { ...chunk, files: remaining },
          (outcome, rssMb) => {
            if (rssMb !== undefined) this.workerRss = rssMb;
            this.record(outcome);
          },
        );
        for (const outcome of outcomes) this.record(outcome);
        break;
      } catch (err) {
        remaining = remaining.filter((file) => !this.recorded.has(file.sourcePath));
        if (remaining.length === 0) break;

        if (attempt >= settings.maxRetries || this.cancelRequested) {
          log.error(
            `chunk ${chunk.index} failed, marking ${remaining.length} files failed: ${errorMessage(err)}`,
          );
          for (const file of remaining) {
            this.record(
              failedOutcome(
                file,
                fileError("BATCH_CHUNK_FAILURE", `Chunk ${chunk.index} failed: ${errorMessage(err)}`),
                this.sizes.get(file.sourcePath) ?? 0,
              ),
            );
          }
          break;
        }

        const delay = settings.retryDelayMs * (attempt + 1);
        log.warn(
          `chunk ${chunk.index} failed (${errorMessage(err)}); retrying ${remaining.length} files in ${delay}ms`,
        );
        await sleep(delay);
      }
    }

    this.checkMemory();
  }

  private skipChunk(chunk: Chunk) {
    for (const file of chunk.files) {
      this.recordSkip({
        path: file.sourcePath,
        reason: "cancelled",
        sizeBytes: this.sizes.get(file.sourcePath) ?? 0,
      });
    }
  }

  private recordSkip(skipped: SkippedFile) {
    if (this.recorded.has(skipped.path)) return;
    this.recorded.add(skipped.path);
    this.skippedFiles.push(skipped);
    this.stats.skipped += 1;
  }

  private record(outcome: ConversionOutcome) {
    if (this.recorded.has(outcome.sourcePath)) return;
    this.recorded.add(outcome.sourcePath);
    this.outcomes.push(outcome);
    if (outcome.success) {
      this.stats.processed += 1;
    } else {
      this.stats.failed += 1;
      log.info(`failed ${outcome.sourcePath}: ${outcome.error?.code} ${outcome.error?.message}`);
    }
    this.options.onOutcome?.(outcome, snapshotStats(this.stats));
    this.reportProgress(outcome.sourcePath);
  }

  private checkMemory() {
    const sample = this.options.sampleMemoryMb ?? currentRssMb;
    const usedMb = sample() + Math.max(this.workerRss, this.options.executor.memoryMb());
    if (usedMb > this.stats.peakMemoryMb) this.stats.peakMemoryMb = usedMb;

    const limit = this.options.settings.maxMemoryMb;
    if (usedMb > limit && !this.memoryWarned) {
      this.memoryWarned = true;
      log.warn(`memory use ${usedMb}MB is above the ${limit}MB ceiling`);
    } else if (usedMb <= limit) {
      this.memoryWarned = false;
    }
  }

  private reportProgress(lastFile?: string, force = false) {
    const now = Date.now();
    if (!force && now - this.lastProgressAt < this.options.settings.progressIntervalMs) return;
    this.lastProgressAt = now;
    this.emitProgress(lastFile, false);
  }

  private emitProgress(lastFile: string | undefined, done: boolean) {
    this.options.onProgress?.({
      stats: snapshotStats(this.stats),
      eligible: this.eligible,
      lastFile,
      done,
    });
  }
}
