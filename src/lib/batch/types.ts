import type { Settings } from "../config";
import type { ConversionOptions, ConversionOutcome } from "../convert/types";

export interface BatchStats {
  total: number;
  processed: number;
  failed: number;
  skipped: number;
  startTime: number;
  endTime: number | null;
  peakMemoryMb: number;
}

export type SkipReason = "too_large" | "cancelled";

export interface SkippedFile {
  path: string;
  reason: SkipReason;
  sizeBytes: number;
}

export interface BatchReport {
  inputDir: string;
  outputDir: string;
  stats: Readonly<BatchStats>;
  outcomes: readonly ConversionOutcome[];
  skippedFiles: readonly SkippedFile[];
  cancelled: boolean;
}

export interface BatchProgress {
  stats: Readonly<BatchStats>;
  /** Files handed to converters, excluding pre-classified skips/failures. */
  eligible: number;
  lastFile?: string;
  done: boolean;
}

/** One conversion unit sent to an executor. */
export interface ChunkFile {
  sourcePath: string;
  outputDir: string;
}

export interface Chunk {
  index: number;
  files: ChunkFile[];
  options: ConversionOptions;
}

/** Per-file callback invoked as soon as a file's outcome is known. */
export type OutcomeListener = (outcome: ConversionOutcome, workerRssMb?: number) => void;

export interface ChunkExecutor {
  /** Number of chunks that may run at the same time. */
  readonly capacity: number;
  /**
   * Converts every file of the chunk. Resolves with all outcomes. Rejects
   * when the chunk as a whole failed (crash, timeout); outcomes already
   * reported through `onOutcome` stay valid.
   */
  runChunk(chunk: Chunk, onOutcome: OutcomeListener): Promise<ConversionOutcome[]>;
  /** Memory of executor-owned processes, in MB. */
  memoryMb(): number;
  close(): Promise<void>;
}

export type BatchSettings = Pick<
  Settings,
  | "batchSize"
  | "maxFileSizeMb"
  | "maxMemoryMb"
  | "progressIntervalMs"
  | "maxRetries"
  | "retryDelayMs"
  | "preserveDirectoryStructure"
  | "extensions"
  | "preserveStructure"
  | "extractImages"
  | "includeMetadata"
  | "respectIgnoreFiles"
>;
