import pLimit from "p-limit";
import type { ConversionPipeline } from "../convert/pipeline";
import { createTask } from "../convert/pipeline";
import type { ConversionOutcome } from "../convert/types";
import { WorkerPool, type WorkerPoolOptions } from "../workers/pool";
import type { Chunk, ChunkExecutor, OutcomeListener } from "./types";

/**
 * Runs chunks in the current process. File conversions across all chunks
 * share one concurrency limit.
 */
export class InlineExecutor implements ChunkExecutor {
  private readonly limit: ReturnType<typeof pLimit>;

  constructor(
    private readonly pipeline: ConversionPipeline,
    readonly capacity: number,
  ) {
    this.limit = pLimit(Math.max(1, capacity));
  }

  async runChunk(chunk: Chunk, onOutcome: OutcomeListener): Promise<ConversionOutcome[]> {
    return Promise.all(
      chunk.files.map((file) =>
        this.limit(async () => {
          const outcome = await this.pipeline.run(
            createTask({
              sourcePath: file.sourcePath,
              outputDir: file.outputDir,
              options: chunk.options,
            }),
          );
          onOutcome(outcome);
          return outcome;
        }),
      ),
    );
  }

  memoryMb(): number {
    return 0;
  }

  async close(): Promise<void> {
    this.limit.clearQueue();
  }
}

/**
 * Sends each chunk to a forked worker. A worker crash or timeout rejects the
 * chunk; outcomes the worker already streamed back stay recorded.
 */
export class ProcessPoolExecutor implements ChunkExecutor {
  private readonly pool: WorkerPool;

  constructor(poolOrOptions: WorkerPool | WorkerPoolOptions) {
    this.pool = poolOrOptions instanceof WorkerPool ? poolOrOptions : new WorkerPool(poolOrOptions);
  }

  get capacity(): number {
    return Math.max(1, this.pool.size);
  }

  runChunk(chunk: Chunk, onOutcome: OutcomeListener): Promise<ConversionOutcome[]> {
    return this.pool.convertChunk(
      { files: chunk.files, options: chunk.options },
      (outcome, rssMb) => onOutcome(outcome, rssMb),
    );
  }

  memoryMb(): number {
    return this.pool.memoryMb();
  }

  close(): Promise<void> {
    return this.pool.destroy();
  }
}
