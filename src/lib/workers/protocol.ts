import type { BatchStats } from "../batch/types";
import type { ConversionOptions, ConversionOutcome } from "../convert/types";

export interface ConvertChunkPayload {
  files: Array<{ sourcePath: string; outputDir: string }>;
  options: ConversionOptions;
}

export interface RunJobPayload {
  jobId: string;
  inputDir: string;
  outputDir?: string;
}

export interface RunJobResult {
  stats: BatchStats;
  outputDir: string;
  cancelled: boolean;
}

export type TaskMethod = "convertChunk" | "runJob";

export type TaskPayloads = {
  convertChunk: ConvertChunkPayload;
  runJob: RunJobPayload;
};

export type TaskResults = {
  convertChunk: ConversionOutcome[];
  runJob: RunJobResult;
};

/** What a heartbeat carries for each method. */
export type TaskEvents = {
  convertChunk: ConversionOutcome;
  runJob: BatchStats;
};

export type ParentMessage =
  | { [M in TaskMethod]: { id: number; method: M; payload: TaskPayloads[M] } }[TaskMethod]
  | { id: number; cancel: true };

export type ChildMessage =
  | { [M in TaskMethod]: { id: number; method: M; result: TaskResults[M]; rssMb: number } }[TaskMethod]
  | { [M in TaskMethod]: { id: number; method: M; heartbeat: true; event: TaskEvents[M]; rssMb: number } }[TaskMethod]
  | { id: number; error: string; rssMb: number };
