import { WORKER_SETTINGS_ENV } from "../../config";
import { BatchCoordinator } from "../batch/coordinator";
import { InlineExecutor } from "../batch/executor";
import { createStats } from "../batch/stats";
import { type Settings, defaultSettings, validateSettings } from "../config";
import { createDefaultRegistry } from "../convert/capabilities";
import { ConversionPipeline, createTask } from "../convert/pipeline";
import type { CapabilityRegistry } from "../convert/registry";
import type { BatchStats } from "../batch/types";
import type { ConversionOutcome } from "../convert/types";
import { ConfigurationError, errorMessage } from "../errors";
import { createLogger } from "../utils/logger";
import type { ConvertChunkPayload, RunJobPayload, RunJobResult } from "./protocol";

const log = createLogger("worker");

interface WorkerContext {
  settings: Settings;
  registry: CapabilityRegistry;
  pipeline: ConversionPipeline;
}

let context: WorkerContext | null = null;

/** Settings the parent passed at fork time, or the defaults. */
export function settingsFromEnv(env: NodeJS.ProcessEnv = process.env): Settings {
  const raw = env[WORKER_SETTINGS_ENV];
  if (!raw) return defaultSettings();
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError(`${WORKER_SETTINGS_ENV} is not valid JSON: ${errorMessage(err)}`);
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigurationError(`${WORKER_SETTINGS_ENV} must hold a JSON object`);
  }
  return validateSettings({ ...parsed }, "worker settings");
}

/** Registry and pipeline are built once per worker process. */
export function getWorkerContext(): WorkerContext {
  if (!context) {
    const settings = settingsFromEnv();
    const registry = createDefaultRegistry(settings);
    context = { settings, registry, pipeline: new ConversionPipeline(registry) };
    log.debug(`worker ${process.pid} ready with ${registry.size} capabilities`);
  }
  return context;
}

/**
 * Converts a chunk sequentially, reporting each outcome as soon as it is
 * known so the parent can keep it if the process dies later in the chunk.
 */
export async function convertChunk(
  payload: ConvertChunkPayload,
  onOutcome: (outcome: ConversionOutcome) => void,
): Promise<ConversionOutcome[]> {
  const { pipeline } = getWorkerContext();
  const outcomes: ConversionOutcome[] = [];
  for (const file of payload.files) {
    const outcome = await pipeline.run(
      createTask({
        sourcePath: file.sourcePath,
        outputDir: file.outputDir,
        options: payload.options,
      }),
    );
    outcomes.push(outcome);
    onOutcome(outcome);
  }
  return outcomes;
}

/**
 * Runs a whole directory as one unit of work, in-process, with
 * `threadsPerWorker` conversions in flight.
 */
export async function runJob(
  payload: RunJobPayload,
  onProgress: (stats: BatchStats) => void,
  signal: AbortSignal,
): Promise<RunJobResult> {
  const { settings, registry, pipeline } = getWorkerContext();
  const executor = new InlineExecutor(pipeline, settings.threadsPerWorker);
  const coordinator = new BatchCoordinator({
    settings,
    registry,
    executor,
    signal,
    onOutcome: (_outcome, stats) => onProgress(stats),
  });

  try {
    log.info(`job ${payload.jobId}: converting ${payload.inputDir}`);
    onProgress(createStats());
    const report = await coordinator.run(payload.inputDir, payload.outputDir);
    return {
      stats: { ...report.stats },
      outputDir: report.outputDir,
      cancelled: report.cancelled,
    };
  } finally {
    await executor.close();
  }
}
