import { z } from "zod";
import { DEFAULT_MAX_WORKERS, HARD_CAP_WORKERS } from "../../config";
import { LOG_LEVELS } from "../utils/logger";
import { parseMemorySize } from "../utils/memory";

const positiveInt = z.number().int().positive();

const memorySize = z
  .string()
  .refine((value) => parseMemorySize(value) !== null, {
    message: "expected a size such as 512MB or 2GB",
  });

export const SettingsSchema = z
  .object({
    // conversion
    preserveStructure: z.boolean().default(true),
    extractImages: z.boolean().default(true),
    includeMetadata: z.boolean().default(true),

    // batch
    maxWorkers: positiveInt
      .default(DEFAULT_MAX_WORKERS)
      .transform((n) => Math.min(n, HARD_CAP_WORKERS)),
    batchSize: positiveInt.default(10),
    maxMemoryMb: positiveInt.default(2048),
    maxFileSizeMb: z.number().positive().default(70),
    continueOnError: z.boolean().default(true),
    workerTimeoutMs: positiveInt.default(300_000),
    progressIntervalMs: z.number().int().nonnegative().default(1000),
    maxRetries: z.number().int().nonnegative().default(1),
    retryDelayMs: z.number().int().nonnegative().default(1000),
    preserveDirectoryStructure: z.boolean().default(true),
    extensions: z.array(z.string().min(1)).optional(),
    respectIgnoreFiles: z.boolean().default(false),

    // cluster
    clusterType: z.enum(["local", "remote"]).default("local"),
    schedulerAddress: z.string().url().optional(),
    clusterWorkers: positiveInt.default(4),
    threadsPerWorker: positiveInt.default(2),
    memoryLimitPerWorker: memorySize.default("2GB"),
    jobTimeoutMs: positiveInt.default(3_600_000),
    pollIntervalMs: positiveInt.default(5000),
    maxJobs: positiveInt.default(10),

    // capabilities
    pandocPath: z.string().min(1).default("pandoc"),
    pandocTimeoutMs: positiveInt.default(60_000),

    // logging
    logLevel: z.enum(LOG_LEVELS).default("warn"),
    logFormat: z.enum(["text", "json"]).default("text"),
  })
  .strict();

export type Settings = z.output<typeof SettingsSchema>;
export type SettingsInput = z.input<typeof SettingsSchema>;

export function defaultSettings(): Settings {
  return SettingsSchema.parse({});
}
