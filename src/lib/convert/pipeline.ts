import * as fs from "node:fs";
import * as path from "node:path";
import { type FileError, errorMessage, fileError } from "../errors";
import { fileStem } from "../utils/file-utils";
import { createLogger } from "../utils/logger";
import { detectFormat } from "./detect";
import { postProcess } from "./markdown";
import { outputDirFor, writeOutput, writtenSize } from "./output";
import type { CapabilityRegistry } from "./registry";
import {
  type ConversionOptions,
  type ConversionOutcome,
  type ConversionTask,
  type ParseResult,
  parseFailure,
  type TargetFormat,
} from "./types";

const log = createLogger("pipeline");

export const SUPPORTED_TARGETS: readonly TargetFormat[] = ["markdown"];

export const DEFAULT_CONVERSION_OPTIONS: Readonly<ConversionOptions> = Object.freeze({
  preserveStructure: true,
  extractImages: true,
  includeMetadata: true,
});

export interface TaskInput {
  sourcePath: string;
  outputPath?: string;
  outputDir?: string;
  targetFormat?: string;
  options?: Partial<ConversionOptions>;
}

export function createTask(input: TaskInput): ConversionTask {
  return Object.freeze({
    sourcePath: path.resolve(input.sourcePath),
    outputPath: input.outputPath ? path.resolve(input.outputPath) : undefined,
    outputDir: input.outputDir ? path.resolve(input.outputDir) : undefined,
    targetFormat: input.targetFormat ?? "markdown",
    options: Object.freeze({ ...DEFAULT_CONVERSION_OPTIONS, ...input.options }),
  });
}

function mediaDirFor(task: ConversionTask): string {
  const stem = task.outputPath ? fileStem(task.outputPath) : fileStem(task.sourcePath);
  return path.join(outputDirFor(task), `${stem}_media`);
}

function isSupportedTarget(format: string): format is TargetFormat {
  return SUPPORTED_TARGETS.some((target) => target === format);
}

/**
 * Runs one task through the registry's candidates in priority order and
 * writes the first non-empty result. Per-file problems come back as a failed
 * outcome; this never throws for them.
 */
export class ConversionPipeline {
  constructor(private readonly registry: CapabilityRegistry) {}

  async run(task: ConversionTask): Promise<ConversionOutcome> {
    const started = Date.now();
    const attempts: string[] = [];
    let inputBytes = 0;

    const finish = (
      result: { outputPath: string; converter: string } | FileError,
    ): ConversionOutcome => {
      const elapsedMs = Date.now() - started;
      if ("code" in result) {
        log.debug(`${task.sourcePath}: ${result.code} ${result.message}`);
        return Object.freeze({
          sourcePath: task.sourcePath,
          outputPath: null,
          success: false,
          error: result,
          converter: null,
          attempts: Object.freeze([...attempts]),
          elapsedMs,
          inputBytes,
        });
      }
      return Object.freeze({
        sourcePath: task.sourcePath,
        outputPath: result.outputPath,
        success: true,
        error: null,
        converter: result.converter,
        attempts: Object.freeze([...attempts]),
        elapsedMs,
        inputBytes,
      });
    };

    let stat: fs.Stats;
    try {
      stat = await fs.promises.stat(task.sourcePath);
    } catch {
      return finish(fileError("INPUT_NOT_FOUND", `Input file not found: ${task.sourcePath}`));
    }
    if (!stat.isFile()) {
      return finish(fileError("INPUT_NOT_FOUND", `Input is not a regular file: ${task.sourcePath}`));
    }
    inputBytes = stat.size;

    try {
      await fs.promises.access(task.sourcePath, fs.constants.R_OK);
    } catch (err) {
      return finish(
        fileError("INPUT_UNREADABLE", `Input file is not readable: ${task.sourcePath} (${errorMessage(err)})`),
      );
    }

    if (!isSupportedTarget(task.targetFormat)) {
      return finish(
        fileError("UNSUPPORTED_FORMAT", `Unsupported target format: ${task.targetFormat}`),
      );
    }

    const format = detectFormat(task.sourcePath);
    const candidates = this.registry.candidates(task.sourcePath, format);
    if (candidates.length === 0) {
      return finish(
        fileError(
          "UNSUPPORTED_FORMAT",
          `No converter for ${format.ext || "files without an extension"}: ${task.sourcePath}`,
        ),
      );
    }

    const parseOptions = {
      extractImages: task.options.extractImages,
      mediaDir: mediaDirFor(task),
    };

    let lastError = fileError("CAPABILITY_FAILURE", "No converter produced output");

    for (const capability of candidates) {
      attempts.push(capability.name);

      let result: ParseResult;
      try {
        result = await capability.parse(task.sourcePath, parseOptions);
      } catch (err) {
        result = parseFailure(`${capability.name} threw: ${errorMessage(err)}`, err);
      }

      if (!result.ok) {
        log.warn(`${capability.name} failed for ${task.sourcePath}: ${result.error.message}`);
        lastError = fileError("CAPABILITY_FAILURE", result.error.message);
        continue;
      }

      const content = postProcess(result.value.markdown, task.options, {
        title: result.value.title || fileStem(task.sourcePath),
        source: path.basename(task.sourcePath),
        format: result.value.format || format.ext.slice(1),
        converter: capability.name,
      });
      if (!content) {
        log.info(`${capability.name} produced no content for ${task.sourcePath}`);
        lastError = fileError("EMPTY_OUTPUT", `${capability.name} produced empty output`);
        continue;
      }

      const written = await writeOutput(task, content);
      if (!written.ok) {
        return finish(fileError("OUTPUT_UNWRITABLE", written.message));
      }
      if ((await writtenSize(written.outputPath)) === 0) {
        log.info(`${capability.name} left an empty file for ${task.sourcePath}`);
        await fs.promises.rm(written.outputPath, { force: true });
        lastError = fileError("EMPTY_OUTPUT", `Output file is empty: ${written.outputPath}`);
        continue;
      }

      log.debug(`${task.sourcePath} -> ${written.outputPath} via ${capability.name}`);
      return finish({ outputPath: written.outputPath, converter: capability.name });
    }

    return finish(lastError);
  }
}
