/**
 * Per-file failure codes. These travel inside outcomes and are never thrown
 * out of the pipeline or the coordinators.
 */
export type FileErrorCode =
  | "INPUT_NOT_FOUND"
  | "INPUT_UNREADABLE"
  | "UNSUPPORTED_FORMAT"
  | "CAPABILITY_FAILURE"
  | "EMPTY_OUTPUT"
  | "OUTPUT_UNWRITABLE"
  | "BATCH_CHUNK_FAILURE";

export interface FileError {
  code: FileErrorCode;
  message: string;
}

export function fileError(code: FileErrorCode, message: string): FileError {
  return { code, message };
}

export type SetupErrorCode =
  | "CONFIGURATION_INVALID"
  | "DEPENDENCY_UNAVAILABLE"
  | "CLUSTER_FAILURE"
  | "JOB_TIMEOUT";

/**
 * Base class for errors raised while setting up or driving a run. These are
 * thrown to the caller, unlike {@link FileError}.
 */
export class ConverterError extends Error {
  readonly code: SetupErrorCode;

  constructor(code: SetupErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = "ConverterError";
  }
}

export class ConfigurationError extends ConverterError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIGURATION_INVALID", message, options);
    this.name = "ConfigurationError";
  }
}

export class DependencyError extends ConverterError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("DEPENDENCY_UNAVAILABLE", message, options);
    this.name = "DependencyError";
  }
}

export class ClusterError extends ConverterError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CLUSTER_FAILURE", message, options);
    this.name = "ClusterError";
  }
}

export class JobTimeoutError extends ConverterError {
  readonly jobId: string;

  constructor(jobId: string, timeoutMs: number) {
    super("JOB_TIMEOUT", `Job ${jobId} did not finish within ${timeoutMs}ms`);
    this.jobId = jobId;
    this.name = "JobTimeoutError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
