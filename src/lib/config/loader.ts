import * as fs from "node:fs";
import * as path from "node:path";
import { ZodError } from "zod";
import { ENV_PREFIX, PATHS } from "../../config";
import { ConfigurationError, errorMessage } from "../errors";
import { type Settings, SettingsSchema, type SettingsInput } from "./schema";

type EnvKind = "int" | "number" | "bool" | "string" | "list";

const ENV_FIELDS: Array<[string, keyof SettingsInput, EnvKind]> = [
  ["MAX_WORKERS", "maxWorkers", "int"],
  ["BATCH_SIZE", "batchSize", "int"],
  ["MAX_MEMORY_MB", "maxMemoryMb", "int"],
  ["MAX_FILE_SIZE_MB", "maxFileSizeMb", "number"],
  ["CONTINUE_ON_ERROR", "continueOnError", "bool"],
  ["WORKER_TIMEOUT_MS", "workerTimeoutMs", "int"],
  ["MAX_RETRIES", "maxRetries", "int"],
  ["EXTENSIONS", "extensions", "list"],
  ["RESPECT_IGNORE_FILES", "respectIgnoreFiles", "bool"],
  ["PRESERVE_STRUCTURE", "preserveStructure", "bool"],
  ["EXTRACT_IMAGES", "extractImages", "bool"],
  ["INCLUDE_METADATA", "includeMetadata", "bool"],
  ["CLUSTER_TYPE", "clusterType", "string"],
  ["SCHEDULER_ADDRESS", "schedulerAddress", "string"],
  ["CLUSTER_WORKERS", "clusterWorkers", "int"],
  ["THREADS_PER_WORKER", "threadsPerWorker", "int"],
  ["MEMORY_LIMIT_PER_WORKER", "memoryLimitPerWorker", "string"],
  ["JOB_TIMEOUT_MS", "jobTimeoutMs", "int"],
  ["POLL_INTERVAL_MS", "pollIntervalMs", "int"],
  ["PANDOC_PATH", "pandocPath", "string"],
  ["LOG_LEVEL", "logLevel", "string"],
  ["LOG_FORMAT", "logFormat", "string"],
];

export type RawSettings = Record<string, unknown>;

export interface LoadSettingsOptions {
  /** Explicit config file; must exist when given. */
  configPath?: string;
  /** Values from command-line flags; undefined entries are ignored. */
  overrides?: Partial<SettingsInput>;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  /** Skip the ./mdconvert.config.json and ~/.mdconvert lookups. */
  skipDiscovery?: boolean;
}

function parseEnvValue(name: string, raw: string, kind: EnvKind): unknown {
  const value = raw.trim();
  switch (kind) {
    case "int": {
      if (!/^-?\d+$/.test(value)) {
        throw new ConfigurationError(`${name} must be an integer, got "${raw}"`);
      }
      return Number.parseInt(value, 10);
    }
    case "number": {
      const n = Number(value);
      if (value === "" || !Number.isFinite(n)) {
        throw new ConfigurationError(`${name} must be a number, got "${raw}"`);
      }
      return n;
    }
    case "bool": {
      const lowered = value.toLowerCase();
      if (["1", "true", "yes", "on"].includes(lowered)) return true;
      if (["0", "false", "no", "off"].includes(lowered)) return false;
      throw new ConfigurationError(`${name} must be a boolean, got "${raw}"`);
    }
    case "list":
      return value
        .split(",")
        .map((part) => part.trim())
        .filter(Boolean);
    case "string":
      return value;
  }
}

export function readEnvSettings(env: NodeJS.ProcessEnv = process.env): RawSettings {
  const out: RawSettings = {};
  for (const [suffix, key, kind] of ENV_FIELDS) {
    const name = `${ENV_PREFIX}${suffix}`;
    const raw = env[name];
    if (raw === undefined || raw === "") continue;
    out[key] = parseEnvValue(name, raw, kind);
  }
  return out;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function readConfigFile(filePath: string): RawSettings {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new ConfigurationError(
      `Cannot read config file ${filePath}: ${errorMessage(err)}`,
      { cause: err },
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new ConfigurationError(
      `Config file ${filePath} is not valid JSON: ${errorMessage(err)}`,
      { cause: err },
    );
  }

  if (!isRecord(parsed)) {
    throw new ConfigurationError(`Config file ${filePath} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Finds the config file to use: an explicit path, then the project-local
 * file, then the one in the user's home directory.
 */
export function resolveConfigPath(options: LoadSettingsOptions): string | undefined {
  if (options.configPath) {
    const explicit = path.resolve(options.cwd ?? process.cwd(), options.configPath);
    if (!fs.existsSync(explicit)) {
      throw new ConfigurationError(`Config file not found: ${explicit}`);
    }
    return explicit;
  }
  if (options.skipDiscovery) return undefined;

  const local = path.join(options.cwd ?? process.cwd(), PATHS.localConfigName);
  if (fs.existsSync(local)) return local;
  if (fs.existsSync(PATHS.globalConfig)) return PATHS.globalConfig;
  return undefined;
}

function withoutUndefined(values: Partial<SettingsInput>): RawSettings {
  const out: RawSettings = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${where}: ${issue.message}`;
    })
    .join("; ");
}

export function validateSettings(raw: RawSettings, source = "settings"): Settings {
  const result = SettingsSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid ${source}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Resolves settings with the precedence flags > environment > file > defaults,
 * merged field by field.
 */
export function loadSettings(options: LoadSettingsOptions = {}): Settings {
  const configPath = resolveConfigPath(options);
  const fromFile = configPath ? readConfigFile(configPath) : {};
  const fromEnv = readEnvSettings(options.env ?? process.env);
  const fromFlags = withoutUndefined(options.overrides ?? {});

  return validateSettings(
    { ...fromFile, ...fromEnv, ...fromFlags },
    configPath ? `configuration (file ${configPath})` : "configuration",
  );
}
