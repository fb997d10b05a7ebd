import { type Command, InvalidArgumentError } from "commander";
import { loadSettings, type Settings, type SettingsInput } from "../lib/config";
import { configureLogging } from "../lib/utils/logger";
import { parseMemorySize } from "../lib/utils/memory";

export interface GlobalOptions {
  config?: string;
  verbose?: boolean;
  logJson?: boolean;
}

export function parsePositiveInt(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!/^\d+$/.test(value.trim()) || !Number.isFinite(n) || n <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return n;
}

export function parsePositiveNumber(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) {
    throw new InvalidArgumentError("Expected a positive number.");
  }
  return n;
}

export function parseMemoryOption(value: string): string {
  if (parseMemorySize(value) === null) {
    throw new InvalidArgumentError("Expected a size such as 512MB or 2GB.");
  }
  return value;
}

export function parseList(value: string): string[] {
  return value
    .split(",")
    .map((part) => part.trim())
    .filter(Boolean);
}

/**
 * Value of an option only when it was typed on the command line, so
 * commander defaults (notably for --no-* flags) never mask env or file
 * settings.
 */
export function fromCli<T>(cmd: Command, key: string, value: T): T | undefined {
  return cmd.getOptionValueSource(key) === "cli" ? value : undefined;
}

/**
 * Resolves settings for a command: global flags pick the config file and
 * logging, `overrides` are the command's own flags.
 */
export function resolveSettings(
  cmd: Command,
  overrides: Partial<SettingsInput> = {},
): Settings {
  const globals: GlobalOptions = cmd.optsWithGlobals();
  const settings = loadSettings({
    configPath: globals.config,
    overrides: {
      ...overrides,
      logLevel: globals.verbose ? "debug" : overrides.logLevel,
      logFormat: globals.logJson ? "json" : overrides.logFormat,
    },
  });
  configureLogging({ level: settings.logLevel, format: settings.logFormat });
  return settings;
}

export function fail(prefix: string, error: unknown): void {
  const message = error instanceof Error ? error.message : "Unknown error";
  console.error(`${prefix}:`, message);
  process.exitCode = 1;
}
