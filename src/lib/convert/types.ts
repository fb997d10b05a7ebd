import type { FileError } from "../errors";

export type TargetFormat = "markdown";

export interface ConversionOptions {
  /** Keep headings, lists and tables; false flattens to plain paragraphs. */
  preserveStructure: boolean;
  /** Keep image references (and let capabilities write media files). */
  extractImages: boolean;
  /** Prepend a YAML front-matter block describing the source. */
  includeMetadata: boolean;
}

/**
 * A single requested conversion. Frozen at creation.
 */
export interface ConversionTask {
  readonly sourcePath: string;
  readonly outputPath?: string;
  readonly outputDir?: string;
  readonly targetFormat: TargetFormat | string;
  readonly options: Readonly<ConversionOptions>;
}

/**
 * Result of one task. `outputPath` is null when nothing was written.
 */
export interface ConversionOutcome {
  readonly sourcePath: string;
  readonly outputPath: string | null;
  readonly success: boolean;
  readonly error: FileError | null;
  readonly converter: string | null;
  readonly attempts: readonly string[];
  readonly elapsedMs: number;
  readonly inputBytes: number;
}

export interface DetectedFormat {
  /** Lower-cased extension with the dot, e.g. ".docx"; "" when unknown. */
  ext: string;
  /** True when `ext` came from content sniffing rather than the file name. */
  sniffed: boolean;
}

export interface ParsedDocument {
  markdown: string;
  title?: string;
  /** Source format without the dot. */
  format: string;
}

export interface ParseOptions {
  extractImages: boolean;
  /** Directory capabilities may write extracted media into. */
  mediaDir: string;
}

export type ParseResult =
  | { ok: true; value: ParsedDocument }
  | { ok: false; error: { message: string; cause?: unknown } };

export interface Capability {
  readonly name: string;
  readonly extensions: readonly string[];
  canHandle(filePath: string, format: DetectedFormat): boolean;
  parse(filePath: string, options: ParseOptions): Promise<ParseResult>;
}

export interface CapabilityDescriptor {
  name: string;
  extensions: string[];
}

export function parsed(value: ParsedDocument): ParseResult {
  return { ok: true, value };
}

export function parseFailure(message: string, cause?: unknown): ParseResult {
  return { ok: false, error: { message, cause } };
}
