import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { errorMessage } from "../../errors";
import { detectFormat } from "../detect";
import {
  type Capability,
  type DetectedFormat,
  type ParseOptions,
  type ParseResult,
  parsed,
  parseFailure,
} from "../types";

const execFileAsync = promisify(execFile);

const PANDOC_READERS: Record<string, string> = {
  ".docx": "docx",
  ".odt": "odt",
  ".rtf": "rtf",
  ".epub": "epub",
  ".html": "html",
  ".htm": "html",
  ".tex": "latex",
  ".rst": "rst",
  ".org": "org",
  ".docbook": "docbook",
  ".textile": "textile",
};

const MAX_OUTPUT_BYTES = 256 * 1024 * 1024;

export interface PandocOptions {
  binary: string;
  timeoutMs: number;
}

/**
 * Generic catch-all that shells out to the pandoc executable. Registered last.
 */
export class PandocCapability implements Capability {
  readonly name = "pandoc";
  readonly extensions = Object.keys(PANDOC_READERS);

  constructor(private readonly options: PandocOptions) {}

  canHandle(_filePath: string, format: DetectedFormat): boolean {
    return format.ext in PANDOC_READERS;
  }

  buildArgs(filePath: string, ext: string, options: ParseOptions): string[] {
    const args = [
      filePath,
      "--from",
      PANDOC_READERS[ext] ?? "markdown",
      "--to",
      "gfm",
      "--wrap=none",
    ];
    if (options.extractImages) args.push(`--extract-media=${options.mediaDir}`);
    return args;
  }

  async parse(filePath: string, options: ParseOptions): Promise<ParseResult> {
    const { ext } = detectFormat(filePath);
    try {
      const { stdout } = await execFileAsync(
        this.options.binary,
        this.buildArgs(filePath, ext, options),
        {
          timeout: this.options.timeoutMs,
          maxBuffer: MAX_OUTPUT_BYTES,
          encoding: "utf-8",
        },
      );
      return parsed({ markdown: stdout, format: ext.slice(1) });
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        return parseFailure(`pandoc not found at "${this.options.binary}"`, err);
      }
      return parseFailure(`pandoc failed for ${filePath}: ${errorMessage(err)}`, err);
    }
  }
}

/** Version line of the pandoc binary, or null when it cannot be run. */
export async function pandocVersion(binary: string): Promise<string | null> {
  try {
    const { stdout } = await execFileAsync(binary, ["--version"], {
      timeout: 10_000,
      encoding: "utf-8",
    });
    return stdout.split("\n")[0]?.trim() || null;
  } catch {
    return null;
  }
}
