import * as fs from "node:fs";
import * as path from "node:path";
import { MAX_OUTPUT_NAME_ATTEMPTS } from "../../config";
import { errorMessage } from "../errors";
import { fileStem, sanitizeFileName } from "../utils/file-utils";
import type { ConversionTask } from "./types";

export type WriteResult =
  | { ok: true; outputPath: string }
  | { ok: false; message: string };

/** Directory the Markdown file (and any media) for `task` will land in. */
export function outputDirFor(task: ConversionTask): string {
  if (task.outputPath) return path.dirname(path.resolve(task.outputPath));
  return path.resolve(task.outputDir ?? path.dirname(task.sourcePath));
}

export function candidateName(stem: string, attempt: number): string {
  return attempt === 0 ? `${stem}.md` : `${stem}_${attempt}.md`;
}

function isErrno(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

/**
 * Writes converted content for `task`.
 *
 * An explicit `outputPath` is written as given, replacing what is there.
 * Otherwise the file is named after the source stem and, when that name is
 * taken, `_1`, `_2`, ... is appended. Each candidate is claimed with an
 * exclusive create so concurrent writers never share a name.
 */
export async function writeOutput(task: ConversionTask, content: string): Promise<WriteResult> {
  const dir = outputDirFor(task);
  try {
    await fs.promises.mkdir(dir, { recursive: true });
  } catch (err) {
    return { ok: false, message: `Cannot create output directory ${dir}: ${errorMessage(err)}` };
  }

  if (task.outputPath) {
    const target = path.resolve(task.outputPath);
    try {
      await fs.promises.writeFile(target, content, "utf-8");
      return { ok: true, outputPath: target };
    } catch (err) {
      return { ok: false, message: `Cannot write ${target}: ${errorMessage(err)}` };
    }
  }

  const stem = sanitizeFileName(fileStem(task.sourcePath));
  for (let attempt = 0; attempt < MAX_OUTPUT_NAME_ATTEMPTS; attempt++) {
    const target = path.join(dir, candidateName(stem, attempt));
    try {
      await fs.promises.writeFile(target, content, { encoding: "utf-8", flag: "wx" });
      return { ok: true, outputPath: target };
    } catch (err) {
      if (isErrno(err, "EEXIST")) continue;
      return { ok: false, message: `Cannot write ${target}: ${errorMessage(err)}` };
    }
  }

  return {
    ok: false,
    message: `No free output name for ${stem}.md in ${dir} after ${MAX_OUTPUT_NAME_ATTEMPTS} attempts`,
  };
}

/** Size of the file at `outputPath`, or 0 when it cannot be read. */
export async function writtenSize(outputPath: string): Promise<number> {
  try {
    const stat = await fs.promises.stat(outputPath);
    return stat.size;
  } catch {
    return 0;
  }
}
