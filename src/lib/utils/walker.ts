import type { Dirent } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import ignore, { type Ignore } from "ignore";
import { IGNORE_FILES } from "../../config";
import { createLogger } from "./logger";
import { DEFAULT_IGNORE_PATTERNS, HIDDEN_PATTERNS } from "./ignore-patterns";

const log = createLogger("walker");

export interface WalkOptions {
  /** Apply .gitignore / .mdconvertignore rules and skip hidden entries. */
  respectIgnoreFiles?: boolean;
  /** Absolute directories to leave out entirely, e.g. an output dir nested in the input. */
  excludeDirs?: string[];
}

interface IgnoreScope {
  filter: Ignore;
  dir: string;
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

async function getIgnoreFilter(
  dir: string,
  ignoreFiles: string[],
): Promise<Ignore | null> {
  let filter: Ignore | null = null;

  for (const fileName of ignoreFiles) {
    const ignorePath = path.join(dir, fileName);
    try {
      const content = await fs.readFile(ignorePath, "utf-8");
      if (!filter) filter = ignore();
      filter.add(content);
    } catch (err) {
      if (!isMissing(err)) log.debug(`cannot read ${ignorePath}: ${String(err)}`);
    }
  }

  return filter;
}

/**
 * Yields paths of regular files under `rootDir`, relative to it. Only VCS
 * folders and dependency caches are skipped unless ignore files are honoured;
 * those are additive: anything a parent scope ignores stays ignored below it.
 */
export async function* walk(
  rootDir: string,
  options: WalkOptions = {},
): AsyncGenerator<string> {
  const ignoreFiles = options.respectIgnoreFiles ? IGNORE_FILES : [];
  const rootFilter = ignore().add(DEFAULT_IGNORE_PATTERNS);
  if (options.respectIgnoreFiles) rootFilter.add(HIDDEN_PATTERNS);

  const stack: IgnoreScope[] = [{ filter: rootFilter, dir: rootDir }];
  const rootIgnore = await getIgnoreFilter(rootDir, ignoreFiles);
  if (rootIgnore) {
    stack.push({ filter: rootIgnore, dir: rootDir });
  }

  const excluded = new Set((options.excludeDirs ?? []).map((d) => path.resolve(d)));
  yield* walkDir(rootDir, rootDir, stack, ignoreFiles, excluded);
}

async function* walkDir(
  currentDir: string,
  rootDir: string,
  stack: IgnoreScope[],
  ignoreFiles: string[],
  excluded: Set<string>,
): AsyncGenerator<string> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(currentDir, { withFileTypes: true });
  } catch (err) {
    log.warn(`cannot list ${currentDir}: ${String(err)}`);
    return;
  }
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const absPath = path.join(currentDir, entry.name);
    const isDir = entry.isDirectory();

    let isIgnored = false;
    for (const scope of stack) {
      const relToScope = path.relative(scope.dir, absPath);
      if (relToScope && scope.filter.ignores(isDir ? `${relToScope}/` : relToScope)) {
        isIgnored = true;
        break;
      }
    }
    if (isIgnored) continue;

    if (isDir) {
      if (excluded.has(path.resolve(absPath))) continue;
      const childIgnore = await getIgnoreFilter(absPath, ignoreFiles);
      if (childIgnore) {
        stack.push({ filter: childIgnore, dir: absPath });
        yield* walkDir(absPath, rootDir, stack, ignoreFiles, excluded);
        stack.pop();
      } else {
        yield* walkDir(absPath, rootDir, stack, ignoreFiles, excluded);
      }
    } else if (entry.isFile()) {
      yield path.relative(rootDir, absPath);
    }
  }
}
