import { relative } from "node:path";
import ora, { type Ora } from "ora";
import { formatDuration } from "../utils/file-utils";
import type { BatchProgress } from "./types";

interface BatchSpinner {
  spinner: Ora;
  onProgress: (progress: BatchProgress) => void;
}

/**
 * Converts an absolute `filePath` into a path relative to `root` when possible,
 * keeping absolute fallbacks for paths outside it.
 */
function formatRelativePath(root: string, filePath?: string): string {
  if (!filePath) {
    return "";
  }
  return filePath.startsWith(root) ? relative(root, filePath) : filePath;
}

/**
 * Remaining-time estimate from the rate so far; "" until it is meaningful.
 */
export function estimateRemaining(done: number, todo: number, elapsedMs: number): string {
  if (done <= 0 || todo <= done || elapsedMs <= 0) return "";
  const rate = done / elapsedMs;
  const estimatedMs = (todo - done) / rate;
  if (!Number.isFinite(estimatedMs) || estimatedMs <= 0) return "";
  return `~${formatDuration(estimatedMs)} remaining`;
}

/**
 * Spinner plus progress callback for `batch`. Counts exclude skipped files.
 */
export function createBatchSpinner(root: string, label = "Discovering files..."): BatchSpinner {
  const spinner = ora({ text: label, stream: process.stderr }).start();

  return {
    spinner,
    onProgress({ stats, lastFile }) {
      const done = stats.processed + stats.failed;
      const todo = stats.total - stats.skipped;
      const eta = estimateRemaining(done, todo, Date.now() - stats.startTime);
      const rel = formatRelativePath(root, lastFile);

      const parts = [`Converting (${done}/${todo})`];
      if (stats.failed > 0) parts.push(`${stats.failed} failed`);
      if (eta) parts.push(eta);
      if (rel) parts.push(rel);
      spinner.text = parts.join(" • ");

      if (process.env.MDCONVERT_DEBUG_PROGRESS === "1") {
        console.error(`[progress] ${spinner.text}`);
      }
    },
  };
}
