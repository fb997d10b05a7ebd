import { formatDuration } from "../utils/file-utils";
import type { BatchStats } from "./types";

export function createStats(now = Date.now()): BatchStats {
  return {
    total: 0,
    processed: 0,
    failed: 0,
    skipped: 0,
    startTime: now,
    endTime: null,
    peakMemoryMb: 0,
  };
}

export function snapshotStats(stats: BatchStats): Readonly<BatchStats> {
  return Object.freeze({ ...stats });
}

export function isBalanced(stats: BatchStats): boolean {
  return stats.total === stats.processed + stats.failed + stats.skipped;
}

export function durationMs(stats: BatchStats): number {
  return (stats.endTime ?? Date.now()) - stats.startTime;
}

/** Converted files per second, over the whole run. */
export function throughput(stats: BatchStats): number {
  const seconds = durationMs(stats) / 1000;
  if (seconds <= 0) return 0;
  return (stats.processed + stats.failed) / seconds;
}

export function successRate(stats: BatchStats): number {
  const attempted = stats.processed + stats.failed;
  return attempted === 0 ? 0 : stats.processed / attempted;
}

export function formatStatsSummary(stats: BatchStats): string[] {
  return [
    `Total files:     ${stats.total}`,
    `Converted:       ${stats.processed}`,
    `Failed:          ${stats.failed}`,
    `Skipped:         ${stats.skipped}`,
    `Duration:        ${formatDuration(durationMs(stats))}`,
    `Rate:            ${throughput(stats).toFixed(2)} files/s`,
    `Success rate:    ${(successRate(stats) * 100).toFixed(1)}%`,
    `Peak memory:     ${stats.peakMemoryMb} MB`,
  ];
}

/**
 * Exit status for a finished batch: failures only fail the command when the
 * run was not allowed to continue past errors.
 */
export function exitCodeFor(stats: BatchStats, continueOnError: boolean): 0 | 1 {
  return stats.failed > 0 && !continueOnError ? 1 : 0;
}
