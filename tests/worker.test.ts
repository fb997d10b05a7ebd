import * as fs from "node:fs";
import * as path from "node:path";
import { describe, expect, it } from "vitest";
import { WORKER_SETTINGS_ENV } from "../src/config";
import { ConfigurationError } from "../src/lib/errors";
import { convertChunk, runJob, settingsFromEnv } from "../src/lib/workers/worker";
import { tempDir, writeFiles } from "./helpers";

describe("settingsFromEnv", () => {
  it("falls back to defaults", () => {
    expect(settingsFromEnv({}).batchSize).toBe(10);
  });

  it("reads the settings the parent passed", () => {
    const env = { [WORKER_SETTINGS_ENV]: JSON.stringify({ batchSize: 3, threadsPerWorker: 1 }) };
    expect(settingsFromEnv(env)).toMatchObject({ batchSize: 3, threadsPerWorker: 1 });
  });

  it("rejects malformed settings", () => {
    expect(() => settingsFromEnv({ [WORKER_SETTINGS_ENV]: "{" })).toThrow(ConfigurationError);
    expect(() => settingsFromEnv({ [WORKER_SETTINGS_ENV]: "[1]" })).toThrow(
      `${WORKER_SETTINGS_ENV} must hold a JSON object`,
    );
  });
});

describe("worker tasks", () => {
  it("converts a chunk and reports each outcome", async () => {
    const dir = tempDir();
    writeFiles(dir, { "a.txt": "alpha", "b.txt": "beta" });
    const seen: string[] = [];

    const outcomes = await convertChunk(
      {
        files: [
          { sourcePath: path.join(dir, "a.txt"), outputDir: path.join(dir, "out") },
          { sourcePath: path.join(dir, "b.txt"), outputDir: path.join(dir, "out") },
        ],
        options: { preserveStructure: true, extractImages: true, includeMetadata: false },
      },
      (outcome) => seen.push(path.basename(outcome.sourcePath)),
    );

    expect(seen).toEqual(["a.txt", "b.txt"]);
    expect(outcomes.every((o) => o.success)).toBe(true);
    expect(fs.readFileSync(path.join(dir, "out", "b.md"), "utf-8")).toBe("beta\n");
  });

  it("runs a whole directory as a job", async () => {
    const root = tempDir();
    const input = path.join(root, "in");
    writeFiles(input, { "a.txt": "alpha", "nested/b.md": "# Beta" });
    const progress: number[] = [];

    const result = await runJob(
      { jobId: "job_t", inputDir: input, outputDir: path.join(root, "out") },
      (stats) => progress.push(stats.processed),
      new AbortController().signal,
    );

    expect(result.cancelled).toBe(false);
    expect(result.outputDir).toBe(path.join(root, "out"));
    expect(result.stats).toMatchObject({ total: 2, processed: 2, failed: 0, skipped: 0 });
    expect(progress[0]).toBe(0);
    expect(progress[progress.length - 1]).toBe(2);
    expect(fs.existsSync(path.join(root, "out", "nested", "b.md"))).toBe(true);
  });
});
