import { Command, InvalidArgumentError } from "commander";
import { afterEach, describe, expect, it, vi } from "vitest";
import { perWorkerMemoryMb } from "../src/commands/batch";
import { describeJob } from "../src/commands/cluster";
import { fromCli, parseList, parseMemoryOption, parsePositiveInt } from "../src/commands/shared";
import { createStats, formatStatsSummary } from "../src/lib/batch/stats";
import { configureLogging, createLogger } from "../src/lib/utils/logger";

afterEach(() => {
  configureLogging({ level: "warn", format: "text" });
});

describe("option parsers", () => {
  it("accepts positive integers only", () => {
    expect(parsePositiveInt("4")).toBe(4);
    expect(() => parsePositiveInt("0")).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt("2.5")).toThrow(InvalidArgumentError);
  });

  it("parses lists and memory sizes", () => {
    expect(parseList(".pdf, .docx ,")).toEqual([".pdf", ".docx"]);
    expect(parseMemoryOption("2GB")).toBe("2GB");
    expect(() => parseMemoryOption("huge")).toThrow(InvalidArgumentError);
  });

  it("only passes along values typed on the command line", () => {
    const cmd = new Command("t").option("--no-metadata").option("--batch-size <n>", "", parsePositiveInt);
    cmd.parse(["--batch-size", "3"], { from: "user" });

    expect(fromCli(cmd, "metadata", cmd.opts().metadata)).toBeUndefined();
    expect(fromCli(cmd, "batchSize", cmd.opts().batchSize)).toBe(3);
  });
});

describe("command helpers", () => {
  it("splits the memory ceiling across workers", () => {
    expect(perWorkerMemoryMb({ maxMemoryMb: 2048, maxWorkers: 4 })).toBe(512);
    expect(perWorkerMemoryMb({ maxMemoryMb: 512, maxWorkers: 8 })).toBe(256);
  });

  it("describes a finished job", () => {
    const stats = { ...createStats(0), total: 2, processed: 2, endTime: 2000 };
    const lines = describeJob({
      id: "job_1",
      status: "completed",
      inputDir: "/in",
      outputDir: "/out",
      submittedAt: 0,
      startedAt: 1000,
      completedAt: 4000,
      totalTasks: 2,
      completedTasks: 2,
      failedTasks: 0,
      stats,
    });
    expect(lines.slice(0, 5)).toEqual([
      "Job job_1: completed",
      "  input:  /in",
      "  output: /out",
      "  tasks:  2 completed, 0 failed of 2",
      "  took:   3s",
    ]);
    expect(lines.slice(5)).toEqual(formatStatsSummary(stats).map((line) => `  ${line}`));
  });

  it("summarises batch stats", () => {
    const stats = { ...createStats(0), total: 4, processed: 3, failed: 1, endTime: 2000, peakMemoryMb: 300 };
    expect(formatStatsSummary(stats)).toEqual([
      "Total files:     4",
      "Converted:       3",
      "Failed:          1",
      "Skipped:         0",
      "Duration:        2s",
      "Rate:            2.00 files/s",
      "Success rate:    75.0%",
      "Peak memory:     300 MB",
    ]);
  });
});

describe("logger", () => {
  it("writes scoped lines to stderr at or above the level", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    configureLogging({ level: "info", format: "text" });
    const log = createLogger("batch");

    log.debug("hidden");
    log.info("shown");
    expect(spy.mock.calls).toEqual([["[batch] shown"]]);
  });

  it("emits JSON lines", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    configureLogging({ level: "warn", format: "json" });

    createLogger("pool").child("w1").warn("slow", "detail");
    const line: unknown = JSON.parse(String(spy.mock.calls[0]?.[0]));
    expect(line).toMatchObject({ level: "warn", scope: "pool:w1", msg: "slow", details: ["detail"] });
  });
});
