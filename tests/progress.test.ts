import * as path from "node:path";
import { describe, expect, it } from "vitest";
import { createBatchSpinner, estimateRemaining } from "../src/lib/batch/progress";
import { createStats } from "../src/lib/batch/stats";

describe("estimateRemaining", () => {
  it("extrapolates from the rate so far", () => {
    expect(estimateRemaining(5, 10, 5000)).toBe("~5s remaining");
    expect(estimateRemaining(0, 10, 5000)).toBe("");
    expect(estimateRemaining(10, 10, 5000)).toBe("");
  });
});

describe("createBatchSpinner", () => {
  it("shows counts, failures and the last file relative to the input", () => {
    const root = path.join(path.sep, "data", "in");
    const ui = createBatchSpinner(root);
    const stats = { ...createStats(), total: 5, processed: 1, failed: 1, skipped: 1 };

    ui.onProgress({ stats, eligible: 4, lastFile: path.join(root, "sub", "a.txt"), done: false });
    ui.spinner.stop();

    expect(ui.spinner.text.startsWith("Converting (2/4) • 1 failed • ")).toBe(true);
    expect(ui.spinner.text.endsWith(` • ${path.join("sub", "a.txt")}`)).toBe(true);
  });
});
