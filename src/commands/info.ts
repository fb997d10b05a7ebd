import * as fs from "node:fs";
import * as path from "node:path";
import { Command } from "commander";
import { createDefaultRegistry } from "../lib/convert/capabilities";
import { detectFormat } from "../lib/convert/detect";
import { formatBytes } from "../lib/utils/file-utils";
import { fail, resolveSettings } from "./shared";

export const info = new Command("info")
  .description("Show a file's size, detected format and the converters that would be tried")
  .argument("<file>", "File to inspect")
  .option("--json", "Print JSON")
  .action((file: string, _opts, cmd: Command) => {
    const options: { json?: boolean } = cmd.opts();
    try {
      const settings = resolveSettings(cmd);
      const filePath = path.resolve(file);
      const stat = fs.statSync(filePath);
      if (!stat.isFile()) throw new Error(`Not a regular file: ${filePath}`);

      const format = detectFormat(filePath);
      const candidates = createDefaultRegistry(settings)
        .candidates(filePath, format)
        .map((cap) => cap.name);
      const tooLarge = stat.size > settings.maxFileSizeMb * 1024 * 1024;

      if (options.json) {
        console.log(
          JSON.stringify({ path: filePath, sizeBytes: stat.size, format, candidates, tooLarge }, null, 2),
        );
        return;
      }

      console.log(`File:       ${filePath}`);
      console.log(`Size:       ${formatBytes(stat.size)}${tooLarge ? ` (above the ${settings.maxFileSizeMb}MB limit)` : ""}`);
      console.log(`Format:     ${format.ext || "unknown"}${format.sniffed ? " (from content)" : ""}`);
      console.log(`Converters: ${candidates.length > 0 ? candidates.join(" → ") : "none"}`);
    } catch (error) {
      fail("Failed to inspect file", error);
    }
  });
