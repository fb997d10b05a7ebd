import * as path from "node:path";
import { Command } from "commander";
import { createDefaultRegistry } from "../lib/convert/capabilities";
import { ConversionPipeline, createTask } from "../lib/convert/pipeline";
import { formatBytes } from "../lib/utils/file-utils";
import { fail, fromCli, resolveSettings } from "./shared";

export const convert = new Command("convert")
  .description("Convert a single document to Markdown")
  .argument("<input>", "Document to convert")
  .argument("[output]", "Output file (defaults to <name>.md next to the input)")
  .option("-o, --output-dir <dir>", "Directory for the output file")
  .option("--no-preserve-structure", "Flatten headings, lists and tables to plain text")
  .option("--no-extract-images", "Drop image references from the output")
  .option("--no-metadata", "Do not add a front-matter block")
  .action(async (input: string, output: string | undefined, _opts, cmd: Command) => {
    const options: {
      outputDir?: string;
      preserveStructure: boolean;
      extractImages: boolean;
      metadata: boolean;
    } = cmd.opts();

    try {
      const settings = resolveSettings(cmd, {
        preserveStructure: fromCli(cmd, "preserveStructure", options.preserveStructure),
        extractImages: fromCli(cmd, "extractImages", options.extractImages),
        includeMetadata: fromCli(cmd, "metadata", options.metadata),
      });

      const registry = createDefaultRegistry(settings);
      const pipeline = new ConversionPipeline(registry);
      const outcome = await pipeline.run(
        createTask({
          sourcePath: input,
          outputPath: output,
          outputDir: options.outputDir,
          options: {
            preserveStructure: settings.preserveStructure,
            extractImages: settings.extractImages,
            includeMetadata: settings.includeMetadata,
          },
        }),
      );

      if (!outcome.success || !outcome.outputPath) {
        console.error(
          `❌ ${path.basename(input)}: ${outcome.error?.code ?? "CAPABILITY_FAILURE"} ${outcome.error?.message ?? ""}`.trim(),
        );
        if (outcome.attempts.length > 0) {
          console.error(`   tried: ${outcome.attempts.join(" → ")}`);
        }
        process.exitCode = 1;
        return;
      }

      console.log(
        `✅ ${path.basename(input)} → ${outcome.outputPath} (${outcome.converter}, ${formatBytes(outcome.inputBytes)}, ${outcome.elapsedMs}ms)`,
      );
    } catch (error) {
      fail("Conversion failed", error);
    }
  });
