import { Command } from "commander";
import { createDefaultRegistry } from "../lib/convert/capabilities";
import { fail, resolveSettings } from "./shared";

export const formats = new Command("formats")
  .description("List the file extensions each converter accepts, in priority order")
  .option("--json", "Print JSON")
  .action((_opts, cmd: Command) => {
    const options: { json?: boolean } = cmd.opts();
    try {
      const registry = createDefaultRegistry(resolveSettings(cmd));
      if (options.json) {
        console.log(
          JSON.stringify(
            { capabilities: registry.describe(), extensions: [...registry.supportedFormats()].sort() },
            null,
            2,
          ),
        );
        return;
      }
      registry.describe().forEach((cap, i) => {
        console.log(`${i + 1}. ${cap.name.padEnd(12)} ${cap.extensions.join(" ")}`);
      });
    } catch (error) {
      fail("Failed to list formats", error);
    }
  });
