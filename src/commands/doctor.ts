import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { Command } from "commander";
import { PATHS } from "../config";
import { resolveConfigPath } from "../lib/config";
import { pandocVersion } from "../lib/convert/capabilities";
import { errorMessage } from "../lib/errors";
import { resolveProcessWorker } from "../lib/workers/pool";
import { fail, type GlobalOptions, resolveSettings } from "./shared";

export const doctor = new Command("doctor")
  .description("Check converters, worker entry point and configuration")
  .action(async (_opts, cmd: Command) => {
    console.log("🏥 mdconvert Doctor\n");
    let problems = 0;

    try {
      const globals: GlobalOptions = cmd.optsWithGlobals();
      const configPath = resolveConfigPath({ configPath: globals.config });
      console.log(
        configPath ? `✅ Config: ${configPath}` : `ℹ️  Config: none (looked for ./${PATHS.localConfigName} and ${PATHS.globalConfig})`,
      );

      const settings = resolveSettings(cmd);
      console.log("✅ Settings are valid");

      const pandoc = await pandocVersion(settings.pandocPath);
      if (pandoc) {
        console.log(`✅ Pandoc: ${pandoc}`);
      } else {
        console.log(`⚠️  Pandoc: not found at "${settings.pandocPath}" (formats without a built-in reader will fail)`);
      }

      try {
        const entry = resolveProcessWorker();
        console.log(`✅ Process worker: ${path.relative(process.cwd(), entry.filename) || entry.filename}`);
      } catch (err) {
        problems++;
        console.log(`❌ Process worker: ${errorMessage(err)}`);
      }

      const global = PATHS.globalRoot;
      console.log(`${fs.existsSync(global) ? "✅" : "ℹ️ "} Global directory: ${global}`);
    } catch (error) {
      problems++;
      console.log(`❌ ${errorMessage(error)}`);
    }

    console.log(`\nSystem: ${os.platform()} ${os.arch()} | Node: ${process.version} | CPUs: ${os.cpus().length}`);
    if (problems > 0) {
      fail("Doctor found problems", new Error(`${problems} check(s) failed`));
    } else {
      console.log("\nIf you see ✅ everywhere, you are ready to convert!");
    }
  });
