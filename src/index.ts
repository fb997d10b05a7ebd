#!/usr/bin/env node
import * as fs from "node:fs";
import * as path from "node:path";
import { program } from "commander";
import { batch } from "./commands/batch";
import { cluster } from "./commands/cluster";
import { convert } from "./commands/convert";
import { doctor } from "./commands/doctor";
import { formats } from "./commands/formats";
import { info } from "./commands/info";
import { worker } from "./commands/worker";

program
  .name("mdconvert")
  .version(
    JSON.parse(
      fs.readFileSync(path.join(__dirname, "../package.json"), {
        encoding: "utf-8",
      }),
    ).version,
  )
  .option("--config <path>", "Config file (defaults to ./mdconvert.config.json, then ~/.mdconvert/config.json)")
  .option("-v, --verbose", "Debug logging")
  .option("--log-json", "Log as JSON lines");

program.addCommand(convert, { isDefault: true });
program.addCommand(batch);
program.addCommand(cluster);
program.addCommand(worker);
program.addCommand(formats);
program.addCommand(info);
program.addCommand(doctor);

program.parse();
