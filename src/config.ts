import * as os from "node:os";
import * as path from "node:path";

export const ENV_PREFIX = "MDCONVERT_";

export const HARD_CAP_WORKERS = 8;

export const DEFAULT_MAX_WORKERS = (() => {
  const cores = os.cpus().length || 1;
  return Math.max(1, Math.min(HARD_CAP_WORKERS, cores));
})();

const HOME = os.homedir();
const GLOBAL_ROOT = path.join(HOME, ".mdconvert");

export const PATHS = {
  globalRoot: GLOBAL_ROOT,
  globalConfig: path.join(GLOBAL_ROOT, "config.json"),
  localConfigName: "mdconvert.config.json",
};

export const IGNORE_FILES = [".gitignore", ".mdconvertignore"];

// Child processes receive their resolved settings through this variable.
export const WORKER_SETTINGS_ENV = `${ENV_PREFIX}WORKER_SETTINGS`;

export const FORCE_KILL_GRACE_MS = 200;

export const MAX_OUTPUT_NAME_ATTEMPTS = 1000;

export const SNIFF_BYTES = 8;
