export {
  loadSettings,
  readConfigFile,
  readEnvSettings,
  resolveConfigPath,
  validateSettings,
  type LoadSettingsOptions,
} from "./loader";
export {
  defaultSettings,
  SettingsSchema,
  type Settings,
  type SettingsInput,
} from "./schema";
