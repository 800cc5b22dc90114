// ============================================
// Config Module - Barrel Export
// ============================================

export {
  agentOptionsFromConfig,
  loggerFromConfig,
  policyFromConfig,
  resolveWorkingDir,
} from "./factory.js";
export {
  type ConfigError,
  type ConfigErrorCode,
  deepMerge,
  findProjectConfig,
  getGlobalConfigPath,
  type LoadConfigOptions,
  loadConfig,
  parseEnvConfig,
} from "./loader.js";
export {
  type AgentSettings,
  AgentSettingsSchema,
  type Config,
  ConfigSchema,
  type LogFormat,
  LogFormatSchema,
  HookSettingsSchema,
  LogLevelSchema,
  type PartialConfig,
} from "./schema.js";
