export * from "./defaults.js";
export {
  type ConfigLayer,
  findProjectConfig,
  type LoadConfigOptions,
  loadConfig,
  mergeConfigLayers,
  parseEnvConfig,
  readConfigFile,
} from "./loader.js";
export {
  LogLevelSchema,
  type PartialServerConfig,
  PartialServerConfigSchema,
  type ServerConfig,
  ServerConfigSchema,
  THEMES,
  type Theme,
  ThemeSchema,
} from "./schema.js";
