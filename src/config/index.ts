export {
  loadConfig,
  parseConfigText,
  resolveConfigPath,
  applyConfigDefaults,
  defaultConfig,
  CONFIG_PATH_ENV,
  DEFAULT_HOST,
  DEFAULT_PORT,
  type ConfigLoadResult,
} from "./loader";
export { replaceEnvVars } from "./env";
export {
  RelayConfigSchema,
  type RelayConfig,
  type AgentsConfig,
  type ChatBackendConfig,
  type ConversationsConfig,
  type AuthConfig,
  type ServerConfig,
} from "./schema";
