export { loadConfig, resolveConfigPath, type ConfigLoadResult } from "./loader";
export { expandEnvReferences, type UnresolvedEnvReference } from "./env";
export {
  RtmbotConfigSchema,
  type HistoryConfig,
  type RtmbotConfig,
  type SlackConfig,
} from "./schema";
