export {
  HubError,
  ConfigError,
  ManifestError,
  SchemaViolation,
  ManifestDirectoryError,
  PatternError,
  InvalidStateTransition,
  CrossTypeComparisonError,
  errorToString,
} from "./errors.ts";
export { getLogger, reinitLogger } from "./logger.ts";
export { shortId } from "./id.ts";
export { getSettings, setSettings, resetSettings, SettingsSchema } from "./config.ts";
export type { Settings, PatternsConfig } from "./config.ts";
