export { DotenvSource, type DotenvSourceOptions } from "./adapters/dotenv/dotenv-source"
export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export { JsonSource, type JsonSourceOptions } from "./adapters/json/json-source"
export { checkKeysNotMissing } from "./core/check-keys"
export { envStringToDict } from "./core/env-string"
export { type LoadConfigFromPathOptions, loadConfigFromPath } from "./core/load-config"
export {
  type LoadConfigFromEnvOptions,
  type LoadIdFromEnvOptions,
  loadConfigFromEnv,
  loadIdFromEnv,
} from "./core/load-from-env"
export { type MergedSources, mergeSources } from "./core/merge-sources"
export {
  isJsonObject,
  type JsonObject,
  type JsonValue,
  jsonObjectSchema,
  jsonValueSchema,
} from "./ports/json"
export type { ConfigSource } from "./ports/source"
