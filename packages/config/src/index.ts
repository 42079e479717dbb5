export { DotenvSource, type DotenvSourceOptions } from "./adapters/dotenv-source"
export { EnvSource, type EnvSourceOptions } from "./adapters/env-source"
export type { FileSourceOptions } from "./adapters/file-source"
export { JsonSource } from "./adapters/json-source"
export { ObjectSource } from "./adapters/object-source"
export { Config } from "./core/config"
export { ConfigValidationError, type LoadConfigOptions, loadConfig } from "./core/load"
export type { IConfig } from "./ports/config"
export type { ConfigSource } from "./ports/source"
