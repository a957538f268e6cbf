export { getConfigPath, loadConfig } from "./loader.js";
export type { Config, ConfigValidationError } from "./schema.js";
export { configSchema, validateConfig } from "./schema.js";
