export * from "./core/index.js";
export { loadConfig, validateConfig } from "./config/index.js";
export type { Config, ConfigValidationError } from "./config/index.js";
export { DEFAULT_API_BASE, OpenAICompatibleProvider } from "./providers/index.js";
export type {
	AssistantMessage,
	ChatMessage,
	ChatRequest,
	ModelInfo,
	OpenAICompatibleProviderConfig,
	ParseRequest,
	ProbeClient,
	ToolDefinition,
} from "./providers/index.js";
export { Logger, logger } from "./utils/logger.js";
export type { LogLevel } from "./utils/logger.js";
