export { DEFAULT_API_BASE, OpenAICompatibleProvider } from "./openai.js";
export type { OpenAICompatibleProviderConfig } from "./openai.js";
export type {
	AssistantMessage,
	ChatMessage,
	ChatRequest,
	ModelInfo,
	ParseRequest,
	ProbeClient,
	ToolDefinition,
} from "./types.js";
