import type OpenAI from "openai";
import type { z } from "zod";

export type ChatMessage = OpenAI.Chat.ChatCompletionMessageParam;
export type ToolDefinition = OpenAI.Chat.ChatCompletionTool;
export type AssistantMessage = OpenAI.Chat.ChatCompletionMessage;

export interface ChatRequest {
	model: string;
	messages: ChatMessage[];
	tools?: ToolDefinition[];
}

export interface ParseRequest<T extends z.ZodTypeAny> {
	model: string;
	messages: ChatMessage[];
	schema: T;
	schemaName: string;
}

export interface ModelInfo {
	id: string;
}

/**
 * Transport bound to one endpoint and credential. Implementations must be
 * safe for several requests in flight at once.
 */
export interface ProbeClient {
	readonly apiBase: string;
	createChatCompletion(request: ChatRequest): Promise<AssistantMessage>;
	parseChatCompletion<T extends z.ZodTypeAny>(request: ParseRequest<T>): Promise<z.infer<T>>;
	listModels(): Promise<ModelInfo[]>;
}
