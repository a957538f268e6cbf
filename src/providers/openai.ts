import OpenAI from "openai";
import { zodResponseFormat } from "openai/helpers/zod";
import type { z } from "zod";
import { EmptyResponseError, StructuredOutputError } from "../core/errors.js";
import type { AssistantMessage, ChatRequest, ModelInfo, ParseRequest, ProbeClient } from "./types.js";

export const DEFAULT_API_BASE = "https://api.openai.com/v1";

export interface OpenAICompatibleProviderConfig {
	apiKey: string;
	baseUrl?: string;
	/** Per-request timeout in milliseconds */
	timeoutMs?: number;
}

export class OpenAICompatibleProvider implements ProbeClient {
	readonly apiBase: string;
	private _client: OpenAI;

	constructor(config: OpenAICompatibleProviderConfig) {
		this.apiBase = config.baseUrl ?? DEFAULT_API_BASE;
		this._client = new OpenAI({
			apiKey: config.apiKey,
			baseURL: this.apiBase,
			timeout: config.timeoutMs,
			// Probes are never retried.
			maxRetries: 0,
		});
	}

	async createChatCompletion(request: ChatRequest): Promise<AssistantMessage> {
		const response = await this._client.chat.completions.create({
			model: request.model,
			messages: request.messages,
			tools: request.tools?.length ? request.tools : undefined,
		});

		const message = response.choices[0]?.message;
		if (!message) {
			throw new EmptyResponseError(request.model);
		}
		return message;
	}

	async parseChatCompletion<T extends z.ZodTypeAny>(request: ParseRequest<T>): Promise<z.infer<T>> {
		const completion = await this._client.beta.chat.completions.parse<
			OpenAI.Chat.ChatCompletionCreateParamsNonStreaming,
			z.infer<T>
		>({
			model: request.model,
			messages: request.messages,
			response_format: zodResponseFormat(request.schema, request.schemaName),
		});

		const message = completion.choices[0]?.message;
		if (!message) {
			throw new EmptyResponseError(request.model);
		}
		if (message.refusal) {
			throw new StructuredOutputError("Model refused the structured request", message.refusal);
		}
		if (message.parsed === null || message.parsed === undefined) {
			throw new StructuredOutputError("Response did not contain a parsed object");
		}
		return message.parsed;
	}

	async listModels(): Promise<ModelInfo[]> {
		const page = await this._client.models.list();
		return page.data.map((model) => ({ id: model.id }));
	}
}
