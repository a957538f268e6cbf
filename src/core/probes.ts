import { z } from "zod";
import type { ProbeClient, ToolDefinition } from "../providers/types.js";
import type { Capability, ProbeOutcome } from "./capabilities.js";
import { errorText } from "./errors.js";
import { renderFields, renderMessage } from "./render.js";

export interface CapabilityProbe {
	capability: Capability;
	title: string;
	/** Resolves with the rendered response; rejects when the capability is missing */
	run(client: ProbeClient, model: string): Promise<string>;
}

export const WEATHER_TOOL: ToolDefinition = {
	type: "function",
	function: {
		name: "get_weather",
		description: "Get the current weather in a given location",
		parameters: {
			type: "object",
			properties: {
				location: {
					type: "string",
					description: "The city and state, e.g. San Francisco, CA",
				},
				unit: { type: "string", enum: ["celsius", "fahrenheit"] },
			},
			required: ["location"],
		},
	},
};

export const CalendarEvent = z.object({
	name: z.string(),
	date: z.string(),
	participants: z.array(z.string()),
});

export type CalendarEvent = z.infer<typeof CalendarEvent>;

// 1x1 PNG
export const DEFAULT_IMAGE_URL =
	"data:image/png;base64,iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAYAAAAfFcSJAAAADUlEQVR42mP8z8DwHwAFBQIAX8jx0gAAAABJRU5ErkJggg==";

export const chatProbe: CapabilityProbe = {
	capability: "chat",
	title: "Chat completion",
	async run(client, model) {
		const message = await client.createChatCompletion({
			model,
			messages: [{ role: "user", content: "Hello! Please reply with a short greeting." }],
		});
		return renderMessage(message);
	},
};

// Any completed call counts, even a plain text reply that ignores the tool.
export const functionCallingProbe: CapabilityProbe = {
	capability: "functionCalling",
	title: "Function calling",
	async run(client, model) {
		const message = await client.createChatCompletion({
			model,
			messages: [{ role: "user", content: "What's the weather like in Boston today?" }],
			tools: [WEATHER_TOOL],
		});
		return renderMessage(message);
	},
};

export const structuredOutputProbe: CapabilityProbe = {
	capability: "structuredOutput",
	title: "Structured output",
	async run(client, model) {
		const event = await client.parseChatCompletion({
			model,
			messages: [
				{ role: "system", content: "Extract the event information." },
				{ role: "user", content: "Alice and Bob are going to a science fair on Friday." },
			],
			schema: CalendarEvent,
			schemaName: "event",
		});
		return renderFields(event);
	},
};

export function createVisionProbe(imageUrl: string = DEFAULT_IMAGE_URL): CapabilityProbe {
	return {
		capability: "vision",
		title: "Vision",
		async run(client, model) {
			const message = await client.createChatCompletion({
				model,
				messages: [
					{
						role: "user",
						content: [
							{ type: "text", text: "What's in this image? Answer in one sentence." },
							{ type: "image_url", image_url: { url: imageUrl } },
						],
					},
				],
			});
			return renderMessage(message);
		},
	};
}

export async function runProbe(probe: CapabilityProbe, client: ProbeClient, model: string): Promise<ProbeOutcome> {
	try {
		return { ok: true, text: await probe.run(client, model) };
	} catch (err) {
		return { ok: false, error: errorText(err) };
	}
}

export function describeOutcome(probe: CapabilityProbe, outcome: ProbeOutcome): string {
	return outcome.ok ? `${probe.title}: ${outcome.text}` : `${probe.title} failed: ${outcome.error}`;
}
