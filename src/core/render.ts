import type { AssistantMessage } from "../providers/types.js";

// Endpoints do not always send every field the SDK types promise.
interface FunctionInvocation {
	name?: string;
	arguments?: string;
}

function quote(value: string): string {
	return `'${value.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}'`;
}

/**
 * Render a value as `'text'`, `[a, b]` or `{key=value}` so diagnostic blocks
 * stay on one line and read the same for every endpoint.
 */
export function renderValue(value: unknown): string {
	if (value === null || value === undefined) return "None";
	if (typeof value === "string") return quote(value);
	if (Array.isArray(value)) return `[${value.map(renderValue).join(", ")}]`;
	if (typeof value === "object") return `{${renderFields(value)}}`;
	return String(value);
}

export function renderFields(value: object): string {
	return Object.entries(value)
		.map(([key, field]) => `${key}=${renderValue(field)}`)
		.join(", ");
}

function renderInvocation(invocation: FunctionInvocation | undefined): string {
	return `${invocation?.name ?? "None"}(${invocation?.arguments ?? ""})`;
}

export function renderMessage(message: AssistantMessage): string {
	const fields = [`content=${renderValue(message.content)}`, `role=${renderValue(message.role)}`];

	if (message.refusal) {
		fields.push(`refusal=${quote(message.refusal)}`);
	}
	if (message.function_call) {
		fields.push(`function_call=${renderInvocation(message.function_call)}`);
	}
	if (message.tool_calls?.length) {
		const calls = message.tool_calls.map((call) => renderInvocation(call.function));
		fields.push(`tool_calls=[${calls.join(", ")}]`);
	}

	return fields.join(", ");
}
