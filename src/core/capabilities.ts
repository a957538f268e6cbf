export type Capability = "chat" | "functionCalling" | "structuredOutput" | "vision";

/** Probe order: chat gates the rest */
export const CAPABILITIES: readonly Capability[] = ["chat", "functionCalling", "structuredOutput", "vision"];

export interface ModelCapabilities {
	supportsChat: boolean;
	supportsFunctionCalling: boolean;
	supportsStructuredOutput: boolean;
	supportsVision: boolean;
	/** One diagnostic block per attempted probe, in probe order */
	details: readonly string[];
}

export interface ProbeResult {
	modelId: string;
	/** Endpoint the probe ran against, kept for reporting */
	apiBase: string;
	capabilities: Readonly<ModelCapabilities>;
}

export type ProbeOutcome = { ok: true; text: string } | { ok: false; error: string };

export const CAPABILITY_FLAGS = {
	chat: "supportsChat",
	functionCalling: "supportsFunctionCalling",
	structuredOutput: "supportsStructuredOutput",
	vision: "supportsVision",
} as const satisfies Record<Capability, keyof ModelCapabilities>;

export const CAPABILITY_LABELS: Record<Capability, string> = {
	chat: "Chat",
	functionCalling: "Function Calling",
	structuredOutput: "Structured Output",
	vision: "Vision",
};
