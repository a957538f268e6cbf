/**
 * Error types raised by the probe transport and configuration layer.
 * Probe failures are folded into results; only configuration and
 * enumeration errors reach the CLI.
 */

export class ProbeError extends Error {
	constructor(
		message: string,
		public readonly code: string,
		public readonly details?: unknown,
	) {
		super(message);
		this.name = "ProbeError";
	}
}

export class EmptyResponseError extends ProbeError {
	constructor(model: string) {
		super(`Response for ${model} contained no choices`, "EMPTY_RESPONSE", { model });
		this.name = "EmptyResponseError";
	}
}

export class StructuredOutputError extends ProbeError {
	constructor(reason: string, refusal?: string) {
		super(refusal ? `${reason}: ${refusal}` : reason, "STRUCTURED_OUTPUT", { refusal });
		this.name = "StructuredOutputError";
	}
}

export class ConfigError extends ProbeError {
	constructor(message: string) {
		super(message, "CONFIG_ERROR");
		this.name = "ConfigError";
	}
}

/**
 * Text representation of anything a transport call may throw.
 */
export function errorText(err: unknown): string {
	if (err instanceof Error) {
		return err.message || err.name;
	}
	return String(err);
}
