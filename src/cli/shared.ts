import type { Config } from "../config/schema.js";
import { validateConfig } from "../config/schema.js";
import { ConfigError } from "../core/errors.js";
import { OpenAICompatibleProvider } from "../providers/openai.js";
import type { ProbeClient } from "../providers/types.js";

export interface CliOptions {
	apiBase?: string;
	apiKey?: string;
	timeoutMs?: number;
	parallel?: boolean;
	json?: boolean;
	verbose?: boolean;
	help?: boolean;
}

export interface ParsedArgs {
	command: string;
	args: string[];
	options: CliOptions;
}

export class UsageError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "UsageError";
	}
}

function requireValue(flag: string, value: string | undefined): string {
	if (value === undefined || value.startsWith("-")) {
		throw new UsageError(`${flag} requires a value`);
	}
	return value;
}

export function parseArgs(args: string[] = process.argv.slice(2)): ParsedArgs {
	const options: CliOptions = {};
	const positionalArgs: string[] = [];

	for (let i = 0; i < args.length; i++) {
		const arg = args[i] ?? "";
		switch (arg) {
			case "--help":
			case "-h":
				options.help = true;
				break;
			case "--api-base":
				options.apiBase = requireValue(arg, args[++i]);
				break;
			case "--api-key":
				options.apiKey = requireValue(arg, args[++i]);
				break;
			case "--timeout": {
				const value = requireValue(arg, args[++i]);
				const timeoutMs = Number(value);
				if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
					throw new UsageError(`--timeout expects a positive number of milliseconds, got "${value}"`);
				}
				options.timeoutMs = timeoutMs;
				break;
			}
			case "--parallel":
				options.parallel = true;
				break;
			case "--json":
				options.json = true;
				break;
			case "-v":
			case "--verbose":
				options.verbose = true;
				break;
			default:
				if (arg.startsWith("-")) {
					throw new UsageError(`Unknown option: ${arg}`);
				}
				positionalArgs.push(arg);
		}
	}

	return {
		command: positionalArgs[0] || "probe",
		args: positionalArgs.slice(1),
		options,
	};
}

/**
 * Layer command-line flags over the loaded config and validate the result.
 */
export function resolveConfig(config: Config, options: CliOptions): Config {
	const resolved: Config = {
		...config,
		...(options.apiBase !== undefined ? { apiBase: options.apiBase } : {}),
		...(options.apiKey !== undefined ? { apiKey: options.apiKey } : {}),
		...(options.timeoutMs !== undefined ? { timeoutMs: options.timeoutMs } : {}),
		...(options.parallel ? { parallel: true } : {}),
	};

	const errors = validateConfig(resolved);
	if (errors.length > 0) {
		const errorMessages = errors.map((e) => `  - ${e.field}: ${e.message}`).join("\n");
		throw new ConfigError(`Invalid options:\n${errorMessages}`);
	}
	return resolved;
}

export function createProbeClient(config: Config): ProbeClient {
	if (!config.apiKey) {
		throw new ConfigError("API key not configured. Set apiKey in config, the OPENAI_API_KEY env var, or pass --api-key");
	}
	return new OpenAICompatibleProvider({
		apiKey: config.apiKey,
		baseUrl: config.apiBase,
		timeoutMs: config.timeoutMs,
	});
}
