import { getConfigPath, loadConfig } from "../config/loader.js";
import { errorText } from "../core/errors.js";
import { logger } from "../utils/logger.js";
import { handleConfig } from "./handlers/config.js";
import { handleList } from "./handlers/list.js";
import { handleProbe } from "./handlers/probe.js";
import { type ParsedArgs, createProbeClient, parseArgs, resolveConfig } from "./shared.js";

export const HELP_TEXT = `model-probe - check which capabilities models on an OpenAI-compatible endpoint support

Usage:
  model-probe [command] [args] [options]

Commands:
  probe [model...]   Probe the given models, or every listed model (default)
  list               List the models the endpoint serves
  config             Show the effective configuration

Options:
  --api-base <url>   Endpoint base URL (default: $OPENAI_API_BASE or https://api.openai.com/v1)
  --api-key <key>    API key (default: $OPENAI_API_KEY)
  --timeout <ms>     Per-request timeout in milliseconds
  --parallel         Run independent probes and models concurrently
  --json             Print machine-readable JSON
  -v, --verbose      Show diagnostic details and debug logs
  -h, --help         Show this help

Config file: ~/.model-probe/config.yaml (or config.json)`;

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
	let parsed: ParsedArgs;
	try {
		parsed = parseArgs(argv);
	} catch (err) {
		console.error(`Error: ${errorText(err)}\n`);
		console.error(HELP_TEXT);
		return 1;
	}

	const { command, args, options } = parsed;

	if (options.help || command === "help") {
		console.log(HELP_TEXT);
		return 0;
	}

	const previousLevel = logger.level;
	if (options.verbose) {
		logger.setMinLevel("debug");
	}

	try {
		const config = resolveConfig(loadConfig(), options);

		switch (command) {
			case "config":
				handleConfig(config, getConfigPath());
				return 0;
			case "list":
				await handleList(createProbeClient(config), options);
				return 0;
			case "probe":
				await handleProbe(createProbeClient(config), config, args, options);
				return 0;
			default:
				console.error(`Unknown command: ${command}\n`);
				console.error(HELP_TEXT);
				return 1;
		}
	} catch (err) {
		console.error(`Error: ${errorText(err)}`);
		return 1;
	} finally {
		logger.setMinLevel(previousLevel);
	}
}
