import type { Config } from "../../config/schema.js";
import { listModelIds } from "../../core/models.js";
import { ModelProber } from "../../core/prober.js";
import type { ProbeClient } from "../../providers/types.js";
import { logger } from "../../utils/logger.js";
import { formatResult, formatResultsJson, formatSummary } from "../format.js";
import type { CliOptions } from "../shared.js";

export async function handleProbe(
	client: ProbeClient,
	config: Config,
	modelIds: string[],
	options: CliOptions,
): Promise<void> {
	const targets = modelIds.length > 0 ? modelIds : await listModelIds(client);

	if (targets.length === 0) {
		if (options.json) {
			console.log("[]");
		} else {
			console.log(`No models available at ${client.apiBase}`);
		}
		return;
	}

	const prober = new ModelProber(client, {
		parallel: config.parallel,
		visionImageUrl: config.visionImageUrl,
		logger,
	});

	if (options.json) {
		const results = await prober.probeAll(targets);
		console.log(formatResultsJson(results));
		return;
	}

	const noun = targets.length === 1 ? "model" : "models";
	console.log(`Probing ${targets.length} ${noun} at ${client.apiBase}\n`);

	const results = await prober.probeAll(targets, (result) => {
		console.log(`${formatResult(result, options.verbose)}\n`);
	});

	if (results.length > 1) {
		console.log(formatSummary(results));
	}
}
