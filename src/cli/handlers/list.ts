import { listModelIds } from "../../core/models.js";
import type { ProbeClient } from "../../providers/types.js";
import type { CliOptions } from "../shared.js";

export async function handleList(client: ProbeClient, options: CliOptions): Promise<void> {
	const modelIds = await listModelIds(client);

	if (options.json) {
		console.log(JSON.stringify(modelIds, null, 2));
		return;
	}

	if (modelIds.length === 0) {
		console.log(`No models available at ${client.apiBase}`);
		return;
	}

	for (const modelId of modelIds) {
		console.log(modelId);
	}
}
