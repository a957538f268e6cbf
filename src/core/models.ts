import type { ProbeClient } from "../providers/types.js";

/**
 * Model identifiers in the order the endpoint returns them. Transport errors
 * propagate: there is no partial listing to fall back on.
 */
export async function listModelIds(client: ProbeClient): Promise<string[]> {
	const models = await client.listModels();
	return models.map((model) => model.id);
}
