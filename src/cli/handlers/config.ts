import type { Config } from "../../config/schema.js";

export function maskSecret(secret: string): string {
	return secret.length <= 8 ? "****" : `${secret.slice(0, 4)}...${secret.slice(-4)}`;
}

export function handleConfig(config: Config, configPath: string | undefined): void {
	console.log("Current Configuration:");
	console.log(`  Config File: ${configPath ?? "none (defaults)"}`);
	console.log(`  API Base: ${config.apiBase}`);
	console.log(`  API Key: ${config.apiKey ? maskSecret(config.apiKey) : "not configured"}`);
	console.log(`  Timeout: ${config.timeoutMs ? `${config.timeoutMs}ms` : "client default"}`);
	console.log(`  Parallel: ${config.parallel ? "yes" : "no"}`);
	if (config.visionImageUrl) {
		console.log(`  Vision Image: ${config.visionImageUrl}`);
	}
}
