import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { parse as parseYaml } from "yaml";
import { ConfigError } from "../core/errors.js";
import { DEFAULT_API_BASE } from "../providers/openai.js";
import type { Config } from "./schema.js";
import { configSchema, validateConfig } from "./schema.js";

export const CONFIG_DIR = join(homedir(), ".model-probe");

export function getYamlPath(): string {
	return process.env.MODEL_PROBE_CONFIG_YAML ?? join(CONFIG_DIR, "config.yaml");
}

export function getJsonPath(): string {
	return process.env.MODEL_PROBE_CONFIG_JSON ?? join(CONFIG_DIR, "config.json");
}

export function getConfigPath(): string | undefined {
	const yamlPath = getYamlPath();
	if (existsSync(yamlPath)) return yamlPath;
	const jsonPath = getJsonPath();
	return existsSync(jsonPath) ? jsonPath : undefined;
}

function getDefaultConfig(): Config {
	return {
		apiBase: DEFAULT_API_BASE,
		parallel: false,
	};
}

function interpolateEnvVars(value: string): string {
	return value.replace(/\$\{([^}]+)\}/g, (_, envVar: string) => {
		const envValue = process.env[envVar];
		if (!envValue) {
			throw new ConfigError(`Environment variable ${envVar} is not set`);
		}
		return envValue;
	});
}

function interpolateObject(obj: unknown): unknown {
	if (typeof obj === "string") return interpolateEnvVars(obj);
	if (obj === null || typeof obj !== "object") return obj;
	if (Array.isArray(obj)) return obj.map((item) => interpolateObject(item));

	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		result[key] = interpolateObject(value);
	}
	return result;
}

function readConfigFile(path: string): Record<string, unknown> {
	const content = readFileSync(path, "utf-8");
	const parsed: unknown = path.endsWith(".json") ? JSON.parse(content) : parseYaml(content);
	if (parsed === null || parsed === undefined) return {};
	if (typeof parsed !== "object" || Array.isArray(parsed)) {
		throw new ConfigError(`Invalid config at ${path}:\n  - root: Config must be an object`);
	}
	return { ...parsed };
}

export function loadConfig(): Config {
	const configPath = getConfigPath();
	const configSource = configPath ?? "default config";
	const userConfig = configPath ? readConfigFile(configPath) : {};

	const merged: Record<string, unknown> = { ...getDefaultConfig() };
	for (const [key, value] of Object.entries(userConfig)) {
		merged[key] = interpolateObject(value);
	}

	const overrides: Array<{ key: keyof Config; envVars: string[]; parse?: (v: string) => number }> = [
		{ key: "apiKey", envVars: ["OPENAI_API_KEY"] },
		{ key: "apiBase", envVars: ["OPENAI_API_BASE", "OPENAI_BASE_URL"] },
		{ key: "timeoutMs", envVars: ["MODEL_PROBE_TIMEOUT_MS"], parse: (v) => Number(v) },
	];

	for (const override of overrides) {
		const envVar = override.envVars.find((name) => !!process.env[name]);
		const envValue = envVar ? process.env[envVar] : undefined;
		if (!envVar || !envValue) continue;
		if (override.parse) {
			const parsed = override.parse(envValue);
			if (!Number.isInteger(parsed) || parsed <= 0) {
				throw new ConfigError(`${envVar} must be a positive integer, got "${envValue}"`);
			}
			merged[override.key] = parsed;
		} else {
			merged[override.key] = envValue;
		}
	}

	const errors = validateConfig(merged);
	if (errors.length > 0) {
		const errorMessages = errors.map((e) => `  - ${e.field}: ${e.message}`).join("\n");
		throw new ConfigError(`Invalid config at ${configSource}:\n${errorMessages}`);
	}

	return configSchema.parse(merged);
}
