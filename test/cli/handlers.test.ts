import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from "vitest";
import { handleConfig, maskSecret } from "../../src/cli/handlers/config.js";
import { handleList } from "../../src/cli/handlers/list.js";
import { handleProbe } from "../../src/cli/handlers/probe.js";
import type { Config } from "../../src/config/schema.js";
import { MockProbeClient, assistantMessage } from "../fixtures/mock-client.js";

const config: Config = { apiBase: "https://test.api/v1", parallel: false };

let logSpy: MockInstance<typeof console.log>;

function logged(): string[] {
	return logSpy.mock.calls.map((call) => call.map(String).join(" "));
}

beforeEach(() => {
	logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
});

afterEach(() => {
	logSpy.mockRestore();
});

describe("handleList()", () => {
	it("should print one identifier per line", async () => {
		const client = new MockProbeClient({ models: { value: [{ id: "gpt-4" }, { id: "gpt-3.5-turbo" }] } });

		await handleList(client, {});

		expect(logged()).toEqual(["gpt-4", "gpt-3.5-turbo"]);
	});

	it("should print a JSON array", async () => {
		const client = new MockProbeClient({ models: { value: [{ id: "gpt-4" }] } });

		await handleList(client, { json: true });

		expect(logged()).toEqual([JSON.stringify(["gpt-4"], null, 2)]);
	});

	it("should say when the endpoint has no models", async () => {
		const client = new MockProbeClient({ models: { value: [] } });

		await handleList(client, {});

		expect(logged()).toEqual(["No models available at https://test.api/v1"]);
	});
});

describe("handleProbe()", () => {
	it("should probe the named models only", async () => {
		const client = new MockProbeClient({ chat: [{ error: "Chat not supported" }] });

		await handleProbe(client, config, ["text-embedding-3-small"], {});

		expect(client.listCalls).toBe(0);
		expect(logged()).toEqual([
			"Probing 1 model at https://test.api/v1\n",
			[
				"text-embedding-3-small (https://test.api/v1)",
				"  [✗] Chat",
				"  [✗] Function Calling",
				"  [✗] Structured Output",
				"  [✗] Vision",
				"",
			].join("\n"),
		]);
	});

	it("should probe every listed model and print a summary", async () => {
		const client = new MockProbeClient({
			models: { value: [{ id: "a" }, { id: "b" }] },
			chat: [{ error: "nope" }, { error: "nope" }],
		});

		await handleProbe(client, config, [], {});

		expect(client.listCalls).toBe(1);
		expect(logged().at(-1)).toBe("Probed 2 models (Chat: 0, Function Calling: 0, Structured Output: 0, Vision: 0)");
	});

	it("should print results as JSON", async () => {
		const client = new MockProbeClient({
			chat: [{ value: assistantMessage("Hi") }, { value: assistantMessage("Sunny") }, { value: assistantMessage("A pixel") }],
			parsed: [{ value: { name: "Fair", date: "Monday", participants: [] } }],
		});

		await handleProbe(client, config, ["gpt-4"], { json: true });

		const output = logged();
		expect(output).toHaveLength(1);
		const [result] = JSON.parse(output[0] ?? "[]");
		expect(result).toMatchObject({
			modelId: "gpt-4",
			apiBase: "https://test.api/v1",
			capabilities: {
				supportsChat: true,
				supportsFunctionCalling: true,
				supportsStructuredOutput: true,
				supportsVision: true,
			},
		});
		expect(result.capabilities.details[2]).toBe("Structured output: name='Fair', date='Monday', participants=[]");
	});

	it("should print an empty JSON array when there is nothing to probe", async () => {
		const client = new MockProbeClient({ models: { value: [] } });

		await handleProbe(client, config, [], { json: true });

		expect(logged()).toEqual(["[]"]);
	});

	it("should propagate enumeration failures", async () => {
		const client = new MockProbeClient({ models: { error: "404 Not Found" } });

		await expect(handleProbe(client, config, [], {})).rejects.toThrow("404 Not Found");
	});
});

describe("handleConfig()", () => {
	it("should mask the API key", () => {
		handleConfig({ ...config, apiKey: "test-secret-value", timeoutMs: 2000 }, "/tmp/config.yaml");

		expect(logged()).toEqual([
			"Current Configuration:",
			"  Config File: /tmp/config.yaml",
			"  API Base: https://test.api/v1",
			"  API Key: test...alue",
			"  Timeout: 2000ms",
			"  Parallel: no",
		]);
	});

	it("should fully mask short secrets", () => {
		expect(maskSecret("short")).toBe("****");
	});
});
