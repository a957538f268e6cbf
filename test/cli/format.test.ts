import { describe, expect, it } from "vitest";
import { formatResult, formatResultsJson, formatSummary } from "../../src/cli/format.js";
import type { ProbeResult } from "../../src/core/capabilities.js";

const chatOnly: ProbeResult = {
	modelId: "gpt-4",
	apiBase: "https://test.api/v1",
	capabilities: {
		supportsChat: true,
		supportsFunctionCalling: false,
		supportsStructuredOutput: true,
		supportsVision: false,
		details: ["Chat completion: content='Hi', role='assistant'", "Vision failed: 400 image input\nnot supported"],
	},
};

const noChat: ProbeResult = {
	modelId: "text-embedding-3-small",
	apiBase: "https://test.api/v1",
	capabilities: {
		supportsChat: false,
		supportsFunctionCalling: false,
		supportsStructuredOutput: false,
		supportsVision: false,
		details: ["Chat completion failed: Chat not supported"],
	},
};

describe("formatResult()", () => {
	it("should mark each capability", () => {
		expect(formatResult(chatOnly)).toBe(
			[
				"gpt-4 (https://test.api/v1)",
				"  [✓] Chat",
				"  [✗] Function Calling",
				"  [✓] Structured Output",
				"  [✗] Vision",
			].join("\n"),
		);
	});

	it("should indent every line of the details when verbose", () => {
		const lines = formatResult(chatOnly, true).split("\n");

		expect(lines.slice(5)).toEqual([
			"  Details:",
			"    Chat completion: content='Hi', role='assistant'",
			"    Vision failed: 400 image input",
			"    not supported",
		]);
	});
});

describe("formatSummary()", () => {
	it("should count supporting models per capability", () => {
		expect(formatSummary([chatOnly, noChat])).toBe(
			"Probed 2 models (Chat: 1, Function Calling: 0, Structured Output: 1, Vision: 0)",
		);
	});

	it("should use the singular for one model", () => {
		expect(formatSummary([noChat])).toBe("Probed 1 model (Chat: 0, Function Calling: 0, Structured Output: 0, Vision: 0)");
	});
});

describe("formatResultsJson()", () => {
	it("should serialize results as they are", () => {
		expect(JSON.parse(formatResultsJson([noChat]))).toEqual([noChat]);
	});
});
