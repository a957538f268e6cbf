import { type Server, createServer } from "node:http";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { ModelProber } from "../../src/core/prober.js";
import { OpenAICompatibleProvider } from "../../src/providers/openai.js";
import { Logger } from "../../src/utils/logger.js";

const pending = new Set<NodeJS.Timeout>();
let server: Server;
let apiBase: string;

beforeAll(async () => {
	// Answers well after the client's timeout.
	server = createServer((_req, res) => {
		const timer = setTimeout(() => {
			pending.delete(timer);
			res.writeHead(200, { "content-type": "application/json" });
			res.end(JSON.stringify({ choices: [] }));
		}, 500);
		pending.add(timer);
	});
	await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
	const address = server.address();
	if (address === null || typeof address === "string") {
		throw new Error("Test server is not listening on a TCP port");
	}
	apiBase = `http://127.0.0.1:${address.port}/v1`;
});

afterAll(async () => {
	for (const timer of pending) clearTimeout(timer);
	server.closeAllConnections();
	await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
});

describe("OpenAICompatibleProvider timeouts", () => {
	it("should record a timed out chat request as missing chat support", async () => {
		const provider = new OpenAICompatibleProvider({ apiKey: "test-key", baseUrl: apiBase, timeoutMs: 50 });
		const prober = new ModelProber(provider, { logger: new Logger("error") });

		const result = await prober.probe("gpt-4");

		expect(result.capabilities).toEqual({
			supportsChat: false,
			supportsFunctionCalling: false,
			supportsStructuredOutput: false,
			supportsVision: false,
			details: ["Chat completion failed: Request timed out."],
		});
	});
});
