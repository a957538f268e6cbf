import { CAPABILITIES, CAPABILITY_FLAGS, CAPABILITY_LABELS } from "../core/capabilities.js";
import type { ProbeResult } from "../core/capabilities.js";

const capabilityCheck = (supported: boolean): string => (supported ? "[✓]" : "[✗]");

function indent(text: string, prefix: string): string {
	return text
		.split("\n")
		.map((line) => `${prefix}${line}`)
		.join("\n");
}

export function formatResult(result: ProbeResult, verbose = false): string {
	const lines = [`${result.modelId} (${result.apiBase})`];

	for (const capability of CAPABILITIES) {
		const supported = result.capabilities[CAPABILITY_FLAGS[capability]];
		lines.push(`  ${capabilityCheck(supported)} ${CAPABILITY_LABELS[capability]}`);
	}

	if (verbose) {
		lines.push("  Details:");
		for (const block of result.capabilities.details) {
			lines.push(indent(block, "    "));
		}
	}

	return lines.join("\n");
}

export function formatSummary(results: readonly ProbeResult[]): string {
	const counts = CAPABILITIES.map((capability) => {
		const count = results.filter((r) => r.capabilities[CAPABILITY_FLAGS[capability]]).length;
		return `${CAPABILITY_LABELS[capability]}: ${count}`;
	});
	const noun = results.length === 1 ? "model" : "models";
	return `Probed ${results.length} ${noun} (${counts.join(", ")})`;
}

export function formatResultsJson(results: readonly ProbeResult[]): string {
	return JSON.stringify(results, null, 2);
}
