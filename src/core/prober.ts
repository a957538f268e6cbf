import type { ProbeClient } from "../providers/types.js";
import { type Logger, logger as defaultLogger } from "../utils/logger.js";
import type { Capability, ModelCapabilities, ProbeOutcome, ProbeResult } from "./capabilities.js";
import {
	type CapabilityProbe,
	chatProbe,
	createVisionProbe,
	describeOutcome,
	functionCallingProbe,
	runProbe,
	structuredOutputProbe,
} from "./probes.js";

export interface ModelProberOptions {
	/** Issue the probes that follow a successful chat probe concurrently, and probe models concurrently */
	parallel?: boolean;
	visionImageUrl?: string;
	logger?: Logger;
}

const TAG = "[ModelProber]";

/**
 * Runs the capability probes for a model against one endpoint.
 *
 * The chat probe runs first; if it fails nothing else is attempted. The
 * remaining probes do not depend on each other, and their diagnostic blocks
 * are always assembled in declaration order whatever order they finish in.
 */
export class ModelProber {
	private _client: ProbeClient;
	private _parallel: boolean;
	private _logger: Logger;
	private _featureProbes: CapabilityProbe[];

	constructor(client: ProbeClient, options: ModelProberOptions = {}) {
		this._client = client;
		this._parallel = options.parallel ?? false;
		this._logger = options.logger ?? defaultLogger;
		this._featureProbes = [functionCallingProbe, structuredOutputProbe, createVisionProbe(options.visionImageUrl)];
	}

	async probe(modelId: string): Promise<ProbeResult> {
		const flags: Record<Capability, boolean> = {
			chat: false,
			functionCalling: false,
			structuredOutput: false,
			vision: false,
		};
		const details: string[] = [];

		const record = (probe: CapabilityProbe, outcome: ProbeOutcome): void => {
			flags[probe.capability] = outcome.ok;
			details.push(describeOutcome(probe, outcome));
		};

		const chat = await this._run(chatProbe, modelId);
		record(chatProbe, chat);

		if (chat.ok) {
			if (this._parallel) {
				const outcomes = await Promise.all(this._featureProbes.map((probe) => this._run(probe, modelId)));
				this._featureProbes.forEach((probe, i) => {
					const outcome = outcomes[i];
					if (outcome) record(probe, outcome);
				});
			} else {
				for (const probe of this._featureProbes) {
					record(probe, await this._run(probe, modelId));
				}
			}
		} else {
			this._logger.debug(TAG, `Skipping remaining probes for ${modelId}: chat probe failed`);
		}

		const capabilities: ModelCapabilities = {
			supportsChat: flags.chat,
			supportsFunctionCalling: flags.functionCalling,
			supportsStructuredOutput: flags.structuredOutput,
			supportsVision: flags.vision,
			details: Object.freeze(details),
		};

		return Object.freeze({
			modelId,
			apiBase: this._client.apiBase,
			capabilities: Object.freeze(capabilities),
		});
	}

	/**
	 * Probe several models. Results keep the order of `modelIds`; `onResult`
	 * fires as each model finishes.
	 */
	async probeAll(modelIds: string[], onResult?: (result: ProbeResult) => void): Promise<ProbeResult[]> {
		if (this._parallel) {
			return Promise.all(
				modelIds.map(async (modelId) => {
					const result = await this.probe(modelId);
					onResult?.(result);
					return result;
				}),
			);
		}

		const results: ProbeResult[] = [];
		for (const modelId of modelIds) {
			const result = await this.probe(modelId);
			onResult?.(result);
			results.push(result);
		}
		return results;
	}

	private async _run(probe: CapabilityProbe, modelId: string): Promise<ProbeOutcome> {
		this._logger.debug(TAG, `${probe.title} probe started for ${modelId}`);
		const outcome = await runProbe(probe, this._client, modelId);
		if (outcome.ok) {
			this._logger.debug(TAG, `${probe.title} probe passed for ${modelId}`);
		} else {
			this._logger.debug(TAG, `${probe.title} probe failed for ${modelId}`, outcome.error);
		}
		return outcome;
	}
}
