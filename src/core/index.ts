export { CAPABILITIES, CAPABILITY_FLAGS, CAPABILITY_LABELS } from "./capabilities.js";
export type { Capability, ModelCapabilities, ProbeOutcome, ProbeResult } from "./capabilities.js";
export { ConfigError, EmptyResponseError, ProbeError, StructuredOutputError, errorText } from "./errors.js";
export { listModelIds } from "./models.js";
export { ModelProber } from "./prober.js";
export type { ModelProberOptions } from "./prober.js";
export {
	CalendarEvent,
	DEFAULT_IMAGE_URL,
	WEATHER_TOOL,
	chatProbe,
	createVisionProbe,
	functionCallingProbe,
	runProbe,
	structuredOutputProbe,
} from "./probes.js";
export type { CapabilityProbe } from "./probes.js";
export { renderFields, renderMessage, renderValue } from "./render.js";
