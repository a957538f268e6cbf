export { HELP_TEXT, main } from "./main.js";
export { createProbeClient, parseArgs, resolveConfig } from "./shared.js";
export type { CliOptions, ParsedArgs } from "./shared.js";
