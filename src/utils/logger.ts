export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

/**
 * Tagged logger writing to stderr so stdout stays clean for results.
 *
 * @example
 * ```typescript
 * logger.debug("[ModelProber]", "Chat probe started", { model });
 * ```
 */
export class Logger {
	private _minLevel: LogLevel;

	constructor(minLevel: LogLevel = "warn") {
		this._minLevel = minLevel;
	}

	get level(): LogLevel {
		return this._minLevel;
	}

	setMinLevel(level: LogLevel): void {
		this._minLevel = level;
	}

	debug(tag: string, message: string, data?: unknown): void {
		this._log("debug", tag, message, data);
	}

	info(tag: string, message: string, data?: unknown): void {
		this._log("info", tag, message, data);
	}

	warn(tag: string, message: string, data?: unknown): void {
		this._log("warn", tag, message, data);
	}

	error(tag: string, message: string, data?: unknown): void {
		this._log("error", tag, message, data);
	}

	private _log(level: LogLevel, tag: string, message: string, data?: unknown): void {
		if (LEVELS[level] < LEVELS[this._minLevel]) return;

		const suffix = data === undefined ? "" : ` ${formatData(data)}`;
		console.error(`${tag} ${message}${suffix}`);
	}
}

function formatData(data: unknown): string {
	if (data instanceof Error) return data.message;
	if (typeof data === "string") return data;
	try {
		return JSON.stringify(data);
	} catch {
		return String(data);
	}
}

export const logger = new Logger();
