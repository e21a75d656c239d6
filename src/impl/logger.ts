/**
 * Structured logger: one JSON object per line, level from LOG_LEVEL.
 *
 * Anything that accepts a logger takes the Logger interface, so callers can
 * pass their own.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
	debug(msg: string, ctx?: Record<string, unknown>): void;
	info(msg: string, ctx?: Record<string, unknown>): void;
	warn(msg: string, ctx?: Record<string, unknown>): void;
	error(msg: string, ctx?: Record<string, unknown>): void;
}

const LEVELS: Record<Exclude<LogLevel, "silent">, number> = {
	debug: 20,
	info: 30,
	warn: 40,
	error: 50,
};

const SENSITIVE_KEYS = new Set(["password", "secret", "token", "apikey"]);

export function isLogLevel(value: string): value is LogLevel {
	return (
		value === "silent" || Object.prototype.hasOwnProperty.call(LEVELS, value)
	);
}

function currentLevel(): LogLevel {
	const lvl = String(process.env.LOG_LEVEL || "info").toLowerCase();
	return isLogLevel(lvl) ? lvl : "info";
}

/**
 * Mask the password of a connection URL.
 *
 * @example
 * maskDataSource("mysql://app:test-secret@db/shop") // "mysql://app:***@db/shop"
 */
export function maskDataSource(dataSource: string): string {
	return dataSource.replace(/^([a-z][a-z0-9+.-]*:\/\/[^:/@]*):[^@/]*@/i, "$1:***@");
}

function redact(ctx: Record<string, unknown>): Record<string, unknown> {
	const out: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(ctx)) {
		if (SENSITIVE_KEYS.has(key.toLowerCase())) {
			out[key] = "[REDACTED]";
		} else if (typeof value === "string") {
			out[key] = maskDataSource(value);
		} else if (value instanceof Error) {
			out[key] = {name: value.name, message: value.message};
		} else {
			out[key] = value;
		}
	}
	return out;
}

export interface ConsoleLoggerOptions {
	/** Fixed level; read from LOG_LEVEL on every call when omitted */
	level?: LogLevel;
	/** Fields merged into every line */
	base?: Record<string, unknown>;
}

/**
 * Create a logger writing single-line JSON to the console.
 */
export function createLogger(options: ConsoleLoggerOptions = {}): Logger {
	const write = (
		level: Exclude<LogLevel, "silent">,
		msg: string,
		ctx?: Record<string, unknown>,
	): void => {
		const threshold = options.level ?? currentLevel();
		if (threshold === "silent" || LEVELS[level] < LEVELS[threshold]) return;
		const line = JSON.stringify({
			level,
			msg,
			timestamp: new Date().toISOString(),
			...options.base,
			...(ctx ? redact(ctx) : {}),
		});
		if (level === "error") console.error(line);
		else if (level === "warn") console.warn(line);
		else console.log(line);
	};

	return {
		debug: (msg, ctx) => write("debug", msg, ctx),
		info: (msg, ctx) => write("info", msg, ctx),
		warn: (msg, ctx) => write("warn", msg, ctx),
		error: (msg, ctx) => write("error", msg, ctx),
	};
}

export const logger: Logger = createLogger({base: {lib: "rowbind"}});
