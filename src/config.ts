/**
 * Environment configuration.
 *
 * Reads ROWBIND_* variables (from a .env file when present) into the options
 * a PoolRegistry and a Model are built from.
 */

import dotenv from "dotenv";
import {z} from "zod";

import {ConfigurationError} from "./impl/errors.js";
import type {LogLevel} from "./impl/logger.js";
import {DEFAULT_BATCH_SIZE} from "./impl/model.js";

const EnvSchema = z.object({
	ROWBIND_DRIVER: z.string().min(1).default("mysql"),
	ROWBIND_DSN: z.string({error: "is required"}).min(1, "must not be empty"),
	ROWBIND_BATCH_SIZE: z.coerce.number().int().nonnegative().default(DEFAULT_BATCH_SIZE),
	ROWBIND_POOL_LIMIT: z.coerce.number().int().positive().default(10),
	ROWBIND_CONNECT_TIMEOUT: z.coerce.number().int().positive().default(10000),
	LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
});

export interface RowbindConfig {
	driverName: string;
	dataSourceName: string;
	batchSize: number;
	pool: {
		connectionLimit: number;
		connectTimeout: number;
	};
	logLevel: LogLevel;
}

export interface LoadConfigOptions {
	/** .env file to read; dotenv's default (./.env) when omitted */
	path?: string;
	/** Variables to use instead of process.env; no file is read */
	env?: Record<string, string | undefined>;
}

/**
 * @throws ConfigurationError naming every invalid variable
 */
export function loadConfig(options: LoadConfigOptions = {}): RowbindConfig {
	let env = options.env;
	if (!env) {
		dotenv.config({path: options.path, quiet: true});
		env = process.env;
	}

	const parsed = EnvSchema.safeParse(env);
	if (!parsed.success) {
		const problems = parsed.error.issues.map(
			(issue) => `${issue.path.map(String).join(".")} ${issue.message}`,
		);
		throw new ConfigurationError(`Invalid configuration: ${problems.join("; ")}`);
	}

	const vars = parsed.data;
	return {
		driverName: vars.ROWBIND_DRIVER,
		dataSourceName: vars.ROWBIND_DSN,
		batchSize: vars.ROWBIND_BATCH_SIZE,
		pool: {
			connectionLimit: vars.ROWBIND_POOL_LIMIT,
			connectTimeout: vars.ROWBIND_CONNECT_TIMEOUT,
		},
		logLevel: vars.LOG_LEVEL,
	};
}
