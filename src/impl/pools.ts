/**
 * Connection pool registry.
 *
 * One driver (and so one mysql2 pool) per (driver name, data source) pair,
 * created on first use and shared by every model holding the registry.
 */

import MySQLDriver, {type MySQLOptions} from "../mysql.js";
import type {Driver} from "./driver.js";
import {ConfigurationError, ConnectionError, isDatabaseError} from "./errors.js";
import {logger as defaultLogger, type Logger} from "./logger.js";

/** The only backend identity a registry accepts */
export const SUPPORTED_DRIVER = "mysql";

export type DriverFactory = (dataSource: string) => Driver;

export interface PoolRegistryOptions {
	/** Creates the driver for a data source; a MySQLDriver by default */
	connect?: DriverFactory;
	/** Pool options handed to the default MySQLDriver */
	driverOptions?: Omit<MySQLOptions, "logger">;
	logger?: Logger;
}

/**
 * Validate an identity pair before any connection attempt.
 *
 * @throws ConfigurationError, fatal for an unknown driver
 */
export function validateIdentity(driverName: string, dataSource: string): void {
	if (driverName !== SUPPORTED_DRIVER) {
		throw new ConfigurationError(
			`driver name "${driverName}" is unknown or does not match "${SUPPORTED_DRIVER}"`,
			true,
		);
	}
	if (dataSource === "") {
		throw new ConfigurationError("data source of the model is not set");
	}
}

export class PoolRegistry {
	#drivers = new Map<string, Driver>();
	#connect: DriverFactory;
	#logger: Logger;

	constructor(options: PoolRegistryOptions = {}) {
		this.#logger = options.logger ?? defaultLogger;
		const logger = this.#logger;
		this.#connect =
			options.connect ??
			((dataSource) =>
				new MySQLDriver(dataSource, {...options.driverOptions, logger}));
	}

	/**
	 * Build a registry whose pools use the limits from loadConfig().
	 */
	static fromConfig(
		config: {pool: Omit<MySQLOptions, "logger">},
		logger?: Logger,
	): PoolRegistry {
		return new PoolRegistry({driverOptions: config.pool, logger});
	}

	/**
	 * Return the driver for an identity pair, creating it on first use.
	 *
	 * Must stay synchronous: nothing may run between the lookup and the
	 * registration, or two first callers could each open a pool.
	 */
	acquire(driverName: string, dataSource: string): Driver {
		validateIdentity(driverName, dataSource);

		const key = driverName + dataSource;
		const existing = this.#drivers.get(key);
		if (existing) return existing;

		let driver: Driver;
		try {
			driver = this.#connect(dataSource);
		} catch (error) {
			if (isDatabaseError(error)) throw error;
			throw new ConnectionError(`Failed to connect to ${driverName} data source`, {
				cause: error,
			});
		}
		this.#drivers.set(key, driver);
		this.#logger.info("connection pool created", {driver: driverName, dataSource});
		return driver;
	}

	has(driverName: string, dataSource: string): boolean {
		return this.#drivers.has(driverName + dataSource);
	}

	get size(): number {
		return this.#drivers.size;
	}

	/**
	 * Close every pool and empty the registry.
	 */
	async close(): Promise<void> {
		const drivers = [...this.#drivers.values()];
		this.#drivers.clear();
		await Promise.all(drivers.map((driver) => driver.close()));
	}
}
