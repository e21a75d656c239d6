/**
 * Database driver interface.
 *
 * Drivers receive finished SQL text with `?` placeholders plus a flat
 * parameter list. Everything above them (statement building, chunking,
 * scanning) is backend-agnostic and only talks to drivers through this
 * interface.
 */

/**
 * The statement-running half of a driver; what a transaction hands out.
 */
export interface Executor {
	/**
	 * Execute a query and return every row as an array of column values,
	 * in select-list order.
	 */
	all(sql: string, params?: readonly unknown[]): Promise<unknown[][]>;

	/**
	 * Execute a statement and return the number of affected rows.
	 */
	run(sql: string, params?: readonly unknown[]): Promise<number>;
}

export interface Driver extends Executor {
	/** Driver identity, matched against the model's configured driver name */
	readonly name: string;

	/** Ceiling on bound parameters per statement */
	readonly maxParameters: number;

	/**
	 * Execute SQL text as-is, without preparing it (DDL, session settings).
	 */
	exec(sql: string): Promise<void>;

	/**
	 * Execute a function within a database transaction.
	 *
	 * If `fn` rejects, the transaction is rolled back and the same error is
	 * rethrown. If the commit fails, a TransactionError is thrown.
	 */
	transaction<T>(fn: (tx: Executor) => Promise<T>): Promise<T>;

	/**
	 * Close every connection of the underlying pool.
	 */
	close(): Promise<void>;
}
