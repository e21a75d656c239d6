/**
 * Structured error types for database operations.
 *
 * All errors extend DatabaseError, which includes an error code
 * for programmatic error handling.
 */

// ============================================================================
// Error Codes
// ============================================================================

export type DatabaseErrorCode =
	| "CONFIGURATION_ERROR"
	| "CONNECTION_ERROR"
	| "INPUT_SHAPE_ERROR"
	| "VALIDATION_ERROR"
	| "TABLE_DEFINITION_ERROR"
	| "STATEMENT_ERROR"
	| "CONSTRAINT_VIOLATION"
	| "QUERY_ERROR"
	| "WRITE_ERROR"
	| "TRANSACTION_ERROR"
	| "SCAN_ERROR";

// ============================================================================
// Base Error
// ============================================================================

/**
 * Base error class for all database errors.
 *
 * Includes an error code for programmatic handling.
 */
export class DatabaseError extends Error {
	readonly code: DatabaseErrorCode;

	constructor(
		code: DatabaseErrorCode,
		message: string,
		options?: ErrorOptions,
	) {
		super(message, options);
		this.name = "DatabaseError";
		this.code = code;

		// Maintains proper stack trace in V8 environments
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}
	}
}

// ============================================================================
// Configuration
// ============================================================================

/**
 * Thrown when a model or registry is configured with values that can never
 * work: an unsupported driver, an empty data source, a bad batch size.
 *
 * `fatal` marks conditions that are not worth retrying with the same
 * configuration under any circumstances (an unknown driver identity).
 */
export class ConfigurationError extends DatabaseError {
	readonly fatal: boolean;

	constructor(message: string, fatal = false, options?: ErrorOptions) {
		super("CONFIGURATION_ERROR", message, options);
		this.name = "ConfigurationError";
		this.fatal = fatal;
	}
}

/**
 * Thrown when a connection pool cannot be created.
 */
export class ConnectionError extends DatabaseError {
	constructor(message: string, options?: ErrorOptions) {
		super("CONNECTION_ERROR", message, options);
		this.name = "ConnectionError";
	}
}

// ============================================================================
// Input Errors
// ============================================================================

/**
 * Thrown when the records handed to a write are not a non-empty array,
 * or the record type cannot produce a statement.
 */
export class InputShapeError extends DatabaseError {
	constructor(message: string, options?: ErrorOptions) {
		super("INPUT_SHAPE_ERROR", message, options);
		this.name = "InputShapeError";
	}
}

/**
 * Thrown when a record fails its schema before a write.
 *
 * Field errors are keyed by `<record index>.<field path>`.
 */
export class ValidationError extends DatabaseError {
	readonly fieldErrors: Record<string, string[]>;

	constructor(
		message: string,
		fieldErrors: Record<string, string[]> = {},
		options?: ErrorOptions,
	) {
		super("VALIDATION_ERROR", message, options);
		this.name = "ValidationError";
		this.fieldErrors = fieldErrors;
	}
}

/**
 * Thrown when a record type or table name is invalid (e.g., semicolons in names).
 */
export class TableDefinitionError extends DatabaseError {
	readonly tableName?: string;
	readonly fieldName?: string;

	constructor(
		message: string,
		tableName?: string,
		fieldName?: string,
		options?: ErrorOptions,
	) {
		super("TABLE_DEFINITION_ERROR", message, options);
		this.name = "TableDefinitionError";
		this.tableName = tableName;
		this.fieldName = fieldName;
	}
}

// ============================================================================
// Statement and Execution Errors
// ============================================================================

/**
 * Thrown when the backend rejects a statement before running it:
 * syntax errors, unknown tables or columns.
 */
export class StatementError extends DatabaseError {
	readonly sql?: string;

	constructor(message: string, sql?: string, options?: ErrorOptions) {
		super("STATEMENT_ERROR", message, options);
		this.name = "StatementError";
		this.sql = sql;
	}
}

/**
 * Thrown when a query fails for any reason not covered by a more
 * specific error.
 */
export class QueryError extends DatabaseError {
	readonly sql?: string;

	constructor(message: string, sql?: string, options?: ErrorOptions) {
		super("QUERY_ERROR", message, options);
		this.name = "QueryError";
		this.sql = sql;
	}
}

/**
 * Thrown when a database constraint is violated.
 *
 * Constraint violations are detected at the database level and converted
 * from driver-specific errors into this normalized format.
 *
 * Insert-ignore and insert-or-update absorb primary key and unique key
 * conflicts, so writes mostly see this for foreign keys.
 */
export class ConstraintViolationError extends DatabaseError {
	/**
	 * Type of constraint that was violated.
	 * "unknown" if the specific type couldn't be determined from the error.
	 */
	readonly kind: "unique" | "foreign_key" | "unknown";

	/**
	 * Name of the constraint (e.g., "PRIMARY", "user.email").
	 * May be undefined if the database error didn't include it.
	 */
	readonly constraint?: string;

	/**
	 * Table name where the violation occurred.
	 * May be undefined if not extractable from the error.
	 */
	readonly table?: string;

	constructor(
		message: string,
		details: {
			kind: "unique" | "foreign_key" | "unknown";
			constraint?: string;
			table?: string;
		},
		options?: ErrorOptions,
	) {
		super("CONSTRAINT_VIOLATION", message, options);
		this.name = "ConstraintViolationError";
		this.kind = details.kind;
		this.constraint = details.constraint;
		this.table = details.table;
	}
}

/**
 * Thrown when one chunk of a batched write fails.
 *
 * The transaction is rolled back, so `rowsAffected` (the total reported by
 * the chunks before the failing one) was never committed.
 */
export class WriteError extends DatabaseError {
	readonly table: string;
	/** Zero-based index of the failing chunk */
	readonly chunk: number;
	/** Affected rows reported by earlier chunks of the same call */
	readonly rowsAffected: number;

	constructor(
		message: string,
		details: {table: string; chunk: number; rowsAffected: number},
		options?: ErrorOptions,
	) {
		super("WRITE_ERROR", message, options);
		this.name = "WriteError";
		this.table = details.table;
		this.chunk = details.chunk;
		this.rowsAffected = details.rowsAffected;
	}
}

/**
 * Thrown when a transaction cannot be started or committed.
 */
export class TransactionError extends DatabaseError {
	constructor(message: string, options?: ErrorOptions) {
		super("TRANSACTION_ERROR", message, options);
		this.name = "TransactionError";
	}
}

/**
 * A result row that could not be scanned into a record.
 *
 * Never thrown out of a read; collected on the model and logged.
 */
export class ScanError extends DatabaseError {
	/** Zero-based index of the row in the result set */
	readonly row: number;
	/** Column the failure was attributed to, if any */
	readonly column?: string;

	constructor(
		message: string,
		details: {row: number; column?: string},
		options?: ErrorOptions,
	) {
		super("SCAN_ERROR", message, options);
		this.name = "ScanError";
		this.row = details.row;
		this.column = details.column;
	}
}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Check if an error is a DatabaseError.
 */
export function isDatabaseError(error: unknown): error is DatabaseError {
	return error instanceof DatabaseError;
}

/**
 * Check if an error has a specific error code.
 */
export function hasErrorCode(
	error: unknown,
	code: DatabaseErrorCode,
): error is DatabaseError {
	return isDatabaseError(error) && error.code === code;
}
