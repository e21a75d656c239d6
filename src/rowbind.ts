/**
 * rowbind - records in, rows out
 *
 * Describe a record once. Write it in batches, read it back by position.
 */

import {z as zod} from "zod";
import {extendZod} from "./impl/record.js";

// Extend zod on module load
extendZod(zod);

// Re-export extended zod
export {zod as z};

// ============================================================================
// Record Types
// ============================================================================

export {
	record,
	defineRecord,
	extendZod,
	extractColumns,
	validateIdentifier,

	type RecordType,
	type RecordOptions,
	type Row,
	type RowInput,
	type ColumnDescriptor,
	type ColumnKind,
	type FieldDBMeta,
	type ZodDBMethods,
} from "./impl/record.js";

// ============================================================================
// Model
// ============================================================================

export {
	Model,
	DEFAULT_BATCH_SIZE,
	type ModelOptions,
	type ModelConfig,
} from "./impl/model.js";

export {
	PoolRegistry,
	SUPPORTED_DRIVER,
	type PoolRegistryOptions,
	type DriverFactory,
} from "./impl/pools.js";

export {type Driver, type Executor} from "./impl/driver.js";

export {type ReadCondition, type ReadResult} from "./impl/read.js";

export {type WriteMode} from "./impl/statement.js";

// ============================================================================
// SQL Primitives
// ============================================================================

export {
	sql,
	ident,
	isSQLIdentifier,
	type SQLIdentifier,
	type SQLTemplate,
	isSQLTemplate,
} from "./impl/template.js";

// ============================================================================
// Configuration and Logging
// ============================================================================

export {loadConfig, type RowbindConfig, type LoadConfigOptions} from "./config.js";

export {
	logger,
	createLogger,
	type Logger,
	type LogLevel,
} from "./impl/logger.js";

// ============================================================================
// Errors
// ============================================================================

export {
	DatabaseError,
	isDatabaseError,
	hasErrorCode,

	ConfigurationError,
	ConnectionError,

	InputShapeError,
	ValidationError,
	TableDefinitionError,

	StatementError,
	QueryError,
	ConstraintViolationError,
	WriteError,
	TransactionError,
	ScanError,

	type DatabaseErrorCode,
} from "./impl/errors.js";
