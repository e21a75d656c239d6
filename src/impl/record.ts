/**
 * Record types: zod object schemas plus the column layout derived from them.
 *
 * Column descriptors are extracted once, when the record type is defined,
 * and reused by every write and read.
 */

import {z} from "zod";

import {TableDefinitionError} from "./errors.js";
import {logger as defaultLogger, type Logger} from "./logger.js";

// ============================================================================
// Identifier Validation
// ============================================================================

/**
 * Validate that an identifier (table or column name) is safe for SQL.
 *
 * @throws TableDefinitionError if the identifier is empty or contains
 * control characters, semicolons or backticks
 */
export function validateIdentifier(name: string, type: "table" | "column"): void {
	if (name.length === 0) {
		throw new TableDefinitionError(`Invalid ${type} identifier: ${type} names cannot be empty`);
	}

	// eslint-disable-next-line no-control-regex
	const controlCharRegex = /[\x00-\x1f\x7f]/;
	if (controlCharRegex.test(name)) {
		throw new TableDefinitionError(
			// eslint-disable-next-line no-control-regex
			`Invalid ${type} identifier "${name.replace(/[\x00-\x1f\x7f]/g, "\\x")}"` +
				`: ${type} names cannot contain control characters`,
		);
	}

	if (name.includes(";")) {
		throw new TableDefinitionError(
			`Invalid ${type} identifier "${name}": ${type} names cannot contain semicolons`,
		);
	}

	if (name.includes("`")) {
		throw new TableDefinitionError(
			`Invalid ${type} identifier "${name}": ${type} names cannot contain backticks`,
		);
	}
}

// ============================================================================
// Field Metadata
// ============================================================================

export interface FieldDBMeta {
	/** Column name override; the property name is used when absent */
	column?: string;
	/** App value → DB value, applied before binding */
	encode?: (value: unknown) => unknown;
	/** DB value → app value, applied after scanning */
	decode?: (value: unknown) => unknown;
}

/**
 * Get database metadata from a schema, looking through optional/nullable/default
 * wrappers when the outer layer carries none.
 *
 * Metadata sits under the "db" key of zod's global registry, so it survives
 * the clones that .int(), .max(), .refine() and friends make.
 */
export function getDBMeta(schema: z.ZodType): FieldDBMeta {
	const meta = schema.meta()?.db;
	if (meta && Object.keys(meta).length > 0) return meta;
	if (
		schema instanceof z.ZodOptional ||
		schema instanceof z.ZodNullable ||
		schema instanceof z.ZodDefault
	) {
		const inner = schema.unwrap();
		if (inner instanceof z.ZodType) return getDBMeta(inner);
	}
	return {};
}

/**
 * Return a copy of `schema` carrying `dbMeta` merged over its existing metadata.
 * Later calls override earlier ones (last write wins). User metadata outside
 * the "db" key is inherited from the original.
 */
export function setDBMeta<T extends z.ZodType>(schema: T, dbMeta: FieldDBMeta): T {
	const next = schema.clone();
	const target: z.ZodType = next;
	z.globalRegistry.add(target, {db: {...getDBMeta(schema), ...dbMeta}});
	return next;
}

/**
 * Database metadata methods available on every zod schema after extendZod().
 */
export interface ZodDBMethods<Schema extends z.ZodType> {
	/**
	 * Store this field under a different column name.
	 * @example userId: z.number().int().db.column("user_id")
	 */
	column(name: string): Schema;

	/**
	 * Transform the app value before it is bound to a statement.
	 * @example tags: z.array(z.string()).db.encode((t) => (Array.isArray(t) ? t.join(",") : t))
	 */
	encode(fn: (value: unknown) => unknown): Schema;

	/**
	 * Transform the scanned value before the record is validated.
	 * @example tags: z.array(z.string()).db.decode((s) => String(s).split(","))
	 */
	decode(fn: (value: unknown) => unknown): Schema;
}

function createDBMethods<S extends z.ZodType>(schema: S): ZodDBMethods<S> {
	return {
		column(name) {
			validateIdentifier(name, "column");
			return setDBMeta(schema, {column: name});
		},
		encode(fn) {
			return setDBMeta(schema, {encode: fn});
		},
		decode(fn) {
			return setDBMeta(schema, {decode: fn});
		},
	};
}

/**
 * Extend Zod with the .db namespace.
 *
 * @example
 * import {z} from "zod";
 * import {extendZod, record} from "rowbind";
 *
 * extendZod(z);
 *
 * const User = record({
 *   id: z.number().int(),
 *   name: z.string().db.column("display_name"),
 * });
 */
export function extendZod(zodModule: typeof z): void {
	for (const [key, value] of Object.entries(zodModule)) {
		if (
			typeof value === "function" &&
			key.startsWith("Zod") &&
			value.prototype &&
			!("db" in value.prototype)
		) {
			Object.defineProperty(value.prototype, "db", {
				get() {
					return createDBMethods(this);
				},
				enumerable: false,
				configurable: true,
			});
		}
	}
}

// Auto-extend the local z import so our own code works
extendZod(z);

declare module "zod" {
	interface GlobalMeta {
		db?: FieldDBMeta;
	}

	// eslint-disable-next-line @typescript-eslint/no-unused-vars
	interface ZodType<out Output, out Input, out Internals> {
		readonly db: ZodDBMethods<this>;
	}
}

// ============================================================================
// Column Descriptors
// ============================================================================

/**
 * How a column's values are bound and scanned.
 * Structured values (arrays, maps, unions of objects) are stored as JSON text.
 */
export type ColumnKind = "string" | "number" | "bigint" | "boolean" | "date" | "json";

export interface ColumnDescriptor {
	/** Declared property name */
	readonly field: string;
	/** Property path from the record root; longer than one for nested records */
	readonly path: readonly string[];
	/** Column name: the .db.column() override, or the property name verbatim */
	readonly column: string;
	readonly kind: ColumnKind;
	/** NULL scans to null */
	readonly nullable: boolean;
	/** NULL scans to undefined */
	readonly optional: boolean;
	readonly encode?: (value: unknown) => unknown;
	readonly decode?: (value: unknown) => unknown;
}

export type AnyObjectSchema = z.ZodObject<z.core.$ZodShape, z.core.$ZodObjectConfig>;

interface Unwrapped {
	core: z.ZodType;
	nullable: boolean;
	optional: boolean;
}

function unwrap(schema: z.ZodType): Unwrapped {
	let core = schema;
	let nullable = false;
	let optional = false;
	while (
		core instanceof z.ZodOptional ||
		core instanceof z.ZodNullable ||
		core instanceof z.ZodDefault
	) {
		if (core instanceof z.ZodNullable) nullable = true;
		if (core instanceof z.ZodOptional) optional = true;
		const inner = core.unwrap();
		if (!(inner instanceof z.ZodType)) break;
		core = inner;
	}
	return {core, nullable, optional};
}

function kindOf(core: z.ZodType): ColumnKind {
	if (core instanceof z.ZodString || core instanceof z.ZodEnum) return "string";
	if (core instanceof z.ZodNumber) return "number";
	if (core instanceof z.ZodBigInt) return "bigint";
	if (core instanceof z.ZodBoolean) return "boolean";
	if (core instanceof z.ZodDate) return "date";
	if (core instanceof z.ZodLiteral) {
		const [first] = core.values;
		if (typeof first === "number") return "number";
		if (typeof first === "bigint") return "bigint";
		if (typeof first === "boolean") return "boolean";
		return "string";
	}
	return "json";
}

/**
 * Derive the ordered column list of an object schema.
 *
 * Fields whose schema is itself an object are flattened in place, depth first;
 * the nested field's own .db.column() is ignored. Duplicate column names are
 * kept as they are.
 */
export function extractColumns(
	schema: AnyObjectSchema,
	prefix: readonly string[] = [],
): ColumnDescriptor[] {
	const columns: ColumnDescriptor[] = [];

	for (const [field, fieldSchema] of Object.entries(schema.shape)) {
		if (!(fieldSchema instanceof z.ZodType)) {
			throw new TableDefinitionError(
				`Field "${[...prefix, field].join(".")}" is not a zod schema`,
				undefined,
				field,
			);
		}
		const path = [...prefix, field];

		if (fieldSchema instanceof z.ZodObject) {
			columns.push(...extractColumns(fieldSchema, path));
			continue;
		}

		const meta = getDBMeta(fieldSchema);
		const column = meta.column ?? field;
		validateIdentifier(column, "column");
		const {core, nullable, optional} = unwrap(fieldSchema);

		columns.push({
			field,
			path,
			column,
			kind: kindOf(core),
			nullable,
			optional,
			...(meta.encode && {encode: meta.encode}),
			...(meta.decode && {decode: meta.decode}),
		});
	}

	return columns;
}

/**
 * Column names that more than one field maps to, in first-seen order.
 */
export function duplicateColumns(columns: readonly ColumnDescriptor[]): string[] {
	const seen = new Set<string>();
	const duplicates = new Set<string>();
	for (const {column} of columns) {
		if (seen.has(column)) duplicates.add(column);
		seen.add(column);
	}
	return [...duplicates];
}

// ============================================================================
// Record Types
// ============================================================================

export interface RecordType<S extends AnyObjectSchema = AnyObjectSchema> {
	readonly schema: S;
	readonly columns: readonly ColumnDescriptor[];
}

/** A record as read back from the database */
export type Row<R extends RecordType> = z.output<R["schema"]>;

/** A record as accepted by create() and update() */
export type RowInput<R extends RecordType> = z.input<R["schema"]>;

export interface RecordOptions {
	logger?: Logger;
}

/**
 * Build a record type from an existing object schema.
 */
export function defineRecord<S extends AnyObjectSchema>(
	schema: S,
	options: RecordOptions = {},
): RecordType<S> {
	const columns = extractColumns(schema);
	const duplicates = duplicateColumns(columns);
	if (duplicates.length > 0) {
		(options.logger ?? defaultLogger).warn(
			"record type maps several fields to the same column",
			{columns: duplicates},
		);
	}
	return {schema, columns};
}

/**
 * Define a record type from a zod shape.
 *
 * @example
 * const User = record({
 *   id: z.number().int(),
 *   name: z.string().max(64),
 * });
 * type User = Row<typeof User>;
 */
export function record<Shape extends Record<string, z.ZodType>>(
	shape: Shape,
	options: RecordOptions = {},
) {
	return defineRecord(z.object(shape), options);
}
