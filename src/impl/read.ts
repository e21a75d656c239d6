/**
 * Reads: build a SELECT, run it, scan each row positionally into a record.
 *
 * A row that cannot be scanned is skipped and reported; the read itself only
 * fails when the query does.
 */

import type {z} from "zod";

import type {Executor} from "./driver.js";
import {ScanError} from "./errors.js";
import type {Logger} from "./logger.js";
import {validateIdentifier, type AnyObjectSchema, type ColumnDescriptor, type RecordType} from "./record.js";
import {quoteQualified, renderSQL} from "./sql.js";
import {isSQLTemplate, type SQLTemplate} from "./template.js";

/** A raw clause appended after FROM, or a template whose values are bound */
export type ReadCondition = string | SQLTemplate;

export interface ReadOptions<S extends AnyObjectSchema> {
	table: string;
	/** Select list; the record type's own columns when empty */
	columns: readonly string[];
	condition?: ReadCondition;
	type: RecordType<S>;
	logger: Logger;
}

export interface ReadResult<T> {
	records: T[];
	/** Scanned column values of each kept row, aligned with `records` */
	rows: unknown[][];
	skipped: ScanError[];
}

// ============================================================================
// Statement
// ============================================================================

/**
 * Build `SELECT <columns> FROM <table> <condition>`.
 *
 * @example
 * buildSelect("staff", ["name", "age"], sql`WHERE age > ${30}`)
 * // {sql: "SELECT `name`, `age` FROM `staff` WHERE age > ?", params: [30]}
 */
export function buildSelect(
	table: string,
	columns: readonly string[],
	condition: ReadCondition = "",
): {sql: string; params: unknown[]} {
	validateIdentifier(table, "table");
	if (columns.length === 0) {
		throw new Error(`Cannot select from "${table}" without columns`);
	}
	for (const column of columns) {
		validateIdentifier(column, "column");
	}

	let text = `SELECT ${columns.map(quoteQualified).join(", ")} FROM ${quoteQualified(table)}`;
	let params: unknown[] = [];

	if (isSQLTemplate(condition)) {
		const rendered = renderSQL(condition);
		if (rendered.sql.trim()) text += " " + rendered.sql.trim();
		params = rendered.params;
	} else if (condition.trim()) {
		text += " " + condition.trim();
	}

	return {sql: text, params};
}

// ============================================================================
// Scanning
// ============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

function describe(value: unknown): string {
	if (value instanceof Uint8Array) return "binary";
	return typeof value;
}

function toText(value: unknown): string | undefined {
	if (typeof value === "string") return value;
	if (value instanceof Uint8Array) return Buffer.from(value).toString("utf8");
	return undefined;
}

function coerce(column: ColumnDescriptor, value: unknown): unknown {
	const text = toText(value);
	switch (column.kind) {
		case "string":
			if (text !== undefined) return text;
			if (typeof value === "number" || typeof value === "bigint" || typeof value === "boolean") {
				return String(value);
			}
			if (value instanceof Date) return value.toISOString();
			break;
		case "number":
			if (typeof value === "number") return value;
			if (typeof value === "bigint") return Number(value);
			if (text !== undefined && text.trim() !== "" && Number.isFinite(Number(text))) {
				return Number(text);
			}
			break;
		case "bigint":
			if (typeof value === "bigint") return value;
			if (typeof value === "number" && Number.isInteger(value)) return BigInt(value);
			if (text !== undefined && /^-?\d+$/.test(text.trim())) return BigInt(text.trim());
			break;
		case "boolean":
			if (typeof value === "boolean") return value;
			if (value === 0 || value === 1) return value === 1;
			if (text === "0" || text === "false") return false;
			if (text === "1" || text === "true") return true;
			// BIT(1)
			if (value instanceof Uint8Array && value.length === 1) return value[0] !== 0;
			break;
		case "date": {
			const date =
				value instanceof Date
					? value
					: typeof value === "number" || text !== undefined
						? new Date(text ?? Number(value))
						: undefined;
			if (date && !Number.isNaN(date.getTime())) return date;
			break;
		}
		case "json":
			if (text !== undefined) {
				try {
					return JSON.parse(text);
				} catch (error) {
					throw new Error(`invalid JSON text: ${error instanceof Error ? error.message : String(error)}`);
				}
			}
			return value;
	}
	throw new Error(`cannot convert ${describe(value)} to ${column.kind}`);
}

/**
 * Convert one scanned column value into the field's app value.
 *
 * @throws Error when the value does not fit the field
 */
export function scanValue(column: ColumnDescriptor, value: unknown): unknown {
	if (value === null || value === undefined) {
		if (column.nullable) return null;
		if (column.optional) return undefined;
		throw new Error("NULL in a field that is neither nullable nor optional");
	}
	if (column.decode) return column.decode(value);
	return coerce(column, value);
}

function assign(target: Record<string, unknown>, path: readonly string[], value: unknown): void {
	if (value === undefined) return;
	let node = target;
	for (const key of path.slice(0, -1)) {
		const next = node[key];
		if (isPlainObject(next)) {
			node = next;
		} else {
			const created: Record<string, unknown> = {};
			node[key] = created;
			node = created;
		}
	}
	node[path[path.length - 1]] = value;
}

/**
 * Scan one result row into a record, or fail with a ScanError.
 */
export function scanRow<S extends AnyObjectSchema>(
	type: RecordType<S>,
	row: readonly unknown[],
	index: number,
): {record: z.output<S>; values: unknown[]} {
	const {columns} = type;
	if (row.length !== columns.length) {
		throw new ScanError(
			`row ${index} has ${row.length} columns, record type expects ${columns.length}`,
			{row: index},
		);
	}

	const candidate: Record<string, unknown> = {};
	const values: unknown[] = [];
	columns.forEach((column, i) => {
		let value: unknown;
		try {
			value = scanValue(column, row[i]);
		} catch (error) {
			const reason = error instanceof Error ? error.message : String(error);
			throw new ScanError(
				`row ${index}, column "${column.column}": ${reason}`,
				{row: index, column: column.column},
				{cause: error},
			);
		}
		values.push(value);
		assign(candidate, column.path, value);
	});

	const result = type.schema.safeParse(candidate);
	if (!result.success) {
		const [issue] = result.error.issues;
		const failed = columns.find(
			(c) => issue && c.path.join(".") === issue.path.map(String).join("."),
		);
		throw new ScanError(
			`row ${index} does not match the record type: ${issue?.message ?? "invalid"}`,
			{row: index, column: failed?.column},
			{cause: result.error},
		);
	}
	return {record: result.data, values};
}

// ============================================================================
// Read
// ============================================================================

/**
 * Select rows from `table` and scan them into records of `type`.
 *
 * Columns are matched to the record type's fields by position, not by name.
 *
 * @throws StatementError / QueryError when the query itself fails
 */
export async function read<S extends AnyObjectSchema>(
	executor: Executor,
	options: ReadOptions<S>,
): Promise<ReadResult<z.output<S>>> {
	const {table, type, condition, logger} = options;
	const columns =
		options.columns.length > 0 ? options.columns : type.columns.map((c) => c.column);
	const query = buildSelect(table, columns, condition);

	logger.debug("read", {table, sql: query.sql});
	const raw = await executor.all(query.sql, query.params);

	const result: ReadResult<z.output<S>> = {records: [], rows: [], skipped: []};
	raw.forEach((row, index) => {
		try {
			const {record, values} = scanRow(type, row, index);
			result.records.push(record);
			result.rows.push(values);
		} catch (error) {
			if (!(error instanceof ScanError)) throw error;
			logger.warn("row skipped", {
				table,
				row: error.row,
				column: error.column,
				error: error.message,
			});
			result.skipped.push(error);
		}
	});

	return result;
}
