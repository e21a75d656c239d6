/**
 * Batched writes.
 *
 * Records are validated, split into chunks that fit the backend's parameter
 * ceiling, and written chunk by chunk inside a single transaction.
 */

import type {z} from "zod";

import type {Driver} from "./driver.js";
import {InputShapeError, ValidationError, WriteError} from "./errors.js";
import type {Logger} from "./logger.js";
import type {AnyObjectSchema, ColumnDescriptor, RecordType} from "./record.js";
import {buildWriteStatement, chunkSize, type WriteMode} from "./statement.js";

export interface WriteOptions<S extends AnyObjectSchema> {
	table: string;
	type: RecordType<S>;
	records: readonly z.input<S>[];
	mode: WriteMode;
	batchSize: number;
	logger: Logger;
}

/**
 * Read the value at `path`, or undefined when an intermediate object is missing.
 */
export function valueAt(record: unknown, path: readonly string[]): unknown {
	let current: unknown = record;
	for (const key of path) {
		if (current === null || typeof current !== "object") return undefined;
		current = Reflect.get(current, key);
	}
	return current;
}

/**
 * Convert an app value into a bind parameter.
 *
 * A custom .db.encode() wins; otherwise structured values become JSON text
 * and bigints become decimal strings. Missing values bind as NULL.
 */
export function encodeValue(column: ColumnDescriptor, value: unknown): unknown {
	if (column.encode) {
		return column.encode(value) ?? null;
	}
	if (value === undefined || value === null) return null;
	if (column.kind === "json") return JSON.stringify(value);
	if (typeof value === "bigint") return value.toString();
	return value;
}

function validateRecords<S extends AnyObjectSchema>(
	schema: S,
	records: readonly unknown[],
	mode: WriteMode,
): z.output<S>[] {
	const parsed: z.output<S>[] = [];
	const fieldErrors: Record<string, string[]> = {};
	let failed = 0;

	records.forEach((record, index) => {
		const result = schema.safeParse(record);
		if (result.success) {
			parsed.push(result.data);
			return;
		}
		failed++;
		for (const issue of result.error.issues) {
			const path = [index, ...issue.path].map(String).join(".");
			(fieldErrors[path] ??= []).push(issue.message);
		}
	});

	if (failed > 0) {
		throw new ValidationError(
			`${mode}: ${failed} of ${records.length} records failed validation`,
			fieldErrors,
		);
	}
	return parsed;
}

/**
 * Write `records` into `table` and return the summed affected-row count.
 *
 * The count is the backend's: with mode "update" an overwritten row counts 2
 * and an unchanged one 0, so treat it as advisory.
 *
 * @throws InputShapeError when records is not a non-empty array
 * @throws ValidationError when a record fails the record type's schema
 * @throws WriteError when a chunk fails; nothing is committed
 * @throws TransactionError when the commit fails; nothing is credited
 */
export async function write<S extends AnyObjectSchema>(
	driver: Driver,
	options: WriteOptions<S>,
): Promise<number> {
	const {table, type, records, mode, batchSize, logger} = options;

	if (!Array.isArray(records)) {
		throw new InputShapeError(`${mode}: records is not an array`);
	}
	if (records.length === 0) {
		throw new InputShapeError(`${mode}: records has no elements`);
	}

	const {columns} = type;
	if (columns.length === 0) {
		throw new InputShapeError(`${mode}: record type has no columns`);
	}
	const size = chunkSize(columns.length, batchSize, driver.maxParameters);
	if (size < 1) {
		throw new InputShapeError(
			`${mode}: record type has ${columns.length} columns but a statement binds at most ${driver.maxParameters} parameters`,
		);
	}

	const rows = validateRecords(type.schema, records, mode);
	const statement = buildWriteStatement(table, columns, mode);

	return driver.transaction(async (tx) => {
		let total = 0;
		for (let chunk = 0, start = 0; start < rows.length; chunk++, start += size) {
			const batch = rows.slice(start, start + size);
			let affected: number;
			try {
				const params = batch.flatMap((row) =>
					columns.map((column) => encodeValue(column, valueAt(row, column.path))),
				);
				affected = await tx.run(statement.render(batch.length), params);
			} catch (error) {
				throw new WriteError(
					`${mode} failed on chunk ${chunk} of table "${table}"`,
					{table, chunk, rowsAffected: total},
					{cause: error},
				);
			}
			total += affected;
			logger.debug("chunk written", {
				table,
				mode,
				chunk,
				rows: batch.length,
				affected,
			});
		}
		return total;
	});
}
