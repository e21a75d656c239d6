/**
 * Batched INSERT statements.
 *
 * A write statement is split into a fixed head and tail around a list of
 * placeholder groups, one group per row, so each chunk of a write only
 * changes how many groups are rendered.
 */

import type {ColumnDescriptor} from "./record.js";
import {validateIdentifier} from "./record.js";
import {quoteIdent, quoteQualified} from "./sql.js";

/**
 * - "create": INSERT IGNORE, conflicting rows are skipped
 * - "update": INSERT ... ON DUPLICATE KEY UPDATE, conflicting rows are overwritten
 */
export type WriteMode = "create" | "update";

export interface WriteStatement {
	/** Everything up to and including VALUES */
	readonly head: string;
	/** One parenthesized tuple of `?`, one per column */
	readonly group: string;
	/** Conflict clause, or "" */
	readonly tail: string;
	/** Number of parameters each row binds */
	readonly width: number;
	/** Full statement text for a chunk of `rows` rows */
	render(rows: number): string;
}

/**
 * Build the statement for writing rows of `columns` into `table`.
 *
 * @example
 * buildWriteStatement("staff", columns, "update").render(2)
 * // INSERT INTO `staff` (`name`, `age`) VALUES (?, ?), (?, ?)
 * //   ON DUPLICATE KEY UPDATE `name` = VALUES(`name`), `age` = VALUES(`age`)
 */
export function buildWriteStatement(
	table: string,
	columns: readonly ColumnDescriptor[],
	mode: WriteMode,
): WriteStatement {
	validateIdentifier(table, "table");
	if (columns.length === 0) {
		throw new Error(`Cannot build a write statement for "${table}" without columns`);
	}

	const names = columns.map((c) => quoteIdent(c.column));
	const target = `${quoteQualified(table)} (${names.join(", ")}) VALUES `;
	const head =
		mode === "create" ? `INSERT IGNORE INTO ${target}` : `INSERT INTO ${target}`;
	const group = `(${names.map(() => "?").join(", ")})`;
	const tail =
		mode === "create"
			? ""
			: ` ON DUPLICATE KEY UPDATE ${names.map((n) => `${n} = VALUES(${n})`).join(", ")}`;

	return {
		head,
		group,
		tail,
		width: columns.length,
		render(rows: number): string {
			if (!Number.isInteger(rows) || rows < 1) {
				throw new RangeError(`A write statement needs at least one row, got ${rows}`);
			}
			return head + new Array<string>(rows).fill(group).join(", ") + tail;
		},
	};
}

/**
 * Largest number of rows one statement can carry.
 *
 * Bounded by the batch-size hint and by the backend's ceiling on bound
 * parameters per statement; 0 when a single row already exceeds the ceiling.
 */
export function chunkSize(
	columnCount: number,
	batchSize: number,
	maxParameters: number,
): number {
	return Math.min(batchSize, Math.floor(maxParameters / columnCount));
}
