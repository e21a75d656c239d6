/**
 * In-memory Driver for tests.
 *
 * Understands exactly the statements rowbind generates (INSERT IGNORE,
 * INSERT ... ON DUPLICATE KEY UPDATE, SELECT, DELETE ... WHERE col < ?,
 * SELECT VERSION()) plus a plain CREATE TABLE. Every table is keyed by its
 * first column, and rows come back in key order as they would from an
 * InnoDB primary key scan.
 */

import type {Driver, Executor} from "./driver.js";
import {StatementError, TransactionError} from "./errors.js";

export interface ExecutedStatement {
	sql: string;
	params: unknown[];
}

interface MemoryTable {
	columns: string[];
	rows: Map<string, unknown[]>;
}

export interface MemoryDriverOptions {
	maxParameters?: number;
	version?: string;
}

type FailurePredicate = (statement: ExecutedStatement) => boolean;

const TABLE_NAME = "`[^`]+`(?:\\.`[^`]+`)?";
const INSERT_RE = new RegExp(
	`^INSERT (IGNORE )?INTO (${TABLE_NAME}) \\(([^)]*)\\) VALUES (.+?)( ON DUPLICATE KEY UPDATE .+)?$`,
	"s",
);
const SELECT_RE = new RegExp(`^SELECT (.+?) FROM (${TABLE_NAME})(?: (.*))?$`, "s");
const DELETE_RE = new RegExp(`^DELETE FROM (${TABLE_NAME}) WHERE \`([^\`]+)\` < \\?$`);
const CREATE_RE = /^CREATE TABLE\s+(?:IF NOT EXISTS\s+)?`?([\w.]+)`?\s*\((.*)\)\s*;?\s*$/is;
const TERM_RE = /^`?(\w+)`?\s*(=|<>|!=|<=|>=|<|>)\s*(\?|-?\d+(?:\.\d+)?|'[^']*')$/;

function unquote(name: string): string {
	return name.replace(/`/g, "").toLowerCase();
}

function splitColumns(list: string): string[] {
	return list.split(",").map((c) => unquote(c.trim()));
}

function comparable(value: unknown): number | string {
	if (value instanceof Date) return value.getTime();
	if (typeof value === "number") return value;
	if (typeof value === "bigint") return Number(value);
	if (typeof value === "boolean") return value ? 1 : 0;
	return String(value);
}

function compare(a: unknown, b: unknown): number {
	const x = comparable(a);
	const y = comparable(b);
	const nx = Number(x);
	const ny = Number(y);
	if (x !== "" && y !== "" && !Number.isNaN(nx) && !Number.isNaN(ny)) {
		return nx - ny;
	}
	const sx = String(x);
	const sy = String(y);
	return sx < sy ? -1 : sx > sy ? 1 : 0;
}

function same(a: unknown, b: unknown): boolean {
	if (a === null || b === null) return a === b;
	return compare(a, b) === 0;
}

/** What a MySQL column hands back: booleans are TINYINT(1) */
function store(value: unknown): unknown {
	if (value === undefined) return null;
	if (typeof value === "boolean") return value ? 1 : 0;
	return value;
}

function matches(op: string, a: unknown, b: unknown): boolean {
	const c = compare(a, b);
	switch (op) {
		case "=":
			return c === 0;
		case "<>":
		case "!=":
			return c !== 0;
		case "<":
			return c < 0;
		case "<=":
			return c <= 0;
		case ">":
			return c > 0;
		default:
			return c >= 0;
	}
}

export class MemoryDriver implements Driver {
	readonly name = "mysql";
	readonly maxParameters: number;
	readonly version: string;

	/** Every statement received, in order, including failed ones */
	readonly statements: ExecutedStatement[] = [];
	commits = 0;
	rollbacks = 0;
	closed = false;

	#tables = new Map<string, MemoryTable>();
	#failures: Array<{when: FailurePredicate; error: Error}> = [];
	#commitError: Error | undefined;

	constructor(options: MemoryDriverOptions = {}) {
		this.maxParameters = options.maxParameters ?? 65535;
		this.version = options.version ?? "8.0.36";
	}

	createTable(name: string, columns: readonly string[]): void {
		this.#tables.set(unquote(name), {
			columns: columns.map((c) => c.toLowerCase()),
			rows: new Map(),
		});
	}

	/** Rows of `table` in key order */
	dump(table: string): unknown[][] {
		return this.#sorted(this.#table(table, ""));
	}

	/** Make every later statement matching `when` fail with `error` */
	failWhen(when: FailurePredicate, error: Error = new Error("injected failure")): void {
		this.#failures.push({when, error});
	}

	/** Make the next commit fail */
	failCommit(error: Error = new Error("injected commit failure")): void {
		this.#commitError = error;
	}

	async exec(sql: string): Promise<void> {
		this.#record(sql, []);
		const match = sql.trim().match(CREATE_RE);
		if (!match) return;
		const columns = match[2]
			.split(",")
			.map((definition) => definition.trim().split(/\s+/)[0])
			.filter((name) => !/^(PRIMARY|KEY|UNIQUE|INDEX|CONSTRAINT)$/i.test(name));
		this.createTable(match[1], columns.map(unquote));
	}

	async all(sql: string, params: readonly unknown[] = []): Promise<unknown[][]> {
		this.#record(sql, params);
		if (/^SELECT VERSION\(\)$/i.test(sql.trim())) {
			return [[this.version]];
		}
		const match = sql.match(SELECT_RE);
		if (!match) {
			throw new StatementError("You have an error in your SQL syntax", sql);
		}
		const table = this.#table(match[2], sql);
		const indexes = splitColumns(match[1]).map((c) => this.#columnIndex(table, c, sql));
		const rows = this.#filter(table, match[3] ?? "", [...params], sql);
		return rows.map((row) => indexes.map((i) => row[i]));
	}

	async run(sql: string, params: readonly unknown[] = []): Promise<number> {
		this.#record(sql, params);

		const insert = sql.match(INSERT_RE);
		if (insert) {
			return this.#insert(insert, [...params], sql);
		}

		const remove = sql.match(DELETE_RE);
		if (remove) {
			const table = this.#table(remove[1], sql);
			const index = this.#columnIndex(table, unquote(remove[2]), sql);
			let affected = 0;
			for (const [key, row] of [...table.rows]) {
				if (row[index] !== null && compare(row[index], params[0]) < 0) {
					table.rows.delete(key);
					affected++;
				}
			}
			return affected;
		}

		throw new StatementError("You have an error in your SQL syntax", sql);
	}

	async transaction<T>(fn: (tx: Executor) => Promise<T>): Promise<T> {
		const snapshot = new Map(
			[...this.#tables].map(([name, table]) => [
				name,
				{columns: table.columns, rows: new Map(table.rows)},
			]),
		);
		const restore = () => {
			this.#tables = snapshot;
			this.rollbacks++;
		};

		let result: T;
		try {
			result = await fn(this);
		} catch (error) {
			restore();
			throw error;
		}

		const commitError = this.#commitError;
		if (commitError) {
			this.#commitError = undefined;
			restore();
			throw new TransactionError("Failed to commit transaction", {cause: commitError});
		}
		this.commits++;
		return result;
	}

	async close(): Promise<void> {
		this.closed = true;
	}

	#record(sql: string, params: readonly unknown[]): void {
		const statement = {sql, params: [...params]};
		this.statements.push(statement);
		const failure = this.#failures.find((f) => f.when(statement));
		if (failure) throw failure.error;
	}

	#table(name: string, sql: string): MemoryTable {
		const table = this.#tables.get(unquote(name));
		if (!table) {
			throw new StatementError(`Table '${unquote(name)}' doesn't exist`, sql);
		}
		return table;
	}

	#columnIndex(table: MemoryTable, column: string, sql: string): number {
		const index = table.columns.indexOf(column);
		if (index === -1) {
			throw new StatementError(`Unknown column '${column}' in 'field list'`, sql);
		}
		return index;
	}

	#sorted(table: MemoryTable): unknown[][] {
		return [...table.rows.values()]
			.sort((a, b) => compare(a[0], b[0]))
			.map((row) => [...row]);
	}

	#insert(match: RegExpMatchArray, params: unknown[], sql: string): number {
		const ignore = Boolean(match[1]);
		const upsert = Boolean(match[5]);
		const table = this.#table(match[2], sql);
		const columns = splitColumns(match[3]);
		if (new Set(columns).size !== columns.length) {
			throw new StatementError("Column specified twice", sql);
		}
		const indexes = columns.map((c) => this.#columnIndex(table, c, sql));
		const groups = match[4].split("), (").length;
		if (groups * columns.length !== params.length) {
			throw new StatementError("Column count doesn't match value count", sql);
		}

		const keyIndex = indexes.indexOf(0);
		let affected = 0;
		for (let start = 0; start < params.length; start += columns.length) {
			const values = params.slice(start, start + columns.length).map(store);
			const row = new Array<unknown>(table.columns.length).fill(null);
			indexes.forEach((index, i) => {
				row[index] = values[i];
			});
			const key = keyIndex === -1 ? String(table.rows.size) : String(row[0]);
			const existing = table.rows.get(key);

			if (!existing) {
				table.rows.set(key, row);
				affected += 1;
			} else if (upsert) {
				const next = [...existing];
				indexes.forEach((index, i) => {
					next[index] = values[i];
				});
				if (next.some((value, i) => !same(value, existing[i]))) {
					table.rows.set(key, next);
					affected += 2;
				}
			} else if (!ignore) {
				throw new StatementError(`Duplicate entry '${key}' for key 'PRIMARY'`, sql);
			}
		}
		return affected;
	}

	#filter(table: MemoryTable, condition: string, params: unknown[], sql: string): unknown[][] {
		let rest = condition.trim();
		let limit: number | undefined;
		let order: {index: number; desc: boolean} | undefined;

		const limitMatch = rest.match(/\s*LIMIT\s+(\d+)$/i);
		if (limitMatch) {
			limit = Number(limitMatch[1]);
			rest = rest.slice(0, limitMatch.index).trim();
		}
		const orderMatch = rest.match(/\s*ORDER BY\s+`?(\w+)`?(?:\s+(ASC|DESC))?$/i);
		if (orderMatch) {
			order = {
				index: this.#columnIndex(table, orderMatch[1].toLowerCase(), sql),
				desc: orderMatch[2]?.toUpperCase() === "DESC",
			};
			rest = rest.slice(0, orderMatch.index).trim();
		}

		const predicates: Array<(row: unknown[]) => boolean> = [];
		if (rest) {
			const where = rest.match(/^WHERE\s+(.+)$/is);
			if (!where) {
				throw new StatementError("You have an error in your SQL syntax", sql);
			}
			for (const term of where[1].split(/\s+AND\s+/i)) {
				const parsed = term.trim().match(TERM_RE);
				if (!parsed) {
					throw new StatementError("You have an error in your SQL syntax", sql);
				}
				const index = this.#columnIndex(table, parsed[1].toLowerCase(), sql);
				const op = parsed[2];
				const literal = parsed[3];
				const operand =
					literal === "?"
						? params.shift()
						: literal.startsWith("'")
							? literal.slice(1, -1)
							: Number(literal);
				predicates.push((row) => row[index] !== null && matches(op, row[index], operand));
			}
		}

		let rows = this.#sorted(table).filter((row) => predicates.every((p) => p(row)));
		if (order) {
			const {index, desc} = order;
			rows = rows.sort((a, b) => (desc ? -1 : 1) * compare(a[index], b[index]));
		}
		return limit === undefined ? rows : rows.slice(0, limit);
	}
}
