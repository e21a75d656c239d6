/**
 * sql`` fragments for read conditions.
 *
 * A fragment keeps its literal text apart from the values interpolated into
 * it; renderSQL() in sql.ts turns the values into `?` parameters.
 */

/** A table or column name, backtick-quoted when the fragment is rendered */
export class SQLIdentifier {
	readonly name: string;

	constructor(name: string) {
		this.name = name;
	}
}

/**
 * @example
 * sql`WHERE ${ident("created_at")} < ${cutoff}`
 */
export function ident(name: string): SQLIdentifier {
	return new SQLIdentifier(name);
}

export function isSQLIdentifier(value: unknown): value is SQLIdentifier {
	return value instanceof SQLIdentifier;
}

/**
 * Text and values of a sql`` fragment, with nested fragments already
 * flattened. `text` always holds one more entry than `values`.
 */
export class SQLTemplate {
	readonly text: readonly string[];
	readonly values: readonly unknown[];

	constructor(text: readonly string[], values: readonly unknown[]) {
		this.text = Object.freeze([...text]);
		this.values = Object.freeze([...values]);
	}
}

export function isSQLTemplate(value: unknown): value is SQLTemplate {
	return value instanceof SQLTemplate;
}

/**
 * Tagged template for read conditions.
 *
 * Interpolated values become bound parameters, ident() values become quoted
 * identifiers, and nested sql`` fragments are spliced in.
 *
 * @example
 * const adults = sql`WHERE ${ident("age")} >= ${18}`;
 * await model.read("user", ["id", "name"], sql`${adults} ORDER BY id`, User);
 */
export function sql(strings: TemplateStringsArray, ...values: unknown[]): SQLTemplate {
	const text = [strings[0]];
	const params: unknown[] = [];

	values.forEach((value, i) => {
		const after = strings[i + 1];
		if (value instanceof SQLTemplate) {
			const [first, ...rest] = value.text;
			text[text.length - 1] += first;
			value.values.forEach((nested, j) => {
				params.push(nested);
				text.push(rest[j]);
			});
			text[text.length - 1] += after;
		} else {
			params.push(value);
			text.push(after);
		}
	});

	return new SQLTemplate(text, params);
}
