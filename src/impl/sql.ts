/**
 * SQL rendering utilities for the MySQL dialect.
 *
 * This is the single source of truth for:
 * - Identifier quoting
 * - Template rendering (read conditions)
 */

import {isSQLIdentifier, type SQLTemplate} from "./template.js";

/**
 * Quote an identifier with MySQL backticks.
 */
export function quoteIdent(name: string): string {
	return `\`${name.replace(/`/g, "``")}\``;
}

/**
 * Quote a possibly schema-qualified name, one segment at a time.
 *
 * @example
 * quoteQualified("shop.user") // "`shop`.`user`"
 */
export function quoteQualified(name: string): string {
	return name.split(".").map(quoteIdent).join(".");
}

/**
 * Render a sql`` fragment to SQL text with `?` placeholders.
 * Identifiers are inlined; other values become parameters.
 */
export function renderSQL(template: SQLTemplate): {
	sql: string;
	params: unknown[];
} {
	const params: unknown[] = [];
	const sql = template.values.reduce<string>((text, value, i) => {
		const next = template.text[i + 1];
		if (isSQLIdentifier(value)) return text + quoteQualified(value.name) + next;
		params.push(value);
		return text + "?" + next;
	}, template.text[0]);

	return {sql, params};
}
