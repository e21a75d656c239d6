import {describe, expect, test} from "vitest";
import {quoteIdent, quoteQualified, renderSQL} from "./sql.js";
import {ident, isSQLIdentifier, isSQLTemplate, sql} from "./template.js";

describe("quoting", () => {
	test("wraps identifiers in backticks and doubles embedded ones", () => {
		expect(quoteIdent("user")).toBe("`user`");
		expect(quoteIdent("a`b")).toBe("`a``b`");
	});

	test("quotes each segment of a qualified name", () => {
		expect(quoteQualified("shop.user")).toBe("`shop`.`user`");
	});
});

describe("sql``", () => {
	test("values become parameters and identifiers are quoted", () => {
		const condition = sql`WHERE ${ident("age")} >= ${18} AND name = ${"a"}`;

		expect(renderSQL(condition)).toEqual({
			sql: "WHERE `age` >= ? AND name = ?",
			params: [18, "a"],
		});
	});

	test("nested templates are spliced in", () => {
		const where = sql`WHERE id > ${1}`;
		const condition = sql`${where} ORDER BY id`;

		expect(renderSQL(condition)).toEqual({
			sql: "WHERE id > ? ORDER BY id",
			params: [1],
		});
	});

	test("values on both sides of a nested fragment keep their order", () => {
		const range = sql`${ident("id")} BETWEEN ${1} AND ${5}`;
		const condition = sql`WHERE ${range} AND name <> ${"x"}`;

		expect(condition.text).toEqual(["WHERE ", " BETWEEN ", " AND ", " AND name <> ", ""]);
		expect(renderSQL(condition)).toEqual({
			sql: "WHERE `id` BETWEEN ? AND ? AND name <> ?",
			params: [1, 5, "x"],
		});
	});

	test("a template without values renders as-is", () => {
		expect(renderSQL(sql`ORDER BY id DESC`)).toEqual({sql: "ORDER BY id DESC", params: []});
	});

	test("only sql`` results count as templates", () => {
		expect(isSQLTemplate(sql`x`)).toBe(true);
		expect(isSQLTemplate(["x"])).toBe(false);
		expect(isSQLTemplate("x")).toBe(false);
	});

	test("only ident() markers count as identifiers", () => {
		expect(isSQLIdentifier(ident("id"))).toBe(true);
		expect(isSQLIdentifier({name: "id"})).toBe(false);
		expect(isSQLIdentifier(null)).toBe(false);
	});
});
