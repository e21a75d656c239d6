import {describe, expect, test, vi} from "vitest";
import {z} from "zod";
import {TableDefinitionError} from "./errors.js";
import type {Logger} from "./logger.js";
import {defineRecord, getDBMeta, record, validateIdentifier} from "./record.js";

function mockLogger(): Logger {
	return {debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn()};
}

describe("record()", () => {
	test("columns follow declaration order and use property names verbatim", () => {
		const User = record({
			id: z.number().int(),
			Name: z.string(),
			createdAt: z.date(),
		});

		expect(User.columns.map((c) => c.column)).toEqual(["id", "Name", "createdAt"]);
		expect(User.columns.map((c) => c.field)).toEqual(["id", "Name", "createdAt"]);
	});

	test(".db.column() overrides the column name", () => {
		const User = record({
			userId: z.number().db.column("user_id"),
			name: z.string(),
		});

		expect(User.columns[0]).toMatchObject({field: "userId", column: "user_id"});
		expect(User.columns[1].column).toBe("name");
	});

	test("nested objects are flattened in place, depth first", () => {
		const Customer = record({
			id: z.number(),
			address: z.object({
				city: z.string(),
				zip: z.string().db.column("postal"),
			}),
			note: z.string(),
		});

		expect(Customer.columns.map((c) => c.column)).toEqual(["id", "city", "postal", "note"]);
		expect(Customer.columns.map((c) => c.path)).toEqual([
			["id"],
			["address", "city"],
			["address", "zip"],
			["note"],
		]);
	});

	test("derives kinds through optional and nullable wrappers", () => {
		const Sample = record({
			s: z.string().nullable(),
			n: z.number().optional(),
			b: z.bigint(),
			flag: z.boolean(),
			at: z.date(),
			tags: z.array(z.string()),
			level: z.enum(["low", "high"]),
			three: z.literal(3),
		});

		const byField = Object.fromEntries(Sample.columns.map((c) => [c.field, c]));
		expect(byField.s).toMatchObject({kind: "string", nullable: true, optional: false});
		expect(byField.n).toMatchObject({kind: "number", nullable: false, optional: true});
		expect(byField.b.kind).toBe("bigint");
		expect(byField.flag.kind).toBe("boolean");
		expect(byField.at.kind).toBe("date");
		expect(byField.tags.kind).toBe("json");
		expect(byField.level.kind).toBe("string");
		expect(byField.three.kind).toBe("number");
	});

	test("column metadata survives an outer .optional()", () => {
		const Sample = record({
			id: z.number(),
			label: z.string().db.column("title").optional(),
		});

		expect(Sample.columns[1]).toMatchObject({column: "title", optional: true});
	});

	test("encode and decode transforms are carried on the descriptor", () => {
		const encode = (value: unknown) => String(value);
		const decode = (value: unknown) => Number(value);
		const Sample = record({
			id: z.number().db.encode(encode).db.decode(decode),
		});

		expect(Sample.columns[0].encode).toBe(encode);
		expect(Sample.columns[0].decode).toBe(decode);
	});

	test("duplicate columns are kept and reported once", () => {
		const logger = mockLogger();
		const Sample = record(
			{
				a: z.string().db.column("x"),
				b: z.string().db.column("x"),
			},
			{logger},
		);

		expect(Sample.columns.map((c) => c.column)).toEqual(["x", "x"]);
		expect(logger.warn).toHaveBeenCalledWith(
			"record type maps several fields to the same column",
			{columns: ["x"]},
		);
	});

	test("no warning without duplicates", () => {
		const logger = mockLogger();
		defineRecord(z.object({a: z.string(), b: z.string()}), {logger});
		expect(logger.warn).not.toHaveBeenCalled();
	});

	test("rejects unsafe column names", () => {
		expect(() => z.string().db.column("bad;name")).toThrow(TableDefinitionError);
		expect(() => z.string().db.column("bad`name")).toThrow(TableDefinitionError);
	});
});

describe("getDBMeta()", () => {
	test(".db methods never modify the schema they are called on", () => {
		const base = z.string();
		const named = base.db.column("a");

		expect(getDBMeta(base)).toEqual({});
		expect(getDBMeta(named).column).toBe("a");
	});

	test("metadata survives refinements chained after .db", () => {
		const encode = (value: unknown) => String(value).trim();
		const User = record({
			id: z.number().db.column("user_id").int(),
			name: z.string().db.column("display_name").max(64),
			note: z
				.string()
				.db.encode(encode)
				.refine((value) => value.length > 0),
		});

		expect(User.columns.map((c) => c.column)).toEqual(["user_id", "display_name", "note"]);
		expect(User.columns[2].encode).toBe(encode);
	});

	test("user metadata outside the db key is kept", () => {
		const schema = z.string().meta({description: "shown name"}).db.column("display_name");

		expect(schema.meta()).toEqual({description: "shown name", db: {column: "display_name"}});
	});

	test("later calls merge over earlier ones", () => {
		const decode = (value: unknown) => value;
		const schema = z.string().db.column("a").db.decode(decode).db.column("b");

		expect(getDBMeta(schema)).toEqual({column: "b", decode});
	});
});

describe("validateIdentifier()", () => {
	test("accepts plain and qualified names", () => {
		expect(() => validateIdentifier("user", "table")).not.toThrow();
		expect(() => validateIdentifier("shop.user", "table")).not.toThrow();
	});

	test("rejects empty names, control characters, semicolons and backticks", () => {
		expect(() => validateIdentifier("", "table")).toThrow("names cannot be empty");
		expect(() => validateIdentifier("a\nb", "column")).toThrow("control characters");
		expect(() => validateIdentifier("a;b", "column")).toThrow("semicolons");
		expect(() => validateIdentifier("a`b", "table")).toThrow("backticks");
	});
});
