import {beforeEach, describe, expect, test, vi} from "vitest";
import {
	ConfigurationError,
	InputShapeError,
	Model,
	PoolRegistry,
	StatementError,
	ident,
	loadConfig,
	record,
	sql,
	z,
	type Logger,
} from "../src/rowbind.js";
import {MemoryDriver} from "../src/impl/test-driver.js";

const DSN = "mysql://app:test-secret@db/shop";

const User = record({
	id: z.number().int(),
	name: z.string().max(64),
});

function mockLogger(): Logger {
	return {debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn()};
}

async function rejection(promise: Promise<unknown>): Promise<unknown> {
	try {
		await promise;
	} catch (error) {
		return error;
	}
	throw new Error("expected a rejection");
}

function inserts(driver: MemoryDriver): number {
	return driver.statements.filter((s) => s.sql.startsWith("INSERT")).length;
}

describe("Model", () => {
	let driver: MemoryDriver;
	let pools: PoolRegistry;
	let logger: Logger;
	let model: Model;

	beforeEach(async () => {
		driver = new MemoryDriver();
		logger = mockLogger();
		pools = new PoolRegistry({connect: () => driver, logger});
		model = new Model(pools, {driverName: "mysql", dataSourceName: DSN, logger});
		await model.execRaw("CREATE TABLE user (id INT PRIMARY KEY, name VARCHAR(64))");
		driver.statements.length = 0;
	});

	test("update then read returns the records in key order", async () => {
		const affected = await model.update("user", User, [
			{id: 2, name: "b"},
			{id: 1, name: "a"},
		]);

		const users = await model.read("user", ["id", "name"], "", User);

		expect(affected).toBe(2);
		expect(users).toEqual([
			{id: 1, name: "a"},
			{id: 2, name: "b"},
		]);
		expect(model.records).toEqual(users);
		expect(model.rows).toEqual([
			[1, "a"],
			[2, "b"],
		]);
		expect(model.skipped).toEqual([]);
	});

	test("reading twice without writes gives the same result", async () => {
		await model.update("user", User, [
			{id: 1, name: "a"},
			{id: 2, name: "b"},
		]);

		const first = await model.read("user", ["id", "name"], "", User);
		const second = await model.read("user", ["id", "name"], "", User);

		expect(second).toEqual(first);
	});

	test("a chunk's worth of records is one statement, one more is two", async () => {
		model.configure("mysql", DSN, 3);

		await model.create("user", User, [
			{id: 1, name: "a"},
			{id: 2, name: "b"},
			{id: 3, name: "c"},
		]);
		expect(inserts(driver)).toBe(1);

		await model.create("user", User, [
			{id: 10, name: "j"},
			{id: 11, name: "k"},
			{id: 12, name: "l"},
			{id: 13, name: "m"},
		]);
		expect(inserts(driver)).toBe(3);
	});

	test("create keeps the first value, update takes the second", async () => {
		expect(await model.create("user", User, [{id: 1, name: "a"}])).toBe(1);
		expect(await model.create("user", User, [{id: 1, name: "z"}])).toBe(0);
		expect(await model.read("user", ["id", "name"], "", User)).toEqual([{id: 1, name: "a"}]);

		expect(await model.update("user", User, [{id: 1, name: "z"}])).toBe(2);
		expect(await model.read("user", ["id", "name"], "", User)).toEqual([{id: 1, name: "z"}]);
	});

	test("records that are not an array are rejected before any SQL", async () => {
		const error = await rejection(model.update("user", User, JSON.parse('{"id": 1, "name": "a"}')));

		expect(error).toBeInstanceOf(InputShapeError);
		expect(driver.statements).toEqual([]);
	});

	test("reads with a parameterized condition", async () => {
		await model.update("user", User, [
			{id: 1, name: "a"},
			{id: 2, name: "b"},
			{id: 3, name: "c"},
		]);

		const users = await model.read(
			"user",
			["id", "name"],
			sql`WHERE ${ident("id")} > ${1} ORDER BY id DESC`,
			User,
		);

		expect(users.map((u) => u.id)).toEqual([3, 2]);
		expect(driver.statements[driver.statements.length - 1]).toEqual({
			sql: "SELECT `id`, `name` FROM `user` WHERE `id` > ? ORDER BY id DESC",
			params: [1],
		});
	});

	test("renamed columns stay renamed through refinements", async () => {
		const Account = record({
			id: z.number().db.column("account_id").int(),
			name: z.string().db.column("display_name").max(64),
		});
		await model.execRaw("CREATE TABLE account (account_id INT PRIMARY KEY, display_name VARCHAR(64))");

		await model.update("account", Account, [{id: 1, name: "a"}]);

		expect(driver.statements[driver.statements.length - 1].sql).toBe(
			"INSERT INTO `account` (`account_id`, `display_name`) VALUES (?, ?) " +
				"ON DUPLICATE KEY UPDATE `account_id` = VALUES(`account_id`), `display_name` = VALUES(`display_name`)",
		);
		expect(await model.read("account", [], "", Account)).toEqual([{id: 1, name: "a"}]);
	});

	test("the returned records are the caller's own copy", async () => {
		await model.update("user", User, [{id: 1, name: "a"}]);

		const users = await model.read("user", ["id", "name"], "", User);
		users.push({id: 2, name: "b"});
		users.splice(0, 1);

		expect(model.records).toEqual([{id: 1, name: "a"}]);
	});

	test("an empty column list selects the record type's columns", async () => {
		await model.update("user", User, [{id: 1, name: "a"}]);

		expect(await model.read("user", [], "", User)).toEqual([{id: 1, name: "a"}]);
	});

	test("unscannable rows are skipped and the result replaces the last one", async () => {
		const Loose = record({id: z.number(), name: z.string().nullable()});
		await model.update("user", Loose, [
			{id: 1, name: "a"},
			{id: 2, name: null},
		]);

		const strict = await model.read("user", ["id", "name"], "", User);
		expect(strict).toEqual([{id: 1, name: "a"}]);
		expect(model.skipped).toHaveLength(1);
		expect(model.skipped[0]).toMatchObject({row: 1, column: "name"});
		expect(logger.warn).toHaveBeenCalledTimes(1);

		const loose = await model.read("user", ["id", "name"], "", Loose);
		expect(loose).toEqual([
			{id: 1, name: "a"},
			{id: 2, name: null},
		]);
		expect(model.records).toEqual(loose);
		expect(model.skipped).toEqual([]);
	});

	test("a failed read leaves the last result in place", async () => {
		await model.update("user", User, [{id: 1, name: "a"}]);
		await model.read("user", ["id", "name"], "", User);

		const error = await rejection(model.read("nope", ["id"], "", User));

		expect(error).toBeInstanceOf(StatementError);
		expect(model.records).toEqual([{id: 1, name: "a"}]);
	});

	test("structured, boolean and bigint fields round-trip", async () => {
		const Profile = record({
			id: z.number(),
			tags: z.array(z.string()),
			active: z.boolean(),
			score: z.bigint(),
		});
		await model.execRaw(
			"CREATE TABLE profile (id INT PRIMARY KEY, tags JSON, active TINYINT, score BIGINT)",
		);

		await model.update("profile", Profile, [
			{id: 1, tags: ["a", "b"], active: true, score: 9007199254740993n},
		]);

		expect(driver.dump("profile")).toEqual([[1, '["a","b"]', 1, "9007199254740993"]]);
		expect(await model.read("profile", [], "", Profile)).toEqual([
			{id: 1, tags: ["a", "b"], active: true, score: 9007199254740993n},
		]);
	});

	test("cleanup() deletes rows older than the cutoff", async () => {
		const Event = record({id: z.number(), created_at: z.date()});
		await model.execRaw("CREATE TABLE event (id INT PRIMARY KEY, created_at DATETIME)");
		await model.create("event", Event, [
			{id: 1, created_at: new Date("2024-01-01T00:00:00Z")},
			{id: 2, created_at: new Date("2024-01-03T00:00:00Z")},
		]);

		const removed = await model.cleanup("event", "created_at", new Date("2024-01-02T00:00:00Z"));

		expect(removed).toBe(1);
		expect(logger.info).toHaveBeenCalledWith("cleanup removed outdated records", {
			table: "event",
			rowsAffected: 1,
		});
		expect(driver.statements[driver.statements.length - 1].sql).toBe(
			"DELETE FROM `event` WHERE `created_at` < ?",
		);
		expect(await model.read("event", [], "", Event)).toEqual([
			{id: 2, created_at: new Date("2024-01-03T00:00:00Z")},
		]);
	});

	test("cleanup() accepts a numeric cutoff", async () => {
		const Event = record({id: z.number(), created_at: z.number()});
		await model.execRaw("CREATE TABLE event (id INT PRIMARY KEY, created_at BIGINT)");
		await model.create("event", Event, [
			{id: 1, created_at: 100},
			{id: 2, created_at: 200},
			{id: 3, created_at: 300},
		]);

		expect(await model.cleanup("event", "created_at", 250)).toBe(2);
	});

	test("info() reports the server version", async () => {
		expect(await model.info()).toEqual(["system db version: 8.0.36"]);
	});

	test("models with the same identity share one pool", async () => {
		const other = new Model(pools, {driverName: "mysql", dataSourceName: DSN, logger});

		await other.info();

		expect(pools.size).toBe(1);
	});

	describe("configuration", () => {
		test("an unknown driver is fatal", async () => {
			model.configure("postgres", DSN);

			const error = await rejection(model.info());

			expect(error).toBeInstanceOf(ConfigurationError);
			expect(error).toMatchObject({fatal: true});
		});

		test("an empty data source is reported", async () => {
			const empty = new Model(pools, {driverName: "mysql", dataSourceName: "", logger});

			const error = await rejection(empty.update("user", User, [{id: 1, name: "a"}]));

			expect(error).toBeInstanceOf(ConfigurationError);
			expect(error).toMatchObject({fatal: false, message: "data source of the model is not set"});
		});

		test("a negative batch size is reported on first use", async () => {
			model.configure("mysql", DSN, -1);

			const error = await rejection(model.create("user", User, [{id: 1, name: "a"}]));

			expect(error).toBeInstanceOf(ConfigurationError);
			expect(driver.statements).toEqual([]);
		});

		test("fromConfig() takes the identity from the environment", async () => {
			const config = loadConfig({env: {ROWBIND_DSN: DSN, ROWBIND_BATCH_SIZE: "2"}});
			const configured = Model.fromConfig(pools, config, logger);

			await configured.create("user", User, [
				{id: 1, name: "a"},
				{id: 2, name: "b"},
				{id: 3, name: "c"},
			]);

			expect(configured.batchSize).toBe(2);
			expect(inserts(driver)).toBe(2);
		});

		test("fromConfig() without a logger logs at the configured level", async () => {
			const log = vi.spyOn(console, "log").mockImplementation(() => {});
			const config = loadConfig({env: {ROWBIND_DSN: DSN, LOG_LEVEL: "warn"}});
			const configured = Model.fromConfig(pools, config);

			await configured.execRaw("CREATE TABLE event (id INT PRIMARY KEY, at BIGINT)");
			await configured.cleanup("event", "at", 0);

			expect(log).not.toHaveBeenCalled();
			log.mockRestore();
		});
	});
});
