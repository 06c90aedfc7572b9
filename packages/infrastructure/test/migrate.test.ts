/**
 * @file migrate.test.ts
 * Tests for SQL migrations against an in-memory database.
 *
 * @license Apache-2.0
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createClient } from "@libsql/client";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { SqliteClient } from "../src/db/client";
import { runMigrations } from "../src/db/migrate";

describe("runMigrations", () => {
	let client: SqliteClient;

	beforeEach(() => {
		client = createClient({ url: ":memory:" });
	});

	afterEach(() => {
		client.close();
	});

	it("should apply bundled migrations in order", async () => {
		const applied = await runMigrations(client);

		expect(applied).toEqual([
			"0001_create_users.sql",
			"0002_create_items.sql",
		]);
	});

	it("should create the users and items tables", async () => {
		await runMigrations(client);

		const result = await client.execute(
			"SELECT name FROM sqlite_master WHERE type = 'table' AND name IN ('users', 'items') ORDER BY name",
		);
		expect(result.rows.map((row) => row.name)).toEqual(["items", "users"]);
	});

	it("should not re-apply migrations", async () => {
		await runMigrations(client);
		const second = await runMigrations(client);

		expect(second).toEqual([]);
	});

	it("should default new users to active non-superusers", async () => {
		await runMigrations(client);
		await client.execute({
			sql: "INSERT INTO users (email, password_data) VALUES (?, ?)",
			args: ["user@example.com", "digest"],
		});

		const result = await client.execute(
			"SELECT is_active, is_superuser FROM users WHERE email = 'user@example.com'",
		);
		expect(result.rows[0]?.is_active).toBe(1);
		expect(result.rows[0]?.is_superuser).toBe(0);
	});

	describe("when a migration fails", () => {
		let directory: string;

		beforeEach(async () => {
			directory = await mkdtemp(join(tmpdir(), "migrations-"));
			await writeFile(
				join(directory, "0001_create_tags.sql"),
				"CREATE TABLE tags (id INTEGER PRIMARY KEY);",
			);
			await writeFile(
				join(directory, "0002_create_notes.sql"),
				"CREATE TABLE notes (id INTEGER PRIMARY KEY);\nINSERT INTO missing_table VALUES (1);",
			);
		});

		afterEach(async () => {
			await rm(directory, { recursive: true, force: true });
		});

		it("should roll back the failing file and leave it unrecorded", async () => {
			await expect(runMigrations(client, directory)).rejects.toThrow();

			const tables = await client.execute(
				"SELECT name FROM sqlite_master WHERE type = 'table' AND name IN ('tags', 'notes')",
			);
			expect(tables.rows.map((row) => row.name)).toEqual(["tags"]);

			const recorded = await client.execute("SELECT name FROM _migrations");
			expect(recorded.rows.map((row) => row.name)).toEqual([
				"0001_create_tags.sql",
			]);
		});

		it("should apply the file once it is fixed", async () => {
			await expect(runMigrations(client, directory)).rejects.toThrow();
			await writeFile(
				join(directory, "0002_create_notes.sql"),
				"CREATE TABLE notes (id INTEGER PRIMARY KEY);",
			);

			await expect(runMigrations(client, directory)).resolves.toEqual([
				"0002_create_notes.sql",
			]);
		});
	});
});
