/**
 * @file migrate.ts
 * Applies the SQL files under `migrations/` in name order.
 * Applied file names are recorded so each migration runs once per database.
 *
 * @license Apache-2.0
 */

import { readFile, readdir } from "node:fs/promises";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import type { SqliteClient } from "./client";

/** Directory holding the bundled migrations. */
export const DEFAULT_MIGRATIONS_DIR = fileURLToPath(
	new URL("../../migrations/", import.meta.url),
);

const quoteLiteral = (value: string) => `'${value.replace(/'/g, "''")}'`;

/**
 * Applies one migration file and records it in a single transaction.
 * A failure part way through leaves neither the schema change nor the record.
 */
async function applyMigration(
	client: SqliteClient,
	name: string,
	sql: string,
): Promise<void> {
	try {
		await client.executeMultiple(
			`BEGIN;\n${sql}\n;INSERT INTO _migrations (name) VALUES (${quoteLiteral(name)});\nCOMMIT;`,
		);
	} catch (error) {
		try {
			await client.execute("ROLLBACK");
		} catch (rollbackError) {
			console.error(`[migrate] rollback of ${name} failed:`, rollbackError);
		}
		throw error;
	}
}

/**
 * Runs every pending migration against the given database.
 *
 * @param client - Open database client
 * @param directory - Directory of `.sql` files
 * @returns Names of the migrations applied by this call
 */
export async function runMigrations(
	client: SqliteClient,
	directory: string = DEFAULT_MIGRATIONS_DIR,
): Promise<string[]> {
	await client.execute(`CREATE TABLE IF NOT EXISTS _migrations (
		name TEXT PRIMARY KEY,
		applied_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
	)`);

	const result = await client.execute("SELECT name FROM _migrations");
	const applied = new Set(result.rows.map((row) => String(row.name)));

	const files = (await readdir(directory))
		.filter((name) => name.endsWith(".sql"))
		.sort();

	const ran: string[] = [];
	for (const name of files) {
		if (applied.has(name)) continue;

		const sql = await readFile(join(directory, name), "utf8");
		await applyMigration(client, name, sql);
		ran.push(name);
	}

	return ran;
}
