/**
 * @file index.ts
 * Exports infrastructure database components.
 *
 * @license Apache-2.0
 */

export {
	createDbClient,
	type DbConfig,
	type SqliteClient,
} from "./client";
export { DEFAULT_MIGRATIONS_DIR, runMigrations } from "./migrate";
