/**
 * @file db.ts
 * In-memory database and principal fixtures for service tests.
 *
 * @license Apache-2.0
 */

import {
	type SqliteClient,
	createDbClient,
	runMigrations,
} from "@item-api/infrastructure";
import type { Principal } from "@item-api/types";

/** Opens a fresh in-memory database with all migrations applied. */
export async function createTestDb(): Promise<SqliteClient> {
	const db = createDbClient({ url: ":memory:" });
	await runMigrations(db);
	return db;
}

export function makePrincipal(overrides: Partial<Principal> = {}): Principal {
	return {
		id: 1,
		email: "user@example.com",
		fullName: null,
		isActive: true,
		isSuperuser: false,
		createdAt: "2024-01-01T00:00:00Z",
		updatedAt: "2024-01-01T00:00:00Z",
		...overrides,
	};
}

/** Cheap PBKDF2 settings so tests do not spend real key-stretching time. */
export const FAST_PASSWORDS = { iterations: 1000 } as const;

export const TEST_SECRET = "test-secret-key-at-least-32-characters";
