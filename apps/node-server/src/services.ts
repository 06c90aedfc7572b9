/**
 * @file services.ts
 * Builds the service graph shared by the app and the server entry point.
 *
 * @license Apache-2.0
 */

import {
	type PasswordConfig,
	createAuthSystem,
	createItemService,
	createPasswordService,
	createUserService,
} from "@item-api/core";
import type { SqliteClient } from "@item-api/infrastructure";
import type { AppConfig } from "./config";

export interface ServiceDeps {
	config: AppConfig;
	db: SqliteClient;
	/** Overrides for password hashing cost */
	passwords?: Partial<PasswordConfig>;
}

/**
 * Creates services with dependency injection.
 * One password service backs both account writes and login checks.
 */
export function createServices(deps: ServiceDeps) {
	const { config, db } = deps;

	const passwordService = createPasswordService(deps.passwords);
	const users = createUserService({ db, passwordService });
	const items = createItemService({ db });
	const auth = createAuthSystem({
		codec: config.codec,
		users,
		passwords: passwordService,
		tokens: config.tokens,
	});

	return { db, users, items, auth };
}

export type Services = ReturnType<typeof createServices>;
