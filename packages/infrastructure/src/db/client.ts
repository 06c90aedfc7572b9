/**
 * @file client.ts
 * Database client factory with configuration-based setup.
 *
 * @license Apache-2.0
 */

import { type Client as SqliteClient, createClient } from "@libsql/client";

export type { SqliteClient };

/**
 * Connection settings for the libsql client.
 * @property url - `file:`, `:memory:`, or a remote `libsql://`/`https://` URL
 * @property authToken - Required for remote URLs only
 */
export interface DbConfig {
	url: string;
	authToken?: string;
}

const REMOTE_URL = /^(libsql|https?|wss?):\/\//i;

export function createDbClient(config: DbConfig): SqliteClient {
	const url = config.url.trim();
	if (!url) throw new Error("No URL");

	const authToken = config.authToken?.trim();
	if (REMOTE_URL.test(url) && !authToken) {
		throw new Error("No auth token provided");
	}

	return createClient(authToken ? { url, authToken } : { url });
}
