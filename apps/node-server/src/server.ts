/**
 * @file server.ts
 * Process entry point: loads config, migrates, and serves the app on Node.
 *
 * @license Apache-2.0
 */

import { serve } from "@hono/node-server";
import { createDbClient, runMigrations } from "@item-api/infrastructure";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { createServices } from "./services";

async function main() {
	const config = loadConfig();
	const db = createDbClient(config.database);

	const applied = await runMigrations(db);
	if (applied.length > 0) {
		console.info(`[db] applied migrations: ${applied.join(", ")}`);
	}

	const services = createServices({ config, db });
	if (config.superuser) {
		const admin = await services.users.ensureSuperuser(
			config.superuser.email,
			config.superuser.password,
		);
		console.info(`[server] superuser ready: ${admin.email}`);
	}

	const app = createApp(config, services);
	const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
		console.info(
			`[server] ${config.name} (${config.env}) listening on port ${info.port}`,
		);
	});

	const shutdown = (signal: string) => {
		console.info(`[server] ${signal} received, shutting down`);
		server.close(() => {
			db.close();
			process.exit(0);
		});
	};
	process.on("SIGINT", () => shutdown("SIGINT"));
	process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
	console.error("[server] failed to start:", error);
	process.exit(1);
});
