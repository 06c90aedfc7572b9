/**
 * @file health-handlers.ts
 * Liveness and readiness probes.
 *
 * @license Apache-2.0
 */

import type { Context } from "hono";
import type { Services } from "../services";

export function createHealthHandlers({ db }: Services) {
	return {
		health: (ctx: Context) => ctx.json({ status: "healthy" }),

		/** Ready once the database answers a trivial query. */
		async ready(ctx: Context) {
			try {
				await db.execute("SELECT 1");
			} catch (error) {
				console.error("[health] database not reachable:", error);
				return ctx.json({ status: "unavailable" }, 503);
			}
			return ctx.json({ status: "ready" });
		},
	};
}
