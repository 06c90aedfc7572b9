/**
 * @file app.ts
 * Main application setup with route definitions and middleware configuration.
 *
 * @license LGPL-3.0-or-later
 */

import {
	AppError,
	NotFoundError,
	type ErrorBody,
	toErrorBody,
} from "@item-api/errors";
import type { AppEnv } from "@item-api/types";
import { Hono } from "hono";
import { cors } from "hono/cors";
import { HTTPException } from "hono/http-exception";
import { logger } from "hono/logger";
import { APP_VERSION, type AppConfig } from "./config";
import {
	createAuthHandlers,
	createHealthHandlers,
	createItemHandlers,
	createUserHandlers,
} from "./handlers";
import type { Services } from "./services";

/**
 * Creates the Hono application.
 *
 * @param config - Validated application config
 * @param services - Service graph from `createServices`
 */
export function createApp(config: AppConfig, services: Services) {
	const app = new Hono<AppEnv>();
	const { requireAuth, requireSuperuser } = services.auth;

	const auth = createAuthHandlers(services);
	const users = createUserHandlers(services);
	const items = createItemHandlers(services);
	const health = createHealthHandlers(services);

	// Global middleware
	if (config.env !== "test") {
		app.use("*", logger());
	}
	app.use(
		"*",
		cors({
			origin: [...config.corsOrigins],
			credentials: true,
			allowMethods: ["GET", "POST", "PATCH", "DELETE", "OPTIONS"],
			allowHeaders: ["Authorization", "Content-Type"],
		}),
	);

	app.get("/", (ctx) =>
		ctx.json({ name: config.name, version: APP_VERSION, docs: "disabled" }),
	);

	const api = new Hono<AppEnv>();

	api.get("/health", health.health);
	api.get("/health/ready", health.ready);

	// Authentication endpoints
	api.post("/auth/register", auth.register);
	api.post("/auth/login", auth.login);
	api.post("/auth/refresh", auth.refresh);
	api.get("/auth/me", requireAuth, auth.me);

	// Users
	api.get("/users", requireAuth, requireSuperuser, users.list);
	api.get("/users/:id", requireAuth, users.get);
	api.patch("/users/:id", requireAuth, users.update);
	api.delete("/users/:id", requireAuth, requireSuperuser, users.remove);

	// Items
	api.get("/items", requireAuth, items.list);
	api.post("/items", requireAuth, items.create);
	api.get("/items/:id", requireAuth, items.get);
	api.patch("/items/:id", requireAuth, items.update);
	api.delete("/items/:id", requireAuth, items.remove);

	app.route("/api/v1", api);

	app.notFound((ctx) => ctx.json(toErrorBody(new NotFoundError("Route")), 404));

	app.onError((error, ctx) => {
		if (error instanceof AppError) {
			return ctx.json(toErrorBody(error), error.statusCode);
		}
		if (error instanceof HTTPException) {
			return error.getResponse();
		}

		console.error(`[http] ${ctx.req.method} ${ctx.req.path} failed:`, error);
		const body: ErrorBody = {
			error: "Internal server error",
			code: "INTERNAL_ERROR",
		};
		if (config.debug) {
			body.detail = [error.message];
		}
		return ctx.json(body, 500);
	});

	return app;
}
