/**
 * @file require-auth.ts
 * Authentication middleware that validates bearer tokens.
 * Sets the resolved principal on the context for downstream handlers.
 *
 * @license Apache-2.0
 */

import {
	ForbiddenError,
	UnauthorizedError,
	toErrorBody,
} from "@item-api/errors";
import type { AppEnv, UnauthorizedReason } from "@item-api/types";
import { createMiddleware } from "hono/factory";
import type { IdentityService } from "../services/identity-service";
import { extractBearerToken } from "../utils/bearer";

/**
 * Dependencies for the authentication middleware factories.
 */
export interface RequireAuthDeps {
	identity: IdentityService;
}

/**
 * Maps an internal rejection reason to the error sent to clients.
 * Missing, invalid, and unknown-user failures share one message.
 */
function toUnauthorizedError(reason: UnauthorizedReason): UnauthorizedError {
	return reason === "inactive"
		? UnauthorizedError.inactive()
		: new UnauthorizedError();
}

/**
 * Creates middleware that requires a valid access token for an active user.
 * Responds 401 with a `WWW-Authenticate: Bearer` challenge otherwise.
 *
 * @param deps - Identity service used to resolve the token
 * @returns Hono middleware
 */
export function createRequireAuth(deps: RequireAuthDeps) {
	return createMiddleware<AppEnv>(async (ctx, next) => {
		const token = extractBearerToken(ctx.req.header("Authorization"));
		const result = await deps.identity.resolve(token);

		if (result.status === "unauthorized") {
			console.warn(`[auth] ${ctx.req.method} ${ctx.req.path} rejected: ${result.reason}`);
			return ctx.json(toErrorBody(toUnauthorizedError(result.reason)), 401, {
				"WWW-Authenticate": "Bearer",
			});
		}

		ctx.set("principal", result.principal);
		return next();
	});
}

/**
 * Creates middleware that requires the authenticated principal to be a superuser.
 * Must run after `requireAuth`; responds 403 for authenticated non-superusers.
 *
 * @param deps - Identity service providing the privilege gate
 * @returns Hono middleware
 */
export function createRequireSuperuser(deps: RequireAuthDeps) {
	return createMiddleware<AppEnv>(async (ctx, next) => {
		const principal = ctx.get("principal");
		if (!principal) {
			return ctx.json(toErrorBody(new UnauthorizedError()), 401, {
				"WWW-Authenticate": "Bearer",
			});
		}

		const result = deps.identity.requireSuperuser(principal);
		if (result.status === "forbidden") {
			console.warn(`[auth] user ${principal.id} forbidden: ${result.reason}`);
			return ctx.json(toErrorBody(new ForbiddenError()), 403);
		}

		return next();
	});
}
