/**
 * @file context.ts
 * HTTP context types for the Hono framework integration.
 * Extends Hono's context types with authentication-specific additions.
 *
 * @license LGPL-3.0-or-later
 */

import type { Context } from "hono";
import type { Principal } from "../auth";

/**
 * Variables available throughout the request context.
 *
 * @property principal - User resolved from the bearer token by `requireAuth`
 */
export interface Variables {
	principal: Principal;
}

/** Hono environment shared by the app, its routers, and auth middleware. */
export interface AppEnv {
	Variables: Variables;
}

/**
 * Hono context carrying the authenticated principal.
 */
export type AuthContext = Context<AppEnv>;
