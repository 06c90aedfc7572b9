/**
 * @file auth-handlers.ts
 * Request handlers for registration, login, refresh, and the current user.
 *
 * @license Apache-2.0
 */

import { UnauthorizedError } from "@item-api/errors";
import { refreshRequestSchema, registrationSchema } from "@item-api/schemas";
import type {
	AuthContext,
	AuthResult,
	AuthenticatedState,
	UnauthenticatedState,
} from "@item-api/types";
import type { Context } from "hono";
import type { Services } from "../services";
import {
	parseWith,
	readJsonBody,
	readLoginInput,
	readRefreshToken,
	toUserResponse,
} from "../utils";

/**
 * Type guard for successful authentication results.
 */
const isAuthenticated = (result: AuthResult): result is AuthenticatedState =>
	result.authenticated;

/** Converts a failed login or refresh into the error sent to the client. */
function toAuthError(result: UnauthenticatedState): UnauthorizedError {
	return result.reason === "inactive"
		? UnauthorizedError.inactive(result.error)
		: new UnauthorizedError(result.error);
}

export function createAuthHandlers({ users, auth }: Services) {
	return {
		/**
		 * Creates an account. Responds 201 with the new user.
		 * @throws ConflictError if the email is registered already
		 */
		async register(ctx: Context) {
			const input = parseWith(registrationSchema, await readJsonBody(ctx));
			const user = await users.createUser(input);
			console.info(`[auth] registered user ${user.id}`);
			return ctx.json(toUserResponse(user), 201);
		},

		/**
		 * Exchanges credentials for a token pair.
		 * Unknown emails and wrong passwords get the same 401.
		 */
		async login(ctx: Context) {
			const { email, password } = await readLoginInput(ctx);
			const result = await auth.auth.login(email, password);

			if (!isAuthenticated(result)) {
				console.warn(`[auth] login rejected: ${result.reason}`);
				throw toAuthError(result);
			}
			return ctx.json(result.tokens);
		},

		/**
		 * Exchanges a refresh token for a new token pair.
		 */
		async refresh(ctx: Context) {
			const { refresh_token } = parseWith(
				refreshRequestSchema,
				await readRefreshToken(ctx),
			);
			const result = await auth.auth.refresh(refresh_token);

			if (!isAuthenticated(result)) {
				console.warn(`[auth] refresh rejected: ${result.reason}`);
				throw toAuthError(result);
			}
			return ctx.json(result.tokens);
		},

		async me(ctx: AuthContext) {
			return ctx.json(toUserResponse(ctx.get("principal")));
		},
	};
}
