/**
 * @file authentication.ts
 * Core authentication types for login, refresh, and request identity.
 * Failures are values; conversion to thrown errors happens at the HTTP boundary.
 *
 * @license Apache-2.0
 */

import type {
	LoginInput,
	RegistrationInput,
	RegistrationOutput,
} from "@item-api/schemas";
import type { Principal } from "./principal";
import type { TokenPair } from "./token";

// Re-export schema types
export type { LoginInput, RegistrationInput, RegistrationOutput };

/**
 * Represents a successful login or refresh with a freshly issued pair
 */
export interface AuthenticatedState {
	authenticated: true;
	userId: number;
	tokens: TokenPair;
}

/** Internal cause of a failed login or refresh. */
export type AuthFailureReason = "invalid_credentials" | "invalid_token" | "inactive";

/**
 * Represents a failed login or refresh attempt.
 * `error` is the client-facing message; distinct reasons may share one message.
 */
export interface UnauthenticatedState {
	authenticated: false;
	userId: null;
	reason: AuthFailureReason;
	error: string;
}

/**
 * Result of a login or refresh attempt.
 */
export type AuthResult = AuthenticatedState | UnauthenticatedState;

/** Internal cause of an unauthorized request. */
export type UnauthorizedReason =
	| "missing_credentials"
	| "invalid_token"
	| "user_not_found"
	| "inactive";

/**
 * Terminal outcome of resolving a bearer token to a principal.
 */
export type IdentityResult =
	| { status: "authorized"; principal: Principal }
	| { status: "unauthorized"; reason: UnauthorizedReason };

/**
 * Outcome of the privilege gate applied to an authorized principal.
 */
export type PrivilegeResult =
	| { status: "authorized"; principal: Principal }
	| { status: "forbidden"; reason: "not_superuser" };
