/**
 * @file identity-service.ts
 * Resolves a bearer token to the user it was issued for.
 *
 * Resolution steps, each terminal on failure:
 * 1. Token present, otherwise `missing_credentials`
 * 2. Token decodes and is an access token, otherwise `invalid_token`
 * 3. Subject names an existing user, otherwise `user_not_found`
 * 4. User is active, otherwise `inactive`
 *
 * The privilege gate runs on an already authorized principal and is the only
 * place that yields `forbidden` rather than `unauthorized`.
 *
 * @license Apache-2.0
 */

import type {
	IdentityResult,
	Principal,
	PrivilegeResult,
	UserLookup,
} from "@item-api/types";
import { parseSubjectId } from "../utils/subject";
import type { TokenCodec } from "./token-codec";

/**
 * Interface defining the identity resolution API.
 */
export interface IdentityService {
	/**
	 * Resolves a bearer token to an active principal.
	 * The principal is loaded fresh from persistence on every call.
	 *
	 * @param token - Bearer token from the request, if any
	 */
	resolve(token: string | undefined): Promise<IdentityResult>;

	/**
	 * Requires the principal to be a superuser.
	 *
	 * @param principal - Principal already authorized by `resolve`
	 */
	requireSuperuser(principal: Principal): PrivilegeResult;
}

export interface IdentityServiceConfig {
	codec: TokenCodec;
	users: Pick<UserLookup, "findUserById">;
}

/**
 * Creates the identity resolver and privilege gate.
 *
 * @param config - Token codec and user lookup
 * @returns Identity service
 */
export function createIdentityService(
	config: IdentityServiceConfig,
): IdentityService {
	const { codec, users } = config;

	return {
		async resolve(token) {
			if (!token) {
				return { status: "unauthorized", reason: "missing_credentials" };
			}

			const decoded = await codec.decode(token);
			// Refresh tokens never authorize resource requests
			if (!decoded.valid || decoded.claims.type !== "access") {
				return { status: "unauthorized", reason: "invalid_token" };
			}

			const userId = parseSubjectId(decoded.claims.sub);
			if (userId === null) {
				return { status: "unauthorized", reason: "invalid_token" };
			}

			const principal = await users.findUserById(userId);
			if (!principal) {
				return { status: "unauthorized", reason: "user_not_found" };
			}

			if (!principal.isActive) {
				return { status: "unauthorized", reason: "inactive" };
			}

			return { status: "authorized", principal };
		},

		requireSuperuser(principal) {
			if (!principal.isSuperuser) {
				return { status: "forbidden", reason: "not_superuser" };
			}
			return { status: "authorized", principal };
		},
	};
}
