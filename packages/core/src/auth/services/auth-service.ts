/**
 * @file auth-service.ts
 * Login and refresh flows producing token pairs.
 *
 * Unknown email and wrong password return the same failure, and the unknown
 * email path spends a full dummy verification, so neither the body nor the
 * response time reveals whether an account exists.
 *
 * @license Apache-2.0
 */

import type {
	AuthFailureReason,
	AuthResult,
	UnauthenticatedState,
	UserLookup,
} from "@item-api/types";
import { parseSubjectId } from "../utils/subject";
import type { PasswordService } from "./password-service";
import type { TokenCodec } from "./token-codec";
import type { TokenService } from "./token-service";

/**
 * Interface defining the authentication API.
 */
export interface AuthService {
	/**
	 * Checks credentials and issues a token pair.
	 *
	 * @param email - Account email, matched case-insensitively
	 * @param password - Plain text password
	 */
	login(email: string, password: string): Promise<AuthResult>;

	/**
	 * Exchanges a refresh token for a new access/refresh pair.
	 * Both tokens are rotated; the presented refresh token stays valid until it expires.
	 *
	 * @param refreshToken - Refresh token issued by `login` or a previous `refresh`
	 */
	refresh(refreshToken: string): Promise<AuthResult>;
}

export interface AuthServiceConfig {
	users: UserLookup;
	passwords: PasswordService;
	tokens: TokenService;
	codec: TokenCodec;
}

const FAILURE_MESSAGES: Record<AuthFailureReason, string> = {
	invalid_credentials: "Incorrect email or password",
	invalid_token: "Invalid refresh token",
	inactive: "Inactive user",
};

function failure(reason: AuthFailureReason): UnauthenticatedState {
	return {
		authenticated: false,
		userId: null,
		reason,
		error: FAILURE_MESSAGES[reason],
	};
}

/**
 * Creates the authentication service.
 *
 * @param config - User lookup, password, token, and codec services
 * @returns Authentication service
 */
export function createAuthService(config: AuthServiceConfig): AuthService {
	const { users, passwords, tokens, codec } = config;

	return {
		async login(email, password) {
			const user = await users.findUserByEmail(email.trim().toLowerCase());

			// Timing-safe rejection: perform dummy PBKDF2 operation when user
			// doesn't exist to equalize response time with a real verification.
			if (!user) {
				await passwords.rejectPasswordWithConstantTime(password);
				return failure("invalid_credentials");
			}

			const isValid = await passwords.verifyPassword(
				password,
				user.passwordData,
			);
			if (!isValid) {
				return failure("invalid_credentials");
			}

			if (!user.isActive) {
				return failure("inactive");
			}

			return {
				authenticated: true,
				userId: user.id,
				tokens: await tokens.issuePair(user.id),
			};
		},

		async refresh(refreshToken) {
			const decoded = await codec.decode(refreshToken);
			if (!decoded.valid || decoded.claims.type !== "refresh") {
				return failure("invalid_token");
			}

			const userId = parseSubjectId(decoded.claims.sub);
			if (userId === null) {
				return failure("invalid_token");
			}

			const user = await users.findUserById(userId);
			if (!user) {
				return failure("invalid_token");
			}

			if (!user.isActive) {
				return failure("inactive");
			}

			return {
				authenticated: true,
				userId: user.id,
				tokens: await tokens.issuePair(user.id),
			};
		},
	};
}
