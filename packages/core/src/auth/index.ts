/**
 * @file index.ts
 * Main entry point for authentication system core functionality.
 * Wires the codec, issuer, resolver and login flows around one user lookup.
 *
 * @license Apache-2.0
 */

import type { TokenConfig, UserLookup } from "@item-api/types";
import { createRequireAuth, createRequireSuperuser } from "./middleware";
import {
	type PasswordConfig,
	type PasswordService,
	type TokenCodecConfig,
	createAuthService,
	createIdentityService,
	createPasswordService,
	createTokenCodec,
	createTokenService,
} from "./services";

/**
 * Configuration for the authentication system.
 */
export interface AuthSystemConfig {
	/** Signing algorithm and key material */
	codec: TokenCodecConfig;
	/** Persistence lookups for principals */
	users: UserLookup;
	/** Shared password service, or settings for a new one */
	passwords?: PasswordService | Partial<PasswordConfig>;
	/** Token lifetime overrides in seconds */
	tokens?: Partial<TokenConfig>;
}

const isPasswordService = (
	value: PasswordService | Partial<PasswordConfig>,
): value is PasswordService => "verifyPassword" in value;

/**
 * Creates configured authentication system.
 * The codec is selected once here and shared by issuing and resolving.
 *
 * @param config - Codec, user lookup and optional overrides
 * @returns Configured authentication system
 */
export function createAuthSystem(config: AuthSystemConfig) {
	const { users } = config;
	const passwordOption = config.passwords ?? {};
	const passwords = isPasswordService(passwordOption)
		? passwordOption
		: createPasswordService(passwordOption);

	const codec = createTokenCodec(config.codec);
	const tokens = createTokenService({ codec, ...config.tokens });
	const identity = createIdentityService({ codec, users });
	const auth = createAuthService({ users, passwords, tokens, codec });

	return {
		passwords,
		codec,
		tokens,
		identity,
		auth,
		requireAuth: createRequireAuth({ identity }),
		requireSuperuser: createRequireSuperuser({ identity }),
	};
}

export type AuthSystem = ReturnType<typeof createAuthSystem>;

export * from "./config";
export * from "./middleware";
export * from "./services";
export * from "./utils";
