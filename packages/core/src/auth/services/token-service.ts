/**
 * @file token-service.ts
 * Issues access and refresh tokens for authenticated users.
 * Stateless: tokens are built from the subject and the configured lifetimes only.
 *
 * @license Apache-2.0
 */

import type { TokenClaims, TokenKind } from "@item-api/schemas";
import type { TokenConfig, TokenPair } from "@item-api/types";
import { nanoid } from "nanoid";
import { tokenConfig } from "../config";
import { nowInSeconds } from "../utils/time";
import type { TokenCodec } from "./token-codec";

/**
 * Interface defining the token issuing API.
 */
export interface TokenService {
	/**
	 * Issues an access token.
	 *
	 * @param subjectId - The authenticated user's ID
	 * @param ttlSeconds - Lifetime override; defaults to the configured access expiry
	 * @returns Signed access token
	 */
	issueAccess(subjectId: number, ttlSeconds?: number): Promise<string>;

	/**
	 * Issues a refresh token with the configured refresh expiry.
	 *
	 * @param subjectId - The authenticated user's ID
	 * @returns Signed refresh token
	 */
	issueRefresh(subjectId: number): Promise<string>;

	/**
	 * Issues a fresh access/refresh pair in wire format.
	 *
	 * @param subjectId - The authenticated user's ID
	 */
	issuePair(subjectId: number): Promise<TokenPair>;
}

/**
 * Configuration options for token service.
 */
export interface TokenServiceConfig extends Partial<TokenConfig> {
	/** Codec that signs the issued claims */
	codec: TokenCodec;
}

/**
 * Creates a configured token issuing service.
 *
 * @param config - Codec and optional lifetime overrides in seconds
 * @returns Token service
 */
export function createTokenService(config: TokenServiceConfig): TokenService {
	const { codec, ...lifetimes } = config;
	const resolvedConfig: TokenConfig = { ...tokenConfig, ...lifetimes };

	function buildClaims(
		subjectId: number,
		type: TokenKind,
		ttlSeconds: number,
	): TokenClaims {
		return {
			sub: String(subjectId),
			exp: nowInSeconds() + ttlSeconds,
			type,
			jti: nanoid(),
		};
	}

	async function issueAccess(
		subjectId: number,
		ttlSeconds = resolvedConfig.accessTokenExpiry,
	): Promise<string> {
		return codec.encode(buildClaims(subjectId, "access", ttlSeconds));
	}

	async function issueRefresh(subjectId: number): Promise<string> {
		return codec.encode(
			buildClaims(subjectId, "refresh", resolvedConfig.refreshTokenExpiry),
		);
	}

	async function issuePair(subjectId: number): Promise<TokenPair> {
		const [accessToken, refreshToken] = await Promise.all([
			issueAccess(subjectId),
			issueRefresh(subjectId),
		]);

		return {
			access_token: accessToken,
			refresh_token: refreshToken,
			token_type: "bearer",
		};
	}

	return { issueAccess, issueRefresh, issuePair };
}
