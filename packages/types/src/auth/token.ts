/**
 * @file token.ts
 * JWT token types and configuration for the authentication system.
 *
 * @license Apache-2.0
 */

import type { TokenClaims, TokenKind } from "@item-api/schemas";

export type { TokenClaims, TokenKind };

/**
 * Access and refresh tokens as returned to clients on login and refresh.
 */
export interface TokenPair {
	access_token: string;
	refresh_token: string;
	token_type: "bearer";
}

/** Why a token failed to decode. */
export type DecodeFailure = "expired" | "invalid";

/**
 * Outcome of decoding a token. Decoding never throws.
 */
export type DecodeResult =
	| { valid: true; claims: TokenClaims }
	| { valid: false; reason: DecodeFailure };

/**
 * JWT token lifetime settings.
 * @property accessTokenExpiry - Access token lifetime in seconds
 * @property refreshTokenExpiry - Refresh token lifetime in seconds
 */
export interface TokenConfig {
	accessTokenExpiry: number;
	refreshTokenExpiry: number;
}
