/**
 * @file token.ts
 * Schemas for signed token claims and the refresh request body.
 *
 * @license Apache-2.0
 */

import { z } from "zod";

/** Token kind discriminator. Access tokens authorize requests, refresh tokens renew pairs. */
export const tokenKindSchema = z.enum(["access", "refresh"]);

/**
 * Claim set carried by every token.
 * `exp` is in unix seconds; `jti` keeps tokens minted in the same second distinct.
 */
export const tokenClaimsSchema = z.object({
	sub: z.string().min(1),
	exp: z.number().int(),
	type: tokenKindSchema,
	jti: z.string().min(1),
});

export const refreshRequestSchema = z.object({
	refresh_token: z.string().min(1, "Refresh token is required"),
});

export type TokenKind = z.infer<typeof tokenKindSchema>;
export type TokenClaims = z.infer<typeof tokenClaimsSchema>;
export type RefreshRequest = z.infer<typeof refreshRequestSchema>;
