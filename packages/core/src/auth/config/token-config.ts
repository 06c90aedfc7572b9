/**
 * @file token-config.ts
 * Configuration for JWT token management and authentication.
 *
 * @license Apache-2.0
 */

import type { TokenConfig } from "@item-api/types";

/**
 * Default token configuration settings.
 * Uses 30 minute access tokens and 7 day refresh tokens.
 */
export const tokenConfig: TokenConfig = {
	accessTokenExpiry: 30 * 60, // 30 minutes
	refreshTokenExpiry: 7 * 24 * 3600, // 7 days
};
