/**
 * @file bearer.ts
 * Extraction of bearer credentials from the Authorization header.
 *
 * @license Apache-2.0
 */

const BEARER_PATTERN = /^Bearer[ \t]+(\S+)[ \t]*$/i;

/**
 * Pulls the token out of an `Authorization: Bearer <token>` header.
 * The scheme is matched case-insensitively.
 *
 * @param header - Raw Authorization header value
 * @returns The token, or undefined for a missing header or another scheme
 */
export function extractBearerToken(
	header: string | undefined,
): string | undefined {
	if (!header) return undefined;
	return BEARER_PATTERN.exec(header.trim())?.[1];
}
