/**
 * @file time.ts
 * Clock helpers for token expiry arithmetic.
 *
 * @license Apache-2.0
 */

/** Current UTC time in whole unix seconds. */
export function nowInSeconds(): number {
	return Math.floor(Date.now() / 1000);
}
