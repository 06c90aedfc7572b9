/**
 * @file subject.ts
 * Conversion between user IDs and the string `sub` claim.
 *
 * @license Apache-2.0
 */

/**
 * Parses a token subject as a user ID.
 * Only canonical positive integers are accepted.
 *
 * @param sub - Subject claim
 * @returns The user ID, or null when the subject is not one
 */
export function parseSubjectId(sub: string): number | null {
	if (!/^[1-9]\d*$/.test(sub)) return null;
	const id = Number(sub);
	return Number.isSafeInteger(id) ? id : null;
}
