/**
 * @file crypto.ts
 * Exports cryptographic auth utilities.
 *
 * @license Apache-2.0
 */

import { timingSafeEqual } from "node:crypto";

/**
 * Constant-time equality comparison of two byte sequences.
 * Inputs are padded to a common length so the comparison always runs,
 * preventing timing side-channels from leaking input lengths.
 *
 * @param a - First value to compare
 * @param b - Second value to compare
 * @returns True if both sequences are byte-for-byte equal
 */
export function constantTimeEqual(a: Uint8Array, b: Uint8Array): boolean {
	const lengthsMatch = a.byteLength === b.byteLength;

	const maxLen = Math.max(a.byteLength, b.byteLength) || 1;
	const aPadded = new Uint8Array(maxLen);
	aPadded.set(a);
	const bPadded = new Uint8Array(maxLen);
	bPadded.set(b);

	const contentsMatch = timingSafeEqual(aPadded, bPadded);
	return lengthsMatch && contentsMatch;
}
