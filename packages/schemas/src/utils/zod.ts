/**
 * @file zod.ts
 * Zod-specific validation utilities.
 *
 * @license Apache-2.0
 */

import type { ZodError } from "zod";

/**
 * Formats Zod validation errors into a user-friendly message string.
 * Combines all error messages with proper separation.
 *
 * @param error - Zod validation error object
 * @returns Formatted error message string
 */
export function formatZodError(error: ZodError): string {
	return error.issues.map((issue) => issue.message).join(", ");
}

/**
 * Lists each issue prefixed with the dotted path of the offending field.
 * Issues on the root value are listed without a prefix.
 */
export function listZodIssues(error: ZodError): string[] {
	return error.issues.map((issue) =>
		issue.path.length > 0
			? `${issue.path.map(String).join(".")}: ${issue.message}`
			: issue.message,
	);
}
