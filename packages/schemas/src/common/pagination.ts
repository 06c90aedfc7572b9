/**
 * @file pagination.ts
 * Query-string schemas shared by list and resource endpoints.
 *
 * @license Apache-2.0
 */

import { z } from "zod";

/** `skip`/`limit` query parameters. Limit is capped at 100. */
export const paginationSchema = z.object({
	skip: z.coerce.number().int().min(0, "skip must be >= 0").default(0),
	limit: z.coerce
		.number()
		.int()
		.min(1, "limit must be >= 1")
		.max(100, "limit must be <= 100")
		.default(20),
});

/** Positive integer resource identifier taken from a path segment. */
export const idParamSchema = z.coerce
	.number()
	.int()
	.positive("Identifier must be a positive integer");

export type Pagination = z.output<typeof paginationSchema>;
