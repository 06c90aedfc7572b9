/**
 * @file item.ts
 * Schemas for item creation and updates.
 *
 * @license Apache-2.0
 */

import { z } from "zod";

const titleSchema = z
	.string()
	.trim()
	.min(1, "Title is required")
	.max(255, "Title must be at most 255 characters");

export const itemCreateSchema = z.object({
	title: titleSchema,
	description: z.string().nullish(),
});

export const itemUpdateSchema = z.object({
	title: titleSchema.optional(),
	description: z.string().nullable().optional(),
});

export type ItemCreate = z.output<typeof itemCreateSchema>;
export type ItemUpdate = z.output<typeof itemUpdateSchema>;
