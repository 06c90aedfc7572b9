/**
 * @file user.ts
 * Schemas for user updates.
 *
 * @license Apache-2.0
 */

import { z } from "zod";
import { emailSchema, passwordSchema } from "../auth/credentials";

/**
 * Partial update of a user. Omitted fields are left untouched;
 * `full_name: null` clears the name.
 */
export const userUpdateSchema = z.object({
	email: emailSchema.optional(),
	full_name: z.string().trim().min(1).max(255).nullable().optional(),
	password: passwordSchema.optional(),
	is_active: z.boolean().optional(),
});

export type UserUpdateInput = z.input<typeof userUpdateSchema>;
export type UserUpdate = z.output<typeof userUpdateSchema>;
