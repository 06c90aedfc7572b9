/**
 * @file credentials.ts
 * Zod schemas for login and registration following NIST SP 800-63B.
 *
 * Key Requirements:
 * 1. Minimum 8 characters, maximum 64 characters for new passwords
 * 2. Unicode support with NFKC normalization
 * 3. Space normalization applied identically at registration and login
 * 4. No composition rules (special chars, mixed case, etc.)
 *
 * @license Apache-2.0
 */

import { z } from "zod";

/**
 * Canonical form of a password before it is hashed or compared.
 * NFKC folds compatibility characters and whitespace runs collapse to one space.
 * Registration, login and the configured superuser all pass through this, so
 * the same typed password always reaches the hasher as the same string.
 */
export function normalizePassword(password: string): string {
	return password.normalize("NFKC").replace(/\s+/g, " ");
}

/**
 * Email schema with normalization.
 * Trims and lower-cases before format validation so lookups are case-insensitive.
 */
export const emailSchema = z
	.string()
	.trim()
	.toLowerCase()
	.max(255, "Email is too long")
	.email("Invalid email format");

/**
 * Password schema for newly chosen secrets.
 * Length is measured after normalization.
 */
export const passwordSchema = z
	.string()
	.transform(normalizePassword)
	.pipe(
		z
			.string()
			.min(8, "Password must be at least 8 characters")
			.max(64, "Password must be at most 64 characters"),
	);

/**
 * Login credentials schema.
 * Only presence is checked on the password; strength rules apply at registration.
 */
export const loginSchema = z.object({
	email: emailSchema,
	password: z
		.string()
		.min(1, "Password is required")
		.transform(normalizePassword),
});

/**
 * Registration schema adding the optional display name.
 */
export const registrationSchema = z.object({
	email: emailSchema,
	password: passwordSchema,
	full_name: z.string().trim().min(1).max(255).nullish(),
});

/** Type for login credentials input validated by the login schema. */
export type LoginInput = z.infer<typeof loginSchema>;

/** Type for registration credentials input accepted by the registration schema. */
export type RegistrationInput = z.input<typeof registrationSchema>;

/** Type for normalized registration output returned by the registration schema. */
export type RegistrationOutput = z.output<typeof registrationSchema>;
