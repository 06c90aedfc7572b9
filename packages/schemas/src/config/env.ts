/**
 * @file env.ts
 * Environment variable schema for the server process.
 * Values arrive as strings and are coerced to their runtime types here.
 *
 * @license Apache-2.0
 */

import { z } from "zod";
import { emailSchema, passwordSchema } from "../auth/credentials";

/** Minimum length accepted for HMAC signing secrets. */
export const MIN_SECRET_LENGTH = 32;

export const HMAC_ALGORITHMS = ["HS256", "HS384", "HS512"] as const;
export const RSA_ALGORITHMS = ["RS256", "RS384", "RS512"] as const;

export const jwtAlgorithmSchema = z.enum([
	...HMAC_ALGORITHMS,
	...RSA_ALGORITHMS,
]);

const booleanFlag = z
	.enum(["true", "false", "1", "0"])
	.transform((value) => value === "true" || value === "1");

/** Optional string where an empty value counts as unset. */
const optionalString = z
	.string()
	.trim()
	.optional()
	.transform((value) => (value ? value : undefined));

/**
 * Bootstrap superuser password. Held to the registration rules and normalized
 * the same way, so the account can sign in through the login form.
 */
const superuserPassword = z
	.string()
	.optional()
	.transform((value) => (value ? value : undefined))
	.pipe(passwordSchema.optional());

export const envSchema = z
	.object({
		APP_NAME: z.string().trim().min(1).default("Item API"),
		APP_ENV: z.enum(["development", "test", "production"]).default("development"),
		DEBUG: booleanFlag.default(false),
		PORT: z.coerce.number().int().min(1).max(65535).default(8000),
		DATABASE_URL: z.string().trim().min(1).default("file:local.db"),
		DATABASE_AUTH_TOKEN: optionalString,
		JWT_ALGORITHM: jwtAlgorithmSchema.default("HS256"),
		JWT_SECRET_KEY: optionalString,
		JWT_PRIVATE_KEY: optionalString,
		JWT_PUBLIC_KEY: optionalString,
		ACCESS_TOKEN_EXPIRE_MINUTES: z.coerce.number().int().positive().default(30),
		REFRESH_TOKEN_EXPIRE_DAYS: z.coerce.number().int().positive().default(7),
		CORS_ORIGINS: z
			.string()
			.default("http://localhost:3000")
			.transform((value) =>
				value
					.split(",")
					.map((origin) => origin.trim())
					.filter((origin) => origin.length > 0),
			),
		SUPERUSER_EMAIL: emailSchema.optional(),
		SUPERUSER_PASSWORD: superuserPassword,
	})
	.superRefine((env, ctx) => {
		const isHmac = env.JWT_ALGORITHM.startsWith("HS");
		if (isHmac && (env.JWT_SECRET_KEY?.length ?? 0) < MIN_SECRET_LENGTH) {
			ctx.addIssue({
				code: "custom",
				path: ["JWT_SECRET_KEY"],
				message: `JWT_SECRET_KEY must be at least ${MIN_SECRET_LENGTH} characters for ${env.JWT_ALGORITHM}`,
			});
		}
		if (!isHmac && !env.JWT_PRIVATE_KEY) {
			ctx.addIssue({
				code: "custom",
				path: ["JWT_PRIVATE_KEY"],
				message: `JWT_PRIVATE_KEY is required for ${env.JWT_ALGORITHM}`,
			});
		}
		if (!isHmac && !env.JWT_PUBLIC_KEY) {
			ctx.addIssue({
				code: "custom",
				path: ["JWT_PUBLIC_KEY"],
				message: `JWT_PUBLIC_KEY is required for ${env.JWT_ALGORITHM}`,
			});
		}
		if (Boolean(env.SUPERUSER_EMAIL) !== Boolean(env.SUPERUSER_PASSWORD)) {
			ctx.addIssue({
				code: "custom",
				path: ["SUPERUSER_PASSWORD"],
				message: "SUPERUSER_EMAIL and SUPERUSER_PASSWORD must be set together",
			});
		}
	});

export type JwtAlgorithm = z.infer<typeof jwtAlgorithmSchema>;
export type HmacAlgorithm = (typeof HMAC_ALGORITHMS)[number];
export type RsaAlgorithm = (typeof RSA_ALGORITHMS)[number];

/** Raw environment as read from the process. */
export type EnvInput = z.input<typeof envSchema>;

/** Environment after coercion and defaults. */
export type ParsedEnv = z.output<typeof envSchema>;
