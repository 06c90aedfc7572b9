/**
 * @file config.ts
 * Loads and validates process configuration once at startup.
 *
 * @license Apache-2.0
 */

import type { TokenCodecConfig } from "@item-api/core";
import { ValidationError } from "@item-api/errors";
import type { DbConfig } from "@item-api/infrastructure";
import {
	HMAC_ALGORITHMS,
	type HmacAlgorithm,
	type JwtAlgorithm,
	type ParsedEnv,
	envSchema,
	listZodIssues,
} from "@item-api/schemas";
import type { TokenConfig } from "@item-api/types";

export const APP_VERSION = "0.1.0";

/**
 * Runtime configuration derived from the environment.
 * Read once at startup and never mutated.
 */
export interface AppConfig {
	readonly name: string;
	readonly env: ParsedEnv["APP_ENV"];
	readonly debug: boolean;
	readonly port: number;
	readonly database: DbConfig;
	readonly codec: TokenCodecConfig;
	readonly tokens: TokenConfig;
	readonly corsOrigins: readonly string[];
	readonly superuser?: { email: string; password: string };
}

const isHmacAlgorithm = (algorithm: JwtAlgorithm): algorithm is HmacAlgorithm =>
	HMAC_ALGORITHMS.some((candidate) => candidate === algorithm);

/** PEM values set through `.env` files often carry escaped newlines. */
const unescapePem = (pem: string | undefined) => pem?.replace(/\\n/g, "\n");

function toCodecConfig(env: ParsedEnv): TokenCodecConfig {
	const algorithm = env.JWT_ALGORITHM;
	if (isHmacAlgorithm(algorithm)) {
		return { algorithm, secret: env.JWT_SECRET_KEY ?? "" };
	}
	return {
		algorithm,
		privateKey: unescapePem(env.JWT_PRIVATE_KEY),
		publicKey: unescapePem(env.JWT_PUBLIC_KEY) ?? "",
	};
}

/**
 * Validates environment variables and builds the application config.
 *
 * @param env - Variables to read, the process environment by default
 * @throws ValidationError listing every invalid variable
 */
export function loadConfig(
	env: Record<string, string | undefined> = process.env,
): AppConfig {
	const result = envSchema.safeParse(env);
	if (!result.success) {
		throw new ValidationError(
			"Invalid configuration",
			listZodIssues(result.error),
		);
	}

	const parsed = result.data;
	return Object.freeze({
		name: parsed.APP_NAME,
		env: parsed.APP_ENV,
		debug: parsed.DEBUG,
		port: parsed.PORT,
		database: {
			url: parsed.DATABASE_URL,
			authToken: parsed.DATABASE_AUTH_TOKEN,
		},
		codec: toCodecConfig(parsed),
		tokens: {
			accessTokenExpiry: parsed.ACCESS_TOKEN_EXPIRE_MINUTES * 60,
			refreshTokenExpiry: parsed.REFRESH_TOKEN_EXPIRE_DAYS * 24 * 60 * 60,
		},
		corsOrigins: parsed.CORS_ORIGINS,
		superuser:
			parsed.SUPERUSER_EMAIL && parsed.SUPERUSER_PASSWORD
				? { email: parsed.SUPERUSER_EMAIL, password: parsed.SUPERUSER_PASSWORD }
				: undefined,
	});
}
