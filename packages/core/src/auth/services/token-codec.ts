/**
 * @file token-codec.ts
 * Signs claim sets into JWTs and verifies them back.
 * Two variants share one interface: HMAC with a single shared secret, and RSA
 * where a private key signs and a public key verifies. The variant is chosen
 * once at startup by `createTokenCodec`.
 *
 * @license Apache-2.0
 */

import {
	type HmacAlgorithm,
	type JwtAlgorithm,
	type RsaAlgorithm,
	type TokenClaims,
	tokenClaimsSchema,
} from "@item-api/schemas";
import type { DecodeResult } from "@item-api/types";
import { sign, verify } from "hono/jwt";
import { JwtTokenExpired } from "hono/utils/jwt/types";
import { nowInSeconds } from "../utils/time";

/**
 * Interface defining the token codec API.
 */
export interface TokenCodec {
	/** Signature algorithm used for every token this codec produces. */
	readonly algorithm: JwtAlgorithm;

	/**
	 * Serializes and signs a claim set.
	 *
	 * @param claims - Claims to embed in the token
	 * @returns Compact JWT string
	 */
	encode(claims: TokenClaims): Promise<string>;

	/**
	 * Verifies the signature and expiry of a token and returns its claims.
	 * Never throws: tampered, malformed, and expired tokens all produce an invalid result.
	 * A token is expired once `now >= exp`, with no leeway.
	 *
	 * @param token - Compact JWT string
	 */
	decode(token: string): Promise<DecodeResult>;
}

export interface HmacTokenCodecConfig {
	algorithm: HmacAlgorithm;
	secret: string;
}

export interface RsaTokenCodecConfig {
	algorithm: RsaAlgorithm;
	/** PKCS#8 PEM. Optional for verify-only deployments. */
	privateKey?: string;
	/** SPKI PEM. */
	publicKey: string;
}

export type TokenCodecConfig = HmacTokenCodecConfig | RsaTokenCodecConfig;

const isHmacConfig = (
	config: TokenCodecConfig,
): config is HmacTokenCodecConfig => "secret" in config;

/**
 * Verifies a token with the given key and validates the claim shape.
 */
async function decodeWith(
	token: string,
	key: string,
	algorithm: JwtAlgorithm,
): Promise<DecodeResult> {
	let payload: unknown;
	try {
		payload = await verify(token, key, algorithm);
	} catch (error) {
		return {
			valid: false,
			reason: error instanceof JwtTokenExpired ? "expired" : "invalid",
		};
	}

	const parsed = tokenClaimsSchema.safeParse(payload);
	if (!parsed.success) {
		return { valid: false, reason: "invalid" };
	}

	if (nowInSeconds() >= parsed.data.exp) {
		return { valid: false, reason: "expired" };
	}

	return { valid: true, claims: parsed.data };
}

/**
 * Creates a codec signing with a shared secret (HS256, HS384, HS512).
 *
 * @param config - Secret and HMAC algorithm
 * @throws Error if the signing secret is empty
 */
export function createHmacTokenCodec(config: HmacTokenCodecConfig): TokenCodec {
	const { secret, algorithm } = config;
	if (!secret) {
		throw new Error("Missing token signing secret");
	}

	return {
		algorithm,
		encode: (claims) => sign(claims, secret, algorithm),
		decode: (token) => decodeWith(token, secret, algorithm),
	};
}

/**
 * Creates a codec signing with an RSA private key and verifying with its
 * public key (RS256, RS384, RS512).
 *
 * @param config - PEM keys and RSA algorithm
 * @throws Error if the public key is missing
 */
export function createRsaTokenCodec(config: RsaTokenCodecConfig): TokenCodec {
	const { privateKey, publicKey, algorithm } = config;
	if (!publicKey) {
		throw new Error("Public key required for decoding");
	}

	return {
		algorithm,
		async encode(claims) {
			if (!privateKey) {
				throw new Error("Private key required for encoding");
			}
			return sign(claims, privateKey, algorithm);
		},
		decode: (token) => decodeWith(token, publicKey, algorithm),
	};
}

/**
 * Selects the codec variant matching the configured algorithm.
 *
 * @param config - HMAC or RSA codec configuration
 * @returns Configured codec
 */
export function createTokenCodec(config: TokenCodecConfig): TokenCodec {
	return isHmacConfig(config)
		? createHmacTokenCodec(config)
		: createRsaTokenCodec(config);
}
