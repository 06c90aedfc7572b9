/**
 * @file password-service.ts
 * Implementation of NIST SP 800-132 compliant password hashing and verification.
 *
 * @license Apache-2.0
 */

import { randomBytes, randomUUID, webcrypto } from "node:crypto";
import { constantTimeEqual } from "../utils/crypto";

/**
 * Valid bit lengths for hash algorithms.
 * Must match available SHA variants (SHA-256, SHA-384, SHA-512).
 * - SHA-256: Fastest, good for legacy compatibility
 * - SHA-384: Current selection, optimal security/performance balance
 * - SHA-512: Highest security, more computational cost
 */
const VALID_HASH_BITS = [256, 384, 512] as const;
type HashBits = (typeof VALID_HASH_BITS)[number];

/** Upper bound on iterations accepted from a stored digest. */
const MAX_ITERATIONS = 10_000_000;

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

/**
 * Password hashing configuration.
 */
export interface PasswordConfig {
	/** Hashing algorithm (currently only PBKDF2 supported) */
	algorithm: "PBKDF2";
	/** SHA variant bit length (256, 384, or 512) */
	bits: HashBits;
	/** Salt size in bytes (NIST recommends minimum 128 bits = 16 bytes) */
	saltBytes: number;
	/** PBKDF2 iteration count for key stretching */
	iterations: number;
	/** Schema version for future algorithm updates */
	version: 1;
}

/**
 * Default password configuration:
 * - SHA-384 for balance of security and performance
 * - 16 bytes of salt (128 bits) per NIST SP 800-132
 * - 100k iterations for key stretching (PBKDF2)
 */
export const defaultPasswordConfig: PasswordConfig = {
	algorithm: "PBKDF2",
	bits: 384,
	saltBytes: 16, // NIST recommended minimum (128 bits)
	iterations: 100000, // OWASP guidance for SHA-512 is 210,000 rounds
	version: 1,
};

/**
 * Interface defining the password service API.
 * Provides methods for secure password hashing and verification.
 */
export interface PasswordService {
	/**
	 * Hash a password using PBKDF2 with a fresh random salt.
	 * Two calls with the same password never produce the same string.
	 *
	 * @param password - The plain text password to hash
	 * @returns Formatted string containing all verification data
	 */
	hashPassword(password: string): Promise<string>;

	/**
	 * Verifies a password against stored hash data.
	 * Uses the salt, iteration count and SHA variant recorded in the stored string
	 * and compares in constant time. Malformed stored data yields `false`.
	 *
	 * @param password - Plain text password to verify
	 * @param storedPasswordData - Complete stored password string
	 * @returns Promise resolving to true if password matches
	 */
	verifyPassword(
		password: string,
		storedPasswordData: string,
	): Promise<boolean>;

	/**
	 * Performs a timing-equivalent password verification using a dummy password hash.
	 * Always returns `false` after spending roughly the same time as a real verification.
	 *
	 * @param password - Password to run through the dummy verification
	 * @returns Promise resolving to false after timing-equivalent operation
	 */
	rejectPasswordWithConstantTime(password: string): Promise<false>;
}

/**
 * Type guard to ensure hash bit length is valid.
 * @param bits - The number of bits to validate
 * @returns True if bits is a valid hash length
 */
const isValidHashBits = (bits: number): bits is HashBits => {
	return VALID_HASH_BITS.some((valid) => valid === bits);
};

interface ParsedPasswordData {
	bits: HashBits;
	version: number;
	iterations: number;
	salt: Uint8Array;
	hash: Uint8Array;
}

/**
 * Password storage format:
 * $pbkdf2-shaXXX$v1$iterations$salt$hash
 *
 * Components:
 * 1. $ - Field delimiter
 * 2. pbkdf2-shaXXX - Algorithm identifier (e.g., pbkdf2-sha384)
 * 3. v1 - Schema version for future upgrades
 * 4. iterations - PBKDF2 iteration count
 * 5. salt - Base64 encoded random salt
 * 6. hash - Base64 encoded PBKDF2 derived key
 */
function formatPasswordString(
	config: PasswordConfig,
	{ salt, hash }: { salt: Uint8Array; hash: Uint8Array },
): string {
	const saltBase64 = Buffer.from(salt).toString("base64");
	const hashBase64 = Buffer.from(hash).toString("base64");
	return `$pbkdf2-sha${config.bits}$v${config.version}$${config.iterations}$${saltBase64}$${hashBase64}`;
}

/**
 * Parses stored password data into its components.
 * Validates format integrity before password verification.
 *
 * @param passwordData - Delimited string containing all verification data
 * @returns Parsed components or null if format is invalid
 */
function parsePasswordString(passwordData: string): ParsedPasswordData | null {
	const parts = passwordData.split("$");
	if (parts.length !== 6 || parts[0] !== "") return null;

	const [, algorithm, versionStr, iterationsStr, salt, hash] = parts;

	const algorithmMatch = /^pbkdf2-sha(\d+)$/.exec(algorithm);
	const bits = Number(algorithmMatch?.[1]);
	if (!isValidHashBits(bits)) return null;

	const versionMatch = /^v(\d+)$/.exec(versionStr);
	const version = Number(versionMatch?.[1]);
	if (version !== 1) return null;

	if (!/^\d+$/.test(iterationsStr)) return null;
	const iterations = Number(iterationsStr);
	if (iterations < 1 || iterations > MAX_ITERATIONS) return null;

	if (!BASE64_PATTERN.test(salt) || !BASE64_PATTERN.test(hash)) return null;

	return {
		bits,
		version,
		iterations,
		salt: Buffer.from(salt, "base64"),
		hash: Buffer.from(hash, "base64"),
	};
}

/**
 * Runs PBKDF2 through WebCrypto. Key derivation executes on the libuv
 * threadpool, so concurrent requests keep being served while it runs.
 */
async function deriveKey(
	password: string,
	salt: Uint8Array,
	iterations: number,
	bits: HashBits,
): Promise<Uint8Array> {
	const keyMaterial = await webcrypto.subtle.importKey(
		"raw",
		Buffer.from(password, "utf8"),
		"PBKDF2",
		false,
		["deriveBits"],
	);

	const hashBuffer = await webcrypto.subtle.deriveBits(
		{
			name: "PBKDF2",
			salt,
			iterations,
			hash: `SHA-${bits}`,
		},
		keyMaterial,
		bits,
	);

	return new Uint8Array(hashBuffer);
}

/**
 * Creates a configured password management service.
 * Provides methods for secure password hashing and verification
 * following NIST SP 800-132 recommendations.
 *
 * @param config - Configuration for password hashing parameters
 * @returns Password management service with hash/verify operations
 */
export function createPasswordService(
	config: Partial<PasswordConfig> = {},
): PasswordService {
	const resolvedConfig: PasswordConfig = {
		...defaultPasswordConfig,
		...config,
	};

	if (!isValidHashBits(resolvedConfig.bits)) {
		throw new Error("Invalid hash bits - must be 256, 384, or 512");
	}
	if (!Number.isInteger(resolvedConfig.iterations) || resolvedConfig.iterations < 1) {
		throw new Error("Invalid iterations - must be a positive integer");
	}

	// Dummy digest for constant-time rejection, derived with the live settings
	let dummyPasswordData: Promise<string> | undefined;

	async function hashPassword(password: string): Promise<string> {
		const salt = new Uint8Array(randomBytes(resolvedConfig.saltBytes));
		const hash = await deriveKey(
			password,
			salt,
			resolvedConfig.iterations,
			resolvedConfig.bits,
		);

		return formatPasswordString(resolvedConfig, { salt, hash });
	}

	async function verifyPassword(
		password: string,
		storedPasswordData: string,
	): Promise<boolean> {
		const parsed = parsePasswordString(storedPasswordData);
		if (!parsed) return false;

		const { bits, iterations, salt, hash } = parsed;
		try {
			const candidate = await deriveKey(password, salt, iterations, bits);
			return constantTimeEqual(candidate, hash);
		} catch (error) {
			console.error("[passwords] verification failed:", error);
			return false;
		}
	}

	async function rejectPasswordWithConstantTime(
		password: string,
	): Promise<false> {
		dummyPasswordData ??= hashPassword(randomUUID());
		await verifyPassword(password, await dummyPasswordData);
		return false;
	}

	return {
		hashPassword,
		verifyPassword,
		rejectPasswordWithConstantTime,
	};
}
