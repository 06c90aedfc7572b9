/**
 * @file principal.ts
 * User identity types and the lookups the auth subsystem consumes.
 *
 * @license Apache-2.0
 */

/**
 * Authenticated user as loaded from persistence.
 * Loaded fresh on every request and never cached across requests.
 */
export interface Principal {
	id: number;
	email: string;
	fullName: string | null;
	isActive: boolean;
	isSuperuser: boolean;
	createdAt: string;
	updatedAt: string;
}

/**
 * Principal together with its stored password digest.
 * Only the login path ever sees this shape.
 */
export interface UserRecord extends Principal {
	passwordData: string;
}

/**
 * Narrow persistence interface used by the auth subsystem.
 * Both lookups resolve to `null` on a miss rather than throwing.
 */
export interface UserLookup {
	findUserById(id: number): Promise<Principal | null>;
	findUserByEmail(email: string): Promise<UserRecord | null>;
}
