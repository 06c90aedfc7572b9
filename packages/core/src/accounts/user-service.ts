/**
 * @file user-service.ts
 * Service for managing user accounts.
 * Provides the lookups the auth subsystem consumes plus user CRUD.
 *
 * @license Apache-2.0
 */

import { ConflictError, NotFoundError } from "@item-api/errors";
import type { SqliteClient } from "@item-api/infrastructure";
import type {
	Pagination,
	RegistrationOutput,
	UserUpdate,
} from "@item-api/schemas";
import type { Principal, UserLookup, UserRecord } from "@item-api/types";
import type { InValue } from "@libsql/client";
import type { PasswordService } from "../auth/services/password-service";
import {
	USER_COLUMNS,
	isUniqueViolation,
	toCount,
	toPrincipal,
	toUserRecord,
} from "./rows";

/**
 * Interface defining the user service API.
 */
export interface UserService extends UserLookup {
	/**
	 * Loads a user or fails with 404.
	 * @throws NotFoundError if no user has the ID
	 */
	getUser(id: number): Promise<Principal>;

	listUsers(page: Pagination): Promise<Principal[]>;

	countUsers(): Promise<number>;

	/**
	 * Creates an active user with a hashed password.
	 *
	 * @param input - Validated registration data
	 * @param options - Set `isSuperuser` to create an administrator
	 * @throws ConflictError if the email is taken
	 */
	createUser(
		input: RegistrationOutput,
		options?: { isSuperuser?: boolean },
	): Promise<Principal>;

	/**
	 * Applies a partial update. A new password is re-hashed.
	 *
	 * @throws NotFoundError if no user has the ID
	 * @throws ConflictError if the new email is taken
	 */
	updateUser(id: number, input: UserUpdate): Promise<Principal>;

	/**
	 * Deletes a user together with the items they own.
	 * @throws NotFoundError if no user has the ID
	 */
	deleteUser(id: number): Promise<void>;

	/**
	 * Makes sure a superuser with the given email exists.
	 * Promotes an existing account, or creates one with the given password.
	 */
	ensureSuperuser(email: string, password: string): Promise<Principal>;
}

/**
 * Configuration options for user service.
 */
export interface UserServiceConfig {
	db: SqliteClient;
	passwordService: PasswordService;
}

const DUPLICATE_EMAIL = "User with this email already exists";

/**
 * Creates a user service backed by the `users` table.
 *
 * @param config - Database client and password service
 * @returns User service
 */
export function createUserService(config: UserServiceConfig): UserService {
	const { db, passwordService } = config;

	async function findUserById(id: number): Promise<Principal | null> {
		const result = await db.execute({
			sql: `SELECT ${USER_COLUMNS} FROM users WHERE id = ?`,
			args: [id],
		});
		const [row] = result.rows;
		return row ? toPrincipal(toUserRecord(row)) : null;
	}

	async function findUserByEmail(email: string): Promise<UserRecord | null> {
		const result = await db.execute({
			sql: `SELECT ${USER_COLUMNS} FROM users WHERE email = ?`,
			args: [email],
		});
		const [row] = result.rows;
		return row ? toUserRecord(row) : null;
	}

	async function getUser(id: number): Promise<Principal> {
		const user = await findUserById(id);
		if (!user) throw new NotFoundError("User");
		return user;
	}

	async function createUser(
		input: RegistrationOutput,
		options: { isSuperuser?: boolean } = {},
	): Promise<Principal> {
		if (await findUserByEmail(input.email)) {
			throw new ConflictError(DUPLICATE_EMAIL);
		}

		const passwordData = await passwordService.hashPassword(input.password);
		try {
			const result = await db.execute({
				sql: `INSERT INTO users (email, password_data, full_name, is_active, is_superuser)
					  VALUES (?, ?, ?, 1, ?)
					  RETURNING ${USER_COLUMNS}`,
				args: [
					input.email,
					passwordData,
					input.full_name ?? null,
					options.isSuperuser ? 1 : 0,
				],
			});
			return toPrincipal(toUserRecord(result.rows[0]));
		} catch (error) {
			// Lost a race with a concurrent registration for the same email
			if (isUniqueViolation(error)) throw new ConflictError(DUPLICATE_EMAIL);
			throw error;
		}
	}

	async function updateUser(id: number, input: UserUpdate): Promise<Principal> {
		const assignments: string[] = [];
		const args: InValue[] = [];

		if (input.email !== undefined) {
			assignments.push("email = ?");
			args.push(input.email);
		}
		if (input.full_name !== undefined) {
			assignments.push("full_name = ?");
			args.push(input.full_name);
		}
		if (input.password !== undefined) {
			assignments.push("password_data = ?");
			args.push(await passwordService.hashPassword(input.password));
		}
		if (input.is_active !== undefined) {
			assignments.push("is_active = ?");
			args.push(input.is_active ? 1 : 0);
		}

		if (assignments.length === 0) {
			return getUser(id);
		}

		try {
			const result = await db.execute({
				sql: `UPDATE users
					  SET ${assignments.join(", ")}, updated_at = CURRENT_TIMESTAMP
					  WHERE id = ?
					  RETURNING ${USER_COLUMNS}`,
				args: [...args, id],
			});
			const [row] = result.rows;
			if (!row) throw new NotFoundError("User");
			return toPrincipal(toUserRecord(row));
		} catch (error) {
			if (isUniqueViolation(error)) throw new ConflictError(DUPLICATE_EMAIL);
			throw error;
		}
	}

	async function deleteUser(id: number): Promise<void> {
		await getUser(id);
		await db.execute({
			sql: "DELETE FROM items WHERE owner_id = ?",
			args: [id],
		});
		await db.execute({ sql: "DELETE FROM users WHERE id = ?", args: [id] });
	}

	async function ensureSuperuser(
		email: string,
		password: string,
	): Promise<Principal> {
		const existing = await findUserByEmail(email);
		if (!existing) {
			return createUser({ email, password }, { isSuperuser: true });
		}
		if (existing.isSuperuser) {
			return toPrincipal(existing);
		}

		const result = await db.execute({
			sql: `UPDATE users SET is_superuser = 1, updated_at = CURRENT_TIMESTAMP
				  WHERE id = ? RETURNING ${USER_COLUMNS}`,
			args: [existing.id],
		});
		return toPrincipal(toUserRecord(result.rows[0]));
	}

	return {
		findUserById,
		findUserByEmail,
		getUser,
		async listUsers(page) {
			const result = await db.execute({
				sql: `SELECT ${USER_COLUMNS} FROM users ORDER BY id LIMIT ? OFFSET ?`,
				args: [page.limit, page.skip],
			});
			return result.rows.map((row) => toPrincipal(toUserRecord(row)));
		},
		async countUsers() {
			const result = await db.execute("SELECT COUNT(id) AS total FROM users");
			return toCount(result.rows[0]);
		},
		createUser,
		updateUser,
		deleteUser,
		ensureSuperuser,
	};
}
