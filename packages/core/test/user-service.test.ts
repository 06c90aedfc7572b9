/**
 * @file user-service.test.ts
 * Tests for the user service against an in-memory database.
 *
 * @license Apache-2.0
 */

import { ConflictError, NotFoundError } from "@item-api/errors";
import type { SqliteClient } from "@item-api/infrastructure";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createItemService } from "../src/accounts/item-service";
import {
	type UserService,
	createUserService,
} from "../src/accounts/user-service";
import { createPasswordService } from "../src/auth/services/password-service";
import { FAST_PASSWORDS, createTestDb } from "./fixtures/db";

const ISO_TIMESTAMP = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/;

describe("createUserService", () => {
	const passwordService = createPasswordService(FAST_PASSWORDS);
	let db: SqliteClient;
	let users: UserService;

	beforeEach(async () => {
		db = await createTestDb();
		users = createUserService({ db, passwordService });
	});

	afterEach(() => {
		db.close();
	});

	describe("createUser", () => {
		it("should create an active regular user", async () => {
			const user = await users.createUser({
				email: "alice@example.com",
				password: "password123",
				full_name: "Alice",
			});

			expect(user).toMatchObject({
				id: 1,
				email: "alice@example.com",
				fullName: "Alice",
				isActive: true,
				isSuperuser: false,
			});
			expect(user.createdAt).toMatch(ISO_TIMESTAMP);
			expect(user).not.toHaveProperty("passwordData");
		});

		it("should store a hashed password", async () => {
			await users.createUser({
				email: "alice@example.com",
				password: "password123",
			});

			const record = await users.findUserByEmail("alice@example.com");
			expect(record?.passwordData.startsWith("$pbkdf2-sha384$v1$")).toBe(true);
			expect(record?.fullName).toBeNull();
			await expect(
				passwordService.verifyPassword(
					"password123",
					record?.passwordData ?? "",
				),
			).resolves.toBe(true);
		});

		it("should refuse a duplicate email", async () => {
			await users.createUser({ email: "alice@example.com", password: "password123" });

			const attempt = users.createUser({
				email: "alice@example.com",
				password: "different-pass",
			});
			await expect(attempt).rejects.toBeInstanceOf(ConflictError);
			await expect(attempt).rejects.toThrow("User with this email already exists");
		});

		it("should create superusers on request", async () => {
			const user = await users.createUser(
				{ email: "root@example.com", password: "password123" },
				{ isSuperuser: true },
			);
			expect(user.isSuperuser).toBe(true);
		});
	});

	describe("lookups", () => {
		it("should return null for unknown users", async () => {
			await expect(users.findUserById(42)).resolves.toBeNull();
			await expect(users.findUserByEmail("ghost@example.com")).resolves.toBeNull();
		});

		it("should find a user by ID without the password digest", async () => {
			const created = await users.createUser({
				email: "alice@example.com",
				password: "password123",
			});

			const found = await users.findUserById(created.id);
			expect(found).toEqual(created);
		});

		it("should fail getUser with a 404 for unknown IDs", async () => {
			await expect(users.getUser(42)).rejects.toBeInstanceOf(NotFoundError);
			await expect(users.getUser(42)).rejects.toThrow("User not found");
		});
	});

	describe("listUsers", () => {
		beforeEach(async () => {
			for (const name of ["a", "b", "c"]) {
				await users.createUser({
					email: `${name}@example.com`,
					password: "password123",
				});
			}
		});

		it("should page through users in ID order", async () => {
			const page = await users.listUsers({ skip: 1, limit: 1 });
			expect(page.map((u) => u.email)).toEqual(["b@example.com"]);
		});

		it("should count all users", async () => {
			await expect(users.countUsers()).resolves.toBe(3);
		});
	});

	describe("updateUser", () => {
		it("should apply partial updates", async () => {
			const user = await users.createUser({
				email: "alice@example.com",
				password: "password123",
			});

			const updated = await users.updateUser(user.id, {
				full_name: "Alice Liddell",
				is_active: false,
			});

			expect(updated).toMatchObject({
				email: "alice@example.com",
				fullName: "Alice Liddell",
				isActive: false,
			});
		});

		it("should re-hash a new password", async () => {
			const user = await users.createUser({
				email: "alice@example.com",
				password: "password123",
			});

			await users.updateUser(user.id, { password: "new-password-456" });

			const record = await users.findUserByEmail("alice@example.com");
			const digest = record?.passwordData ?? "";
			await expect(
				passwordService.verifyPassword("new-password-456", digest),
			).resolves.toBe(true);
			await expect(
				passwordService.verifyPassword("password123", digest),
			).resolves.toBe(false);
		});

		it("should return the user unchanged for an empty update", async () => {
			const user = await users.createUser({
				email: "alice@example.com",
				password: "password123",
			});

			await expect(users.updateUser(user.id, {})).resolves.toEqual(user);
		});

		it("should refuse an email owned by another user", async () => {
			await users.createUser({ email: "alice@example.com", password: "password123" });
			const bob = await users.createUser({
				email: "bob@example.com",
				password: "password123",
			});

			await expect(
				users.updateUser(bob.id, { email: "alice@example.com" }),
			).rejects.toBeInstanceOf(ConflictError);
		});

		it("should fail with a 404 for unknown IDs", async () => {
			await expect(
				users.updateUser(42, { full_name: "Nobody" }),
			).rejects.toBeInstanceOf(NotFoundError);
		});
	});

	describe("deleteUser", () => {
		it("should remove the user and their items", async () => {
			const items = createItemService({ db });
			const user = await users.createUser({
				email: "alice@example.com",
				password: "password123",
			});
			await items.createItem(user.id, { title: "Notebook" });

			await users.deleteUser(user.id);

			await expect(users.findUserById(user.id)).resolves.toBeNull();
			await expect(items.countItemsByOwner(user.id)).resolves.toBe(0);
		});

		it("should fail with a 404 for unknown IDs", async () => {
			await expect(users.deleteUser(42)).rejects.toBeInstanceOf(NotFoundError);
		});
	});

	describe("ensureSuperuser", () => {
		it("should create the account when missing", async () => {
			const admin = await users.ensureSuperuser("root@example.com", "password123");

			expect(admin).toMatchObject({ email: "root@example.com", isSuperuser: true });
			await expect(users.countUsers()).resolves.toBe(1);
		});

		it("should promote an existing account", async () => {
			const user = await users.createUser({
				email: "root@example.com",
				password: "password123",
			});

			const admin = await users.ensureSuperuser("root@example.com", "ignored-pass");

			expect(admin.id).toBe(user.id);
			expect(admin.isSuperuser).toBe(true);
		});

		it("should be idempotent", async () => {
			const first = await users.ensureSuperuser("root@example.com", "password123");
			const second = await users.ensureSuperuser("root@example.com", "password123");

			expect(second).toEqual(first);
			await expect(users.countUsers()).resolves.toBe(1);
		});
	});
});
