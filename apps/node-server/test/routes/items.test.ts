/**
 * @file items.test.ts
 * Integration tests for the /api/v1/items endpoints.
 *
 * @license Apache-2.0
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
	type TestContext,
	bearer,
	createAdmin,
	createTestContext,
	jsonRequest,
	readId,
	signUp,
} from "../fixtures/test-app";

describe("/api/v1/items", () => {
	let ctx: TestContext;
	let admin: { id: number; token: string };
	let alice: { id: number; token: string };
	let bob: { id: number; token: string };

	beforeEach(async () => {
		ctx = await createTestContext();
		vi.spyOn(console, "info").mockImplementation(() => {});
		vi.spyOn(console, "warn").mockImplementation(() => {});

		admin = await createAdmin(ctx);
		alice = await signUp(ctx, "alice@example.com");
		bob = await signUp(ctx, "bob@example.com");
	});

	afterEach(() => {
		vi.restoreAllMocks();
		ctx.db.close();
	});

	const createItem = async (token: string, title: string) =>
		readId(
			await ctx.app.request(
				"/api/v1/items",
				jsonRequest("POST", { title, description: `${title} notes` }, token),
			),
		);

	describe("POST /", () => {
		it("should create an item owned by the caller", async () => {
			const res = await ctx.app.request(
				"/api/v1/items",
				jsonRequest("POST", { title: "  Notebook  " }, alice.token),
			);

			expect(res.status).toBe(201);
			expect(await res.json()).toMatchObject({
				id: 1,
				title: "Notebook",
				description: null,
				owner_id: alice.id,
			});
		});

		it("should require a title", async () => {
			const res = await ctx.app.request(
				"/api/v1/items",
				jsonRequest("POST", { title: "   " }, alice.token),
			);

			expect(res.status).toBe(422);
			expect(await res.json()).toEqual({
				error: "Title is required",
				code: "VALIDATION_ERROR",
				detail: ["title: Title is required"],
			});
		});

		it("should require authentication", async () => {
			const res = await ctx.app.request(
				"/api/v1/items",
				jsonRequest("POST", { title: "Notebook" }),
			);

			expect(res.status).toBe(401);
		});
	});

	describe("GET /", () => {
		it("should list only the caller's items", async () => {
			await createItem(alice.token, "One");
			await createItem(bob.token, "Theirs");
			await createItem(alice.token, "Two");

			const res = await ctx.app.request("/api/v1/items", bearer(alice.token));

			expect(await res.json()).toMatchObject({
				items: [{ title: "One" }, { title: "Two" }],
				total: 2,
				skip: 0,
				limit: 20,
			});
		});

		it("should page the caller's items", async () => {
			await createItem(alice.token, "One");
			await createItem(alice.token, "Two");

			const res = await ctx.app.request(
				"/api/v1/items?skip=1&limit=1",
				bearer(alice.token),
			);

			expect(await res.json()).toMatchObject({
				items: [{ title: "Two" }],
				total: 2,
				skip: 1,
				limit: 1,
			});
		});
	});

	describe("GET /:id", () => {
		it("should return the owner's item", async () => {
			const id = await createItem(alice.token, "Notebook");

			const res = await ctx.app.request(`/api/v1/items/${id}`, bearer(alice.token));

			expect(res.status).toBe(200);
			expect(await res.json()).toMatchObject({
				id,
				title: "Notebook",
				description: "Notebook notes",
			});
		});

		it("should forbid other users", async () => {
			const id = await createItem(alice.token, "Notebook");

			const res = await ctx.app.request(`/api/v1/items/${id}`, bearer(bob.token));

			expect(res.status).toBe(403);
			expect(await res.json()).toEqual({
				error: "Not authorized to access this item",
				code: "FORBIDDEN",
			});
		});

		it("should let superusers read any item", async () => {
			const id = await createItem(alice.token, "Notebook");

			const res = await ctx.app.request(`/api/v1/items/${id}`, bearer(admin.token));

			expect(res.status).toBe(200);
		});

		it("should 404 for unknown items", async () => {
			const res = await ctx.app.request("/api/v1/items/42", bearer(alice.token));

			expect(res.status).toBe(404);
			expect(await res.json()).toEqual({
				error: "Item not found",
				code: "NOT_FOUND",
			});
		});
	});

	describe("PATCH /:id", () => {
		it("should update the owner's item", async () => {
			const id = await createItem(alice.token, "Notebook");

			const res = await ctx.app.request(
				`/api/v1/items/${id}`,
				jsonRequest("PATCH", { title: "Ledger", description: null }, alice.token),
			);

			expect(res.status).toBe(200);
			expect(await res.json()).toMatchObject({
				id,
				title: "Ledger",
				description: null,
			});
		});

		it("should forbid other users", async () => {
			const id = await createItem(alice.token, "Notebook");

			const res = await ctx.app.request(
				`/api/v1/items/${id}`,
				jsonRequest("PATCH", { title: "Mine" }, bob.token),
			);

			expect(res.status).toBe(403);
			expect(await res.json()).toEqual({
				error: "Not authorized to modify this item",
				code: "FORBIDDEN",
			});
		});
	});

	describe("DELETE /:id", () => {
		it("should delete the owner's item", async () => {
			const id = await createItem(alice.token, "Notebook");

			const res = await ctx.app.request(`/api/v1/items/${id}`, {
				method: "DELETE",
				headers: { Authorization: `Bearer ${alice.token}` },
			});

			expect(res.status).toBe(200);
			expect(await res.json()).toEqual({ message: "Item deleted successfully" });

			const gone = await ctx.app.request(`/api/v1/items/${id}`, bearer(alice.token));
			expect(gone.status).toBe(404);
		});

		it("should forbid other users", async () => {
			const id = await createItem(alice.token, "Notebook");

			const res = await ctx.app.request(`/api/v1/items/${id}`, {
				method: "DELETE",
				headers: { Authorization: `Bearer ${bob.token}` },
			});

			expect(res.status).toBe(403);
			expect(await res.json()).toEqual({
				error: "Not authorized to delete this item",
				code: "FORBIDDEN",
			});
		});
	});
});
