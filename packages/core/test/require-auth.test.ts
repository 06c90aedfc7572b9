/**
 * @file require-auth.test.ts
 * Unit tests for authentication middleware.
 *
 * @license Apache-2.0
 */

import type { AppEnv, Principal } from "@item-api/types";
import { Hono } from "hono";
import {
	type MockInstance,
	afterEach,
	beforeEach,
	describe,
	expect,
	it,
	vi,
} from "vitest";
import {
	createRequireAuth,
	createRequireSuperuser,
} from "../src/auth/middleware/require-auth";
import { createIdentityService } from "../src/auth/services/identity-service";
import { createHmacTokenCodec } from "../src/auth/services/token-codec";
import { createTokenService } from "../src/auth/services/token-service";
import { TEST_SECRET, makePrincipal } from "./fixtures/db";

const codec = createHmacTokenCodec({ algorithm: "HS256", secret: TEST_SECRET });
const tokens = createTokenService({ codec });

function createTestApp(people: Principal[]) {
	const identity = createIdentityService({
		codec,
		users: {
			findUserById: async (id) => people.find((p) => p.id === id) ?? null,
		},
	});

	const app = new Hono<AppEnv>();
	app.use("/protected/*", createRequireAuth({ identity }));
	app.use("/protected/admin/*", createRequireSuperuser({ identity }));
	app.get("/protected/me", (c) => c.json({ id: c.get("principal").id }));
	app.get("/protected/admin/stats", (c) => c.json({ ok: true }));
	return app;
}

const alice = makePrincipal({ id: 1, email: "alice@example.com" });
const admin = makePrincipal({ id: 2, email: "admin@example.com", isSuperuser: true });
const dormant = makePrincipal({ id: 3, email: "old@example.com", isActive: false });

const UNAUTHORIZED_BODY = {
	error: "Could not validate credentials",
	code: "UNAUTHORIZED",
};

describe("createRequireAuth", () => {
	const app = createTestApp([alice, admin, dormant]);
	let warn: MockInstance<typeof console.warn>;

	beforeEach(() => {
		warn = vi.spyOn(console, "warn").mockImplementation(() => {});
	});

	afterEach(() => {
		warn.mockRestore();
	});

	const get = (path: string, token?: string) =>
		app.request(path, {
			headers: token ? { Authorization: `Bearer ${token}` } : {},
		});

	it("should expose the principal to handlers", async () => {
		const res = await get("/protected/me", await tokens.issueAccess(1));

		expect(res.status).toBe(200);
		expect(await res.json()).toEqual({ id: 1 });
	});

	it("should challenge a request without credentials", async () => {
		const res = await get("/protected/me");

		expect(res.status).toBe(401);
		expect(res.headers.get("WWW-Authenticate")).toBe("Bearer");
		expect(await res.json()).toEqual(UNAUTHORIZED_BODY);
	});

	it("should log the internal reason without sending it", async () => {
		const res = await get("/protected/me", "garbage");

		expect(await res.json()).toEqual(UNAUTHORIZED_BODY);
		expect(warn).toHaveBeenCalledWith(
			"[auth] GET /protected/me rejected: invalid_token",
		);
	});

	it("should reject a refresh token", async () => {
		const res = await get("/protected/me", await tokens.issueRefresh(1));

		expect(res.status).toBe(401);
		expect(await res.json()).toEqual(UNAUTHORIZED_BODY);
	});

	it("should use the same message for an unknown user", async () => {
		const res = await get("/protected/me", await tokens.issueAccess(99));

		expect(res.status).toBe(401);
		expect(await res.json()).toEqual(UNAUTHORIZED_BODY);
	});

	it("should reject an inactive user with its own message", async () => {
		const res = await get("/protected/me", await tokens.issueAccess(3));

		expect(res.status).toBe(401);
		expect(await res.json()).toEqual({
			error: "Inactive user",
			code: "INACTIVE_USER",
		});
	});

	it("should reject a non-bearer scheme", async () => {
		const res = await app.request("/protected/me", {
			headers: { Authorization: "Basic dXNlcjpwYXNz" },
		});

		expect(res.status).toBe(401);
	});

	describe("createRequireSuperuser", () => {
		it("should allow superusers", async () => {
			const res = await get("/protected/admin/stats", await tokens.issueAccess(2));

			expect(res.status).toBe(200);
			expect(await res.json()).toEqual({ ok: true });
		});

		it("should forbid regular users", async () => {
			const res = await get("/protected/admin/stats", await tokens.issueAccess(1));

			expect(res.status).toBe(403);
			expect(await res.json()).toEqual({
				error: "Not enough permissions",
				code: "FORBIDDEN",
			});
		});

		it("should still demand authentication first", async () => {
			const res = await get("/protected/admin/stats");

			expect(res.status).toBe(401);
		});
	});
});
