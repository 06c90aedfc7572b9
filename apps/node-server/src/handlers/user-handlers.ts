/**
 * @file user-handlers.ts
 * Request handlers for user management.
 * Listing and deletion sit behind the superuser gate in the router.
 *
 * @license Apache-2.0
 */

import { ForbiddenError } from "@item-api/errors";
import { paginationSchema, userUpdateSchema } from "@item-api/schemas";
import type { AuthContext, MessageResponse } from "@item-api/types";
import type { Services } from "../services";
import {
	parseWith,
	readIdParam,
	readJsonBody,
	toPage,
	toUserResponse,
} from "../utils";

export function createUserHandlers({ users }: Services) {
	return {
		async list(ctx: AuthContext) {
			const page = parseWith(paginationSchema, ctx.req.query());
			const [rows, total] = await Promise.all([
				users.listUsers(page),
				users.countUsers(),
			]);
			return ctx.json(toPage(rows.map(toUserResponse), total, page));
		},

		async get(ctx: AuthContext) {
			const user = await users.getUser(readIdParam(ctx));
			return ctx.json(toUserResponse(user));
		},

		/**
		 * Users may edit themselves; superusers may edit anyone.
		 * Only superusers can activate or deactivate accounts.
		 */
		async update(ctx: AuthContext) {
			const id = readIdParam(ctx);
			const principal = ctx.get("principal");
			const input = parseWith(userUpdateSchema, await readJsonBody(ctx));

			if (!principal.isSuperuser) {
				if (principal.id !== id || input.is_active !== undefined) {
					throw new ForbiddenError();
				}
			}

			const user = await users.updateUser(id, input);
			return ctx.json(toUserResponse(user));
		},

		async remove(ctx: AuthContext) {
			await users.deleteUser(readIdParam(ctx));
			const body: MessageResponse = { message: "User deleted successfully" };
			return ctx.json(body);
		},
	};
}
