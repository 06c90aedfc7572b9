/**
 * @file item-handlers.ts
 * Request handlers for items owned by the authenticated user.
 *
 * @license Apache-2.0
 */

import {
	itemCreateSchema,
	itemUpdateSchema,
	paginationSchema,
} from "@item-api/schemas";
import type { AuthContext, MessageResponse } from "@item-api/types";
import type { Services } from "../services";
import {
	parseWith,
	readIdParam,
	readJsonBody,
	toItemResponse,
	toPage,
} from "../utils";

export function createItemHandlers({ items }: Services) {
	return {
		/** Lists the caller's own items. */
		async list(ctx: AuthContext) {
			const ownerId = ctx.get("principal").id;
			const page = parseWith(paginationSchema, ctx.req.query());
			const [rows, total] = await Promise.all([
				items.listItemsByOwner(ownerId, page),
				items.countItemsByOwner(ownerId),
			]);
			return ctx.json(toPage(rows.map(toItemResponse), total, page));
		},

		async create(ctx: AuthContext) {
			const input = parseWith(itemCreateSchema, await readJsonBody(ctx));
			const item = await items.createItem(ctx.get("principal").id, input);
			return ctx.json(toItemResponse(item), 201);
		},

		async get(ctx: AuthContext) {
			const item = await items.getItemForUser(
				readIdParam(ctx),
				ctx.get("principal"),
			);
			return ctx.json(toItemResponse(item));
		},

		async update(ctx: AuthContext) {
			const id = readIdParam(ctx);
			const input = parseWith(itemUpdateSchema, await readJsonBody(ctx));
			const item = await items.updateItem(id, input, ctx.get("principal"));
			return ctx.json(toItemResponse(item));
		},

		async remove(ctx: AuthContext) {
			await items.deleteItem(readIdParam(ctx), ctx.get("principal"));
			const body: MessageResponse = { message: "Item deleted successfully" };
			return ctx.json(body);
		},
	};
}
