/**
 * @file item-service.ts
 * Service for items owned by users.
 * Ownership checks live here so every caller gets the same rule:
 * the owner or a superuser may read, modify and delete an item.
 *
 * @license Apache-2.0
 */

import { ForbiddenError, NotFoundError } from "@item-api/errors";
import type { SqliteClient } from "@item-api/infrastructure";
import type { ItemCreate, ItemUpdate, Pagination } from "@item-api/schemas";
import type { Item, Principal } from "@item-api/types";
import type { InValue } from "@libsql/client";
import { ITEM_COLUMNS, toCount, toItem } from "./rows";

export interface ItemService {
	/** @throws NotFoundError if no item has the ID */
	getItem(id: number): Promise<Item>;

	/**
	 * Loads an item the principal may read.
	 * @throws NotFoundError if no item has the ID
	 * @throws ForbiddenError unless the principal owns it or is a superuser
	 */
	getItemForUser(id: number, principal: Principal): Promise<Item>;

	listItemsByOwner(ownerId: number, page: Pagination): Promise<Item[]>;

	countItemsByOwner(ownerId: number): Promise<number>;

	createItem(ownerId: number, input: ItemCreate): Promise<Item>;

	/**
	 * Applies a partial update on behalf of the principal.
	 * @throws NotFoundError if no item has the ID
	 * @throws ForbiddenError unless the principal owns it or is a superuser
	 */
	updateItem(id: number, input: ItemUpdate, principal: Principal): Promise<Item>;

	/**
	 * @throws NotFoundError if no item has the ID
	 * @throws ForbiddenError unless the principal owns it or is a superuser
	 */
	deleteItem(id: number, principal: Principal): Promise<void>;
}

export interface ItemServiceConfig {
	db: SqliteClient;
}

type ItemAction = "access" | "modify" | "delete";

const canManage = (item: Item, principal: Principal) =>
	principal.isSuperuser || item.ownerId === principal.id;

/**
 * Creates an item service backed by the `items` table.
 */
export function createItemService(config: ItemServiceConfig): ItemService {
	const { db } = config;

	async function getItem(id: number): Promise<Item> {
		const result = await db.execute({
			sql: `SELECT ${ITEM_COLUMNS} FROM items WHERE id = ?`,
			args: [id],
		});
		const [row] = result.rows;
		if (!row) throw new NotFoundError("Item");
		return toItem(row);
	}

	async function authorize(
		id: number,
		principal: Principal,
		action: ItemAction,
	): Promise<Item> {
		const item = await getItem(id);
		if (!canManage(item, principal)) {
			throw new ForbiddenError(`Not authorized to ${action} this item`);
		}
		return item;
	}

	return {
		getItem,
		getItemForUser: (id, principal) => authorize(id, principal, "access"),

		async listItemsByOwner(ownerId, page) {
			const result = await db.execute({
				sql: `SELECT ${ITEM_COLUMNS} FROM items WHERE owner_id = ?
					  ORDER BY id LIMIT ? OFFSET ?`,
				args: [ownerId, page.limit, page.skip],
			});
			return result.rows.map(toItem);
		},

		async countItemsByOwner(ownerId) {
			const result = await db.execute({
				sql: "SELECT COUNT(id) AS total FROM items WHERE owner_id = ?",
				args: [ownerId],
			});
			return toCount(result.rows[0]);
		},

		async createItem(ownerId, input) {
			const result = await db.execute({
				sql: `INSERT INTO items (title, description, owner_id)
					  VALUES (?, ?, ?)
					  RETURNING ${ITEM_COLUMNS}`,
				args: [input.title, input.description ?? null, ownerId],
			});
			return toItem(result.rows[0]);
		},

		async updateItem(id, input, principal) {
			const item = await authorize(id, principal, "modify");

			const assignments: string[] = [];
			const args: InValue[] = [];
			if (input.title !== undefined) {
				assignments.push("title = ?");
				args.push(input.title);
			}
			if (input.description !== undefined) {
				assignments.push("description = ?");
				args.push(input.description);
			}
			if (assignments.length === 0) return item;

			const result = await db.execute({
				sql: `UPDATE items
					  SET ${assignments.join(", ")}, updated_at = CURRENT_TIMESTAMP
					  WHERE id = ?
					  RETURNING ${ITEM_COLUMNS}`,
				args: [...args, id],
			});
			return toItem(result.rows[0]);
		},

		async deleteItem(id, principal) {
			await authorize(id, principal, "delete");
			await db.execute({ sql: "DELETE FROM items WHERE id = ?", args: [id] });
		},
	};
}
