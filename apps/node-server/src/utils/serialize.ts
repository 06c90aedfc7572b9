/**
 * @file serialize.ts
 * Converts domain objects to their snake_case wire shapes.
 *
 * @license Apache-2.0
 */

import type {
	Item,
	ItemResponse,
	Paginated,
	Principal,
	UserResponse,
} from "@item-api/types";
import type { Pagination } from "@item-api/schemas";

export function toUserResponse(user: Principal): UserResponse {
	return {
		id: user.id,
		email: user.email,
		full_name: user.fullName,
		is_active: user.isActive,
		is_superuser: user.isSuperuser,
		created_at: user.createdAt,
		updated_at: user.updatedAt,
	};
}

export function toItemResponse(item: Item): ItemResponse {
	return {
		id: item.id,
		title: item.title,
		description: item.description,
		owner_id: item.ownerId,
		created_at: item.createdAt,
		updated_at: item.updatedAt,
	};
}

export function toPage<T>(
	items: T[],
	total: number,
	page: Pagination,
): Paginated<T> {
	return { items, total, skip: page.skip, limit: page.limit };
}
