/**
 * @file responses.ts
 * JSON response bodies sent to clients.
 *
 * @license Apache-2.0
 */

/** User as exposed over HTTP. Never carries the password digest. */
export interface UserResponse {
	id: number;
	email: string;
	full_name: string | null;
	is_active: boolean;
	is_superuser: boolean;
	created_at: string;
	updated_at: string;
}

export interface ItemResponse {
	id: number;
	title: string;
	description: string | null;
	owner_id: number;
	created_at: string;
	updated_at: string;
}

/** Page of a list endpoint. */
export interface Paginated<T> {
	items: T[];
	total: number;
	skip: number;
	limit: number;
}

export interface MessageResponse {
	message: string;
}
