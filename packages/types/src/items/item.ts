/**
 * @file item.ts
 * Item resource owned by a user.
 *
 * @license Apache-2.0
 */

export interface Item {
	id: number;
	title: string;
	description: string | null;
	ownerId: number;
	createdAt: string;
	updatedAt: string;
}
