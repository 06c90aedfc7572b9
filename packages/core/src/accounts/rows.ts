/**
 * @file rows.ts
 * Row schemas mapping database rows to domain objects.
 *
 * @license Apache-2.0
 */

import type { Item, Principal, UserRecord } from "@item-api/types";
import { LibsqlError } from "@libsql/client";
import { z } from "zod";

/** SQLite stores booleans as 0/1 integers. */
const flag = z.number().transform((value) => value !== 0);

/** `CURRENT_TIMESTAMP` values are UTC without a zone designator. */
const timestamp = z
	.string()
	.transform((value) =>
		/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/.test(value)
			? `${value.replace(" ", "T")}Z`
			: value,
	);

export const USER_COLUMNS =
	"id, email, password_data, full_name, is_active, is_superuser, created_at, updated_at";

export const ITEM_COLUMNS =
	"id, title, description, owner_id, created_at, updated_at";

const userRowSchema = z.object({
	id: z.number().int(),
	email: z.string(),
	password_data: z.string(),
	full_name: z.string().nullable(),
	is_active: flag,
	is_superuser: flag,
	created_at: timestamp,
	updated_at: timestamp,
});

const itemRowSchema = z.object({
	id: z.number().int(),
	title: z.string(),
	description: z.string().nullable(),
	owner_id: z.number().int(),
	created_at: timestamp,
	updated_at: timestamp,
});

const countRowSchema = z.object({ total: z.number().int() });

export function toUserRecord(row: unknown): UserRecord {
	const parsed = userRowSchema.parse(row);
	return {
		id: parsed.id,
		email: parsed.email,
		passwordData: parsed.password_data,
		fullName: parsed.full_name,
		isActive: parsed.is_active,
		isSuperuser: parsed.is_superuser,
		createdAt: parsed.created_at,
		updatedAt: parsed.updated_at,
	};
}

/** Drops the password digest from a user record. */
export function toPrincipal(record: UserRecord): Principal {
	const { passwordData: _passwordData, ...principal } = record;
	return principal;
}

export function toItem(row: unknown): Item {
	const parsed = itemRowSchema.parse(row);
	return {
		id: parsed.id,
		title: parsed.title,
		description: parsed.description,
		ownerId: parsed.owner_id,
		createdAt: parsed.created_at,
		updatedAt: parsed.updated_at,
	};
}

export function toCount(row: unknown): number {
	return countRowSchema.parse(row).total;
}

/** True when a statement failed on a UNIQUE constraint. */
export function isUniqueViolation(error: unknown): boolean {
	return (
		error instanceof LibsqlError &&
		error.code.startsWith("SQLITE_CONSTRAINT") &&
		/UNIQUE/i.test(error.message)
	);
}
