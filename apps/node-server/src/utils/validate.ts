/**
 * @file validate.ts
 * Request parsing helpers that turn schema failures into 422 responses.
 *
 * @license Apache-2.0
 */

import { BadRequestError, ValidationError } from "@item-api/errors";
import {
	type LoginInput,
	formatZodError,
	idParamSchema,
	listZodIssues,
	loginSchema,
} from "@item-api/schemas";
import type { Context } from "hono";
import type { z } from "zod";

/**
 * Parses a value with a schema.
 *
 * @throws ValidationError with one detail line per issue
 */
export function parseWith<S extends z.ZodType>(
	schema: S,
	input: unknown,
): z.output<S> {
	const result = schema.safeParse(input);
	if (!result.success) {
		throw new ValidationError(
			formatZodError(result.error),
			listZodIssues(result.error),
		);
	}
	return result.data;
}

/**
 * Reads the request body as JSON.
 * @throws BadRequestError when the body is not valid JSON
 */
export async function readJsonBody(ctx: Context): Promise<unknown> {
	try {
		return await ctx.req.json<unknown>();
	} catch (error) {
		console.warn("[http] unreadable JSON body:", error);
		throw new BadRequestError("Request body must be valid JSON");
	}
}

const isJson = (ctx: Context) =>
	(ctx.req.header("Content-Type") ?? "").includes("application/json");

/**
 * Reads login credentials from either an OAuth2-style form
 * (`username`, `password`) or a JSON body (`email`, `password`).
 */
export async function readLoginInput(ctx: Context): Promise<LoginInput> {
	if (isJson(ctx)) {
		return parseWith(loginSchema, await readJsonBody(ctx));
	}

	const form = await ctx.req.parseBody();
	return parseWith(loginSchema, {
		email: form.username,
		password: form.password,
	});
}

/** Reads the refresh token from a JSON body or the `refresh_token` query parameter. */
export async function readRefreshToken(ctx: Context): Promise<unknown> {
	if (isJson(ctx)) {
		return readJsonBody(ctx);
	}
	return { refresh_token: ctx.req.query("refresh_token") };
}

/** Parses the `:id` path parameter. */
export function readIdParam(ctx: Context): number {
	return parseWith(idParamSchema, ctx.req.param("id"));
}
