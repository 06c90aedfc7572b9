/**
 * @file errors.ts
 * Error hierarchy for request failures.
 * Provides specific error types and status codes following HTTP semantics.
 *
 * Usage:
 * - 400 Bad Request: Malformed request outside schema validation
 * - 401 Unauthorized: Missing/invalid credentials or tokens, inactive accounts
 * - 403 Forbidden: Valid auth but insufficient permissions
 * - 404 Not Found: Unknown resource
 * - 409 Conflict: Resource conflicts (e.g., duplicate email)
 * - 422 Unprocessable Entity: Schema validation failures
 *
 * @license Apache-2.0
 */

/** HTTP statuses the application reports for handled failures. */
export type ErrorStatus = 400 | 401 | 403 | 404 | 409 | 422 | 500;

/**
 * Uniform JSON body for every failure response.
 */
export interface ErrorBody {
	error: string;
	code: string;
	detail?: string[];
}

/**
 * Base application error providing status codes and error categorization.
 * Extended by specific error types for different failure classes.
 */
export class AppError extends Error {
	constructor(
		message: string,
		readonly code: string,
		readonly statusCode: ErrorStatus,
		readonly detail?: string[],
	) {
		super(message);
		this.name = "AppError";
		Object.setPrototypeOf(this, AppError.prototype);
	}
}

export class BadRequestError extends AppError {
	constructor(message = "Bad request", code = "BAD_REQUEST") {
		super(message, code, 400);
		this.name = "BadRequestError";
		Object.setPrototypeOf(this, BadRequestError.prototype);
	}
}

/**
 * Authentication failures. Distinct internal causes share the default
 * message so clients cannot tell a bad token from an unknown user.
 */
export class UnauthorizedError extends AppError {
	constructor(
		message = "Could not validate credentials",
		code = "UNAUTHORIZED",
	) {
		super(message, code, 401);
		this.name = "UnauthorizedError";
		Object.setPrototypeOf(this, UnauthorizedError.prototype);
	}

	/** @returns UnauthorizedError for a deactivated account */
	static inactive(message = "Inactive user") {
		return new UnauthorizedError(message, "INACTIVE_USER");
	}
}

/**
 * Authenticated but not allowed.
 */
export class ForbiddenError extends AppError {
	constructor(message = "Not enough permissions", code = "FORBIDDEN") {
		super(message, code, 403);
		this.name = "ForbiddenError";
		Object.setPrototypeOf(this, ForbiddenError.prototype);
	}
}

export class NotFoundError extends AppError {
	constructor(resource = "Resource") {
		super(`${resource} not found`, "NOT_FOUND", 404);
		this.name = "NotFoundError";
		Object.setPrototypeOf(this, NotFoundError.prototype);
	}
}

export class ConflictError extends AppError {
	constructor(message = "Resource already exists", code = "CONFLICT") {
		super(message, code, 409);
		this.name = "ConflictError";
		Object.setPrototypeOf(this, ConflictError.prototype);
	}
}

/**
 * Custom error for validation failures.
 * Used to distinguish validation errors that can be shown to users
 * from other types of errors that should be handled differently.
 */
export class ValidationError extends AppError {
	constructor(message: string, detail?: string[]) {
		super(message, "VALIDATION_ERROR", 422, detail);
		this.name = "ValidationError";
		// Ensures proper prototype chain for instanceof checks
		Object.setPrototypeOf(this, ValidationError.prototype);
	}
}

/**
 * Builds the client-facing body for an application error.
 *
 * @param error - Handled application error
 * @returns Uniform error body; `detail` only when the error carries one
 */
export function toErrorBody(error: AppError): ErrorBody {
	return error.detail
		? { error: error.message, code: error.code, detail: error.detail }
		: { error: error.message, code: error.code };
}
