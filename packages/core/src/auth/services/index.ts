/**
 * @file index.ts
 * Exports authentication service implementations.
 *
 * @license LGPL-3.0-or-later
 */

export * from "./auth-service";
export * from "./identity-service";
export * from "./password-service";
export * from "./token-codec";
export * from "./token-service";
