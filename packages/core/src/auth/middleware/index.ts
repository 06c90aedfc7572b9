/**
 * @file index.ts
 * Exports authentication middleware components.
 *
 * @license Apache-2.0
 */

export * from "./require-auth";
