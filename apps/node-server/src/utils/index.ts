/**
 * @file index.ts
 * Exports request and response helpers.
 *
 * @license Apache-2.0
 */

export * from "./serialize";
export * from "./validate";
