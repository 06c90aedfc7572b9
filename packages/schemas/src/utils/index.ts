/**
 * @file index.ts
 * Barrel file exporting schema utilities.
 *
 * @license Apache-2.0
 */

export * from "./zod";
