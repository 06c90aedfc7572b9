/**
 * @file index.ts
 * Barrel file exporting configuration schemas.
 *
 * @license Apache-2.0
 */

export * from "./env";
