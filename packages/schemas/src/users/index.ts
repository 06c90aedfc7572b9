/**
 * @file index.ts
 * Barrel file exporting user schemas.
 *
 * @license Apache-2.0
 */

export * from "./user";
