/**
 * @file index.ts
 * Barrel file exporting item schemas.
 *
 * @license Apache-2.0
 */

export * from "./item";
