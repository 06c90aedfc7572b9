/**
 * @file index.ts
 * Barrel file exporting item types.
 *
 * @license Apache-2.0
 */

export * from "./item";
