/**
 * @file index.ts
 * Barrel file exporting shared request schemas.
 *
 * @license Apache-2.0
 */

export * from "./pagination";
