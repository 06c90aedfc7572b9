/**
 * @file index.ts
 * Exports user and item services.
 *
 * @license Apache-2.0
 */

export * from "./item-service";
export * from "./user-service";
