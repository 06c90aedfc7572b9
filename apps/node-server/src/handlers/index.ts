/**
 * @file index.ts
 * Exports route handler factories.
 *
 * @license Apache-2.0
 */

export * from "./auth-handlers";
export * from "./health-handlers";
export * from "./item-handlers";
export * from "./user-handlers";
