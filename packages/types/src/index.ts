/**
 * @file index.ts
 * Main entry point for shared domain types.
 * Exports all type definitions organized by domain.
 *
 * @license Apache-2.0
 */

export * from "./auth";
export * from "./http";
export * from "./items";
