/**
 * @file index.ts
 * Main entry point for core functionality.
 *
 * @license Apache-2.0
 */

export * from "./accounts";
export * from "./auth";
