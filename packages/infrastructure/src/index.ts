/**
 * @file index.ts
 * Main entry point for infrastructure functionality.
 *
 * @license Apache-2.0
 */

export * from "./db";
