/**
 * @file index.ts
 * Main entry point for application errors.
 * Exports error types and utilities for error handling.
 *
 * @license Apache-2.0
 */

export * from "./errors";
