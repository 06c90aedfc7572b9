/**
 * @file index.ts
 * Exports authentication utilities.
 *
 * @license Apache-2.0
 */

export * from "./bearer";
export * from "./crypto";
export * from "./time";
export * from "./subject";
