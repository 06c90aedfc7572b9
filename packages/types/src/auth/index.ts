/**
 * @file index.ts
 * Barrel file exporting all authentication-related types.
 *
 * @license Apache-2.0
 */

export * from "./authentication";
export * from "./principal";
export * from "./token";
