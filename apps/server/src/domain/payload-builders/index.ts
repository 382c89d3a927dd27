/**
 * Payload builders - pure functions for building email content.
 *
 * These are fully unit-testable with no side effects or dependencies.
 */

export * from "./types.js";
export * from "./email.js";
