/**
 * Shared domain types.
 */

export * from "./work.js";
export * from "./outcome.js";
