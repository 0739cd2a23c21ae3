/**
 * @module core
 * Core layer exports (domain + ports)
 */

export * from "./domain/index.js";
export * from "./ports/index.js";
