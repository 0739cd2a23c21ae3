/**
 * @module adapters
 * Adapters for external systems
 */

export * from "./persistence/index.js";
