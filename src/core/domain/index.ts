/**
 * @module core/domain
 * Value objects, schema cache, statement building and errors
 */

export * from "./value-objects/index.js";
export * from "./schema/index.js";
export * from "./services/index.js";
export * from "./errors/index.js";
