/**
 * @module core/ports
 * Ports (interfaces) for hexagonal architecture
 */

export * from "./data-access.port.js";
export * from "./sql-dialect.port.js";
