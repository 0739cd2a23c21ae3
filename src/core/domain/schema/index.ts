export * from "./db-schema.js";
