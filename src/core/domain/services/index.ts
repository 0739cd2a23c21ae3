export * from "./statement-builder.js";
