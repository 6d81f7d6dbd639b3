export * from "./documents.js";
export * from "./entities.js";
