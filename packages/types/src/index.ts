export * from "./document.js";
export type * from "./entities.js";
export type * from "./pipeline.js";
export * from "./query.js";
export type * from "./job.js";
export type * from "./config.js";
