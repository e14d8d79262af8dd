export * from "./types/result.js";
export * from "./errors.js";
export * from "./slug.js";
