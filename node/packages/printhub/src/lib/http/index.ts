export * from "./respond.js";
export * from "./query.js";
export * from "./upload.js";
