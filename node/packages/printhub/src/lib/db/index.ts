/**
 * Database layer for PrintHub
 */

export * from "./types.js";
export * from "./connection.js";
export * from "./migrations.js";
export * from "./query.js";
