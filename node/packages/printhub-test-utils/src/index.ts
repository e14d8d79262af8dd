/**
 * Testing utilities for PrintHub
 */

export * from "./helpers.js";
