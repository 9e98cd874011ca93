/**
 * Type exports for schemax
 */

export * from "./data-model.js";
export * from "./config.js";
