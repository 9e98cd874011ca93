/**
 * schemax: rule-based validation of dataset schema files
 *
 * @packageDocumentation
 */

// Core types
export * from "./types/index.js";

// Modules
export * from "./lib/loader/index.js";
export * from "./lib/schema/dataset-schema.js";
export * from "./lib/validator/index.js";
export * from "./lib/rules/index.js";
export * from "./lib/cache/index.js";
export * from "./lib/reporter/index.js";

// Utilities
export * from "./utils/logger.js";
export * from "./utils/errors.js";
export { loadValidateConfig, validateRequiredAttributes } from "./utils/config-loader.js";
export type { ValidateCliOptions, Environment } from "./utils/config-loader.js";
export { loadConfigFile, parseConfigFile } from "./cli/config/parser.js";
export type { SchemaxConfig, ValidateConfigSection } from "./cli/config/types.js";
