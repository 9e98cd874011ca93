/**
 * Configuration file types
 */

import type { ValidateConfig } from "../../types/config.js";

/**
 * `validate` section of a config file; every field is optional
 */
export type ValidateConfigSection = Partial<ValidateConfig>;

/**
 * Root of a `.schemax.yaml` / `.schemax.json` file
 */
export interface SchemaxConfig {
  validate?: ValidateConfigSection;
}
