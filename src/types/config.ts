/**
 * Configuration types for schemax
 */

import type { ColumnType } from "./data-model.js";

export const OUTPUT_FORMATS = ["text", "json"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export const OUTPUT_LEVELS = ["silent", "quiet", "verbose"] as const;
export type OutputLevel = (typeof OUTPUT_LEVELS)[number];

export const FAIL_MODES = ["fail_fast", "fail_never", "fail_after"] as const;
export type FailMode = (typeof FAIL_MODES)[number];

/**
 * RequiredAttributes - extra attributes to require on top of the model's own
 */
export interface RequiredAttributes {
  dataset?: string[];
  columns?: Partial<Record<ColumnType, string[]>>;
}

/**
 * RuleSelection - `apply` and `ignore` are mutually exclusive
 */
export interface RuleSelection {
  apply?: string[];
  ignore?: string[];
}

/**
 * ValidateConfig - fully resolved settings of the validate command
 */
export interface ValidateConfig {
  outputFormat: OutputFormat;
  outputLevel: OutputLevel;
  failMode: FailMode;
  ruleApply: string[];
  ruleIgnore: string[];
  noCacheRead: boolean;
  noCacheWrite: boolean;
  cachePath: string;
  requiredAttributes: RequiredAttributes;
}

export const DEFAULT_CACHE_PATH = ".schemax_cache/results.json";

export const DEFAULT_VALIDATE_CONFIG: ValidateConfig = {
  outputFormat: "text",
  outputLevel: "quiet",
  failMode: "fail_after",
  ruleApply: [],
  ruleIgnore: [],
  noCacheRead: false,
  noCacheWrite: false,
  cachePath: DEFAULT_CACHE_PATH,
  requiredAttributes: {},
};
