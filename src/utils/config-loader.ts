/**
 * Configuration loader for the validate command
 */

import {
  DEFAULT_VALIDATE_CONFIG,
  FAIL_MODES,
  OUTPUT_FORMATS,
  OUTPUT_LEVELS,
  type FailMode,
  type OutputFormat,
  type OutputLevel,
  type RequiredAttributes,
  type ValidateConfig,
} from "../types/config.js";
import { COLUMN_TYPES, isColumnType } from "../types/data-model.js";
import type { ValidateConfigSection } from "../cli/config/types.js";
import { DATASET_PROPERTIES, columnAttributes } from "../lib/schema/dataset-schema.js";
import { resolveRuleSelection } from "../lib/rules/index.js";
import { ConfigError } from "./errors.js";
import { logger } from "./logger.js";

export const ENV_PREFIX = "SCHEMAX_VALIDATE_";

/**
 * CLI options for the validate command, as commander hands them over
 *
 * `cache`, `cacheRead` and `cacheWrite` are false when the matching
 * `--no-*` flag was given.
 */
export interface ValidateCliOptions {
  out?: string;
  json?: boolean;
  outputLevel?: string;
  verbose?: boolean;
  silent?: boolean;
  failMode?: string;
  failFast?: boolean;
  failNever?: boolean;
  ruleApply?: string[];
  ruleIgnore?: string[];
  cache?: boolean;
  cacheRead?: boolean;
  cacheWrite?: boolean;
  cachePath?: string;
}

export type Environment = Record<string, string | undefined>;

function parseChoice<T extends string>(
  value: string | undefined,
  choices: readonly T[],
  source: string,
): T | undefined {
  if (value === undefined) {
    return undefined;
  }
  const match = choices.find((choice) => choice === value);
  if (match === undefined) {
    throw new ConfigError(
      `Invalid value '${value}' for ${source}. Expected one of: ${choices.join(", ")}`,
    );
  }
  return match;
}

/**
 * Split comma-separated values, dropping blanks
 */
export function splitList(values: string | readonly string[] | undefined): string[] | undefined {
  if (values === undefined) {
    return undefined;
  }
  const items: readonly string[] = typeof values === "string" ? [values] : values;
  return items
    .flatMap((value) => value.split(","))
    .map((value) => value.trim())
    .filter((value) => value.length > 0);
}

function envValue(env: Environment, name: string): string | undefined {
  const value = env[`${ENV_PREFIX}${name}`]?.trim();
  return value ? value : undefined;
}

function cliOutputFormat(cli: ValidateCliOptions): OutputFormat | undefined {
  if (cli.json) {
    return "json";
  }
  return parseChoice(cli.out, OUTPUT_FORMATS, "--out");
}

function cliOutputLevel(cli: ValidateCliOptions): OutputLevel | undefined {
  if (cli.silent) {
    return "silent";
  }
  if (cli.verbose) {
    return "verbose";
  }
  return parseChoice(cli.outputLevel, OUTPUT_LEVELS, "--output-level");
}

function cliFailMode(cli: ValidateCliOptions): FailMode | undefined {
  if (cli.failFast) {
    return "fail_fast";
  }
  if (cli.failNever) {
    return "fail_never";
  }
  return parseChoice(cli.failMode, FAIL_MODES, "--fail-mode");
}

interface RuleLists {
  ruleApply: string[];
  ruleIgnore: string[];
}

/**
 * Rule lists come as a pair from the highest source that sets either
 */
function selectRuleLists(
  cli: ValidateCliOptions,
  env: Environment,
  section: ValidateConfigSection,
): RuleLists {
  const sources: Array<[string | readonly string[] | undefined, string | readonly string[] | undefined]> = [
    [cli.ruleApply, cli.ruleIgnore],
    [envValue(env, "RULE_APPLY"), envValue(env, "RULE_IGNORE")],
    [section.ruleApply, section.ruleIgnore],
  ];

  for (const [apply, ignore] of sources) {
    const ruleApply = splitList(apply) ?? [];
    const ruleIgnore = splitList(ignore) ?? [];
    if (ruleApply.length > 0 || ruleIgnore.length > 0) {
      return { ruleApply, ruleIgnore };
    }
  }
  return { ruleApply: [], ruleIgnore: [] };
}

/**
 * Check that required attribute names exist in the structural model
 *
 * @throws ConfigError naming the unknown attributes
 */
export function validateRequiredAttributes(required: RequiredAttributes): void {
  const datasetFields = Object.keys(DATASET_PROPERTIES);
  const unknownDataset = (required.dataset ?? []).filter((name) => !datasetFields.includes(name));
  if (unknownDataset.length > 0) {
    throw new ConfigError(
      `Unknown dataset attribute(s) in requiredAttributes: ${unknownDataset.join(", ")}`,
      { known: datasetFields },
    );
  }

  for (const [columnType, names] of Object.entries(required.columns ?? {})) {
    if (!isColumnType(columnType)) {
      throw new ConfigError(
        `Unknown column type '${columnType}' in requiredAttributes. Expected one of: ${COLUMN_TYPES.join(", ")}`,
      );
    }
    const known = columnAttributes(columnType);
    const unknownColumn = (names ?? []).filter((name) => !known.includes(name));
    if (unknownColumn.length > 0) {
      throw new ConfigError(
        `Unknown '${columnType}' column attribute(s) in requiredAttributes: ${unknownColumn.join(", ")}`,
        { known },
      );
    }
  }
}

/**
 * Resolve validate settings from CLI options, environment and config file
 *
 * @example
 * const config = loadValidateConfig(
 *   { json: true },
 *   { outputFormat: "text", failMode: "fail_never" },
 * );
 * // outputFormat: "json" (CLI wins), failMode: "fail_never" (from file)
 */
export function loadValidateConfig(
  cliOptions: ValidateCliOptions = {},
  configFile: ValidateConfigSection = {},
  env: Environment = process.env,
): ValidateConfig {
  const defaults = DEFAULT_VALIDATE_CONFIG;

  const outputFormat =
    cliOutputFormat(cliOptions) ??
    parseChoice(envValue(env, "OUTPUT_FORMAT"), OUTPUT_FORMATS, `${ENV_PREFIX}OUTPUT_FORMAT`) ??
    configFile.outputFormat ??
    defaults.outputFormat;

  const outputLevel =
    cliOutputLevel(cliOptions) ??
    parseChoice(envValue(env, "OUTPUT_LEVEL"), OUTPUT_LEVELS, `${ENV_PREFIX}OUTPUT_LEVEL`) ??
    configFile.outputLevel ??
    defaults.outputLevel;

  const failMode =
    cliFailMode(cliOptions) ??
    parseChoice(envValue(env, "FAIL_MODE"), FAIL_MODES, `${ENV_PREFIX}FAIL_MODE`) ??
    configFile.failMode ??
    defaults.failMode;

  const cacheDisabled = cliOptions.cache === false;
  const requiredAttributes = configFile.requiredAttributes ?? defaults.requiredAttributes;

  const config: ValidateConfig = {
    outputFormat,
    outputLevel,
    failMode,
    ...selectRuleLists(cliOptions, env, configFile),
    noCacheRead:
      cacheDisabled || cliOptions.cacheRead === false || (configFile.noCacheRead ?? defaults.noCacheRead),
    noCacheWrite:
      cacheDisabled || cliOptions.cacheWrite === false || (configFile.noCacheWrite ?? defaults.noCacheWrite),
    cachePath: cliOptions.cachePath ?? configFile.cachePath ?? defaults.cachePath,
    requiredAttributes,
  };

  // Fails on unknown ids and on apply together with ignore
  resolveRuleSelection({ apply: config.ruleApply, ignore: config.ruleIgnore });
  validateRequiredAttributes(requiredAttributes);

  logger.debug("Validate config loaded", {
    outputFormat: config.outputFormat,
    outputLevel: config.outputLevel,
    failMode: config.failMode,
    ruleApply: config.ruleApply,
    ruleIgnore: config.ruleIgnore,
  });

  return config;
}
