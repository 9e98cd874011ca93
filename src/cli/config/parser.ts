/**
 * Configuration file parser - supports JSON and YAML
 */

import { existsSync, readFileSync } from "fs";
import { extname, resolve } from "path";
import AjvModule from "ajv";
import type { SchemaObject } from "ajv";
import { parse as parseYaml } from "yaml";
import { COLUMN_TYPES } from "../../types/data-model.js";
import { FAIL_MODES, OUTPUT_FORMATS, OUTPUT_LEVELS } from "../../types/config.js";
import { ConfigError, FileIOError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import type { SchemaxConfig } from "./types.js";

const Ajv = AjvModule.default;

export const DEFAULT_CONFIG_FILES = [".schemax.yaml", ".schemax.yml", ".schemax.json"];

const STRING_LIST: SchemaObject = { type: "array", items: { type: "string" } };

const CONFIG_FILE_SCHEMA: SchemaObject = {
  type: "object",
  properties: {
    validate: {
      type: "object",
      properties: {
        outputFormat: { type: "string", enum: [...OUTPUT_FORMATS] },
        outputLevel: { type: "string", enum: [...OUTPUT_LEVELS] },
        failMode: { type: "string", enum: [...FAIL_MODES] },
        ruleApply: STRING_LIST,
        ruleIgnore: STRING_LIST,
        noCacheRead: { type: "boolean" },
        noCacheWrite: { type: "boolean" },
        cachePath: { type: "string", minLength: 1 },
        requiredAttributes: {
          type: "object",
          properties: {
            dataset: STRING_LIST,
            columns: {
              type: "object",
              properties: Object.fromEntries(COLUMN_TYPES.map((type) => [type, STRING_LIST])),
              additionalProperties: false,
            },
          },
          additionalProperties: false,
        },
      },
      additionalProperties: false,
    },
  },
  additionalProperties: false,
};

const validateConfigFile = new Ajv({ allErrors: true }).compile<SchemaxConfig>(CONFIG_FILE_SCHEMA);

/**
 * Parse and check a configuration file (JSON or YAML)
 */
export function parseConfigFile(filePath: string): SchemaxConfig {
  logger.info("Parsing configuration file", { filePath });

  const extension = extname(filePath).toLowerCase();
  const isYaml = extension === ".yaml" || extension === ".yml";
  if (!isYaml && extension !== ".json") {
    throw new ConfigError(
      `Unsupported config file format: ${filePath}. Must be .json, .yaml, or .yml`,
    );
  }

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new FileIOError(`Failed to read config file: ${filePath}`, undefined, {
      cause: error,
    });
  }

  let parsed: unknown;
  try {
    parsed = isYaml ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${filePath}`, undefined, {
      cause: error,
    });
  }

  // An empty YAML file parses to null
  const config: unknown = parsed ?? {};
  if (!validateConfigFile(config)) {
    const problems = (validateConfigFile.errors ?? []).map(
      (error) => `${error.instancePath || "/"} ${error.message ?? "is invalid"}`,
    );
    throw new ConfigError(`Invalid config file: ${filePath}`, { problems });
  }

  logger.info("Configuration file parsed successfully", {
    hasValidateConfig: config.validate !== undefined,
  });
  return config;
}

/**
 * Load the config file named by `--config`, or the first default one in `cwd`
 *
 * Returns an empty config when no file is named and no default file exists.
 */
export function loadConfigFile(explicitPath?: string, cwd: string = process.cwd()): SchemaxConfig {
  if (explicitPath !== undefined) {
    const filePath = resolve(cwd, explicitPath);
    if (!existsSync(filePath)) {
      throw new ConfigError(`Config file not found: ${explicitPath}`);
    }
    return parseConfigFile(filePath);
  }

  for (const candidate of DEFAULT_CONFIG_FILES) {
    const filePath = resolve(cwd, candidate);
    if (existsSync(filePath)) {
      return parseConfigFile(filePath);
    }
  }

  logger.debug("No configuration file found", { cwd });
  return {};
}
