/**
 * Validate command - check dataset schema files
 */

import { Command, Option } from "commander";
import { resolve } from "path";
import { loadConfigFile } from "../config/parser.js";
import { ResultCache } from "../../lib/cache/index.js";
import { RULE_IDS, RuleOrchestrator } from "../../lib/rules/index.js";
import { ValidationReporter, type WriteFn } from "../../lib/reporter/index.js";
import { FAIL_MODES, OUTPUT_FORMATS, OUTPUT_LEVELS, type ValidateConfig } from "../../types/config.js";
import {
  loadValidateConfig,
  type Environment,
  type ValidateCliOptions,
} from "../../utils/config-loader.js";
import { ErrorCode, SchemaxError } from "../../utils/errors.js";
import { collectFilePaths, type PathInput } from "../../utils/file-paths.js";
import { logger } from "../../utils/logger.js";

export const EXIT_CONFIG_ERROR = 2;

export interface ValidateCommandOptions extends ValidateCliOptions {
  config?: string;
}

/**
 * Process bindings, replaceable for tests
 */
export interface ValidateRunIO {
  stdout?: WriteFn;
  stderr?: WriteFn;
  stdin?: PathInput;
  cwd?: string;
  env?: Environment;
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

async function openCache(config: ValidateConfig, cwd: string): Promise<ResultCache | undefined> {
  if (config.noCacheRead && config.noCacheWrite) {
    return undefined;
  }
  return ResultCache.open({
    persistPath: resolve(cwd, config.cachePath),
    read: !config.noCacheRead,
    write: !config.noCacheWrite,
  });
}

async function saveCache(cache: ResultCache | undefined): Promise<void> {
  if (!cache) return;
  try {
    await cache.save();
  } catch (error) {
    logger.warn("Cache could not be saved", {
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * Run a validation and return the process exit code
 */
export async function runValidate(
  filePaths: readonly string[],
  options: ValidateCommandOptions,
  io: ValidateRunIO = {},
): Promise<number> {
  const cwd = io.cwd ?? process.cwd();
  const stderr = io.stderr ?? ((text: string) => process.stderr.write(text));

  try {
    const configFile = loadConfigFile(options.config, cwd);
    const config = loadValidateConfig(options, configFile.validate, io.env ?? process.env);

    const cache = await openCache(config, cwd);
    const orchestrator = new RuleOrchestrator({
      selection: { apply: config.ruleApply, ignore: config.ruleIgnore },
      requiredAttributes: config.requiredAttributes,
      cache,
    });
    const reporter = new ValidationReporter({
      format: config.outputFormat,
      level: config.outputLevel,
      failMode: config.failMode,
      stdout: io.stdout,
      stderr,
    });

    const paths = collectFilePaths(filePaths, io.stdin ?? process.stdin);
    for await (const result of orchestrator.validateFiles(paths)) {
      if (reporter.report(result).stop) {
        logger.info("Stopping after first invalid file", { filePath: result.filePath });
        break;
      }
    }

    await saveCache(cache);
    return reporter.finish();
  } catch (error) {
    let schemaxError: SchemaxError;

    if (error instanceof SchemaxError) {
      schemaxError = error;
    } else {
      schemaxError = new SchemaxError(
        ErrorCode.GENERAL_ERROR,
        error instanceof Error ? error.message : String(error),
        undefined,
        { cause: error },
      );
    }

    stderr(JSON.stringify(schemaxError.toResponse("validation"), null, 2) + "\n");
    return EXIT_CONFIG_ERROR;
  }
}

export function createValidateCommand(): Command {
  return new Command("validate")
    .description("Validate dataset schema files (JSON or YAML)")
    .argument("[file_paths...]", "Files to validate; read from stdin when omitted")
    .addOption(new Option("--out <format>", "Output format").choices([...OUTPUT_FORMATS]))
    .option("--json", "Shortcut for --out json")
    .addOption(new Option("--output-level <level>", "Output level").choices([...OUTPUT_LEVELS]))
    .option("--verbose", "Shortcut for --output-level verbose")
    .option("--silent", "Shortcut for --output-level silent")
    .addOption(new Option("--fail-mode <mode>", "Failure mode").choices([...FAIL_MODES]))
    .option("--fail-fast", "Shortcut for --fail-mode fail_fast")
    .option("--fail-never", "Shortcut for --fail-mode fail_never")
    .option(
      "--rule-apply <ids>",
      `Run only these rules (comma-separated or repeated; ${RULE_IDS.join(", ")})`,
      collect,
    )
    .option("--rule-ignore <ids>", "Skip these rules (comma-separated or repeated)", collect)
    .option("--config <path>", "Config file (default: .schemax.yaml, .schemax.yml or .schemax.json)")
    .option("--no-cache", "Disable the result cache")
    .option("--no-cache-read", "Ignore cached results")
    .option("--no-cache-write", "Do not update the cache")
    .option("--cache-path <path>", "Cache file location")
    .action(async (filePaths: string[], options: ValidateCommandOptions) => {
      process.exitCode = await runValidate(filePaths, options);
    });
}
