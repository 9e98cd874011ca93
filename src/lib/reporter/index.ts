/**
 * Reporter module - renders per-file results and decides the exit status
 */

import {
  toValidationOutput,
  type FileValidationResult,
} from "../../types/data-model.js";
import { Summary } from "./summary.js";
import type { ReportDecision, ReporterOptions, WriteFn } from "./types.js";

export { Summary } from "./summary.js";
export type { ReportDecision, ReporterOptions, SummaryRecord, WriteFn } from "./types.js";

export const COMPLETED_WITH_ERRORS = "Validation completed with errors!";
export const COMPLETED_SUCCESSFULLY = "Validation completed successfully!";

/**
 * Text rendering: a status line per file, one indented line per error
 */
export function renderText(result: FileValidationResult): string {
  if (result.isValid) {
    return `✅ ${result.filePath}\n`;
  }
  const lines = [`❌ ${result.filePath}`];
  for (const issue of result.errors) {
    lines.push(`    - ${issue.location} : ${issue.message}`);
  }
  return lines.join("\n") + "\n";
}

/**
 * JSON rendering: the output contract on a single line
 */
export function renderJson(result: FileValidationResult): string {
  return JSON.stringify(toValidationOutput(result)) + "\n";
}

export class ValidationReporter {
  readonly summary = new Summary();
  private options: ReporterOptions;
  private stdout: WriteFn;
  private stderr: WriteFn;

  constructor(options: ReporterOptions) {
    this.options = options;
    this.stdout = options.stdout ?? ((text) => process.stdout.write(text));
    this.stderr = options.stderr ?? ((text) => process.stderr.write(text));
  }

  private render(result: FileValidationResult): void {
    this.stdout(this.options.format === "json" ? renderJson(result) : renderText(result));
  }

  /**
   * Record and print one result according to the output level
   */
  report(result: FileValidationResult): ReportDecision {
    this.summary.addRecord(result.isValid, result.filePath);

    const { level, failMode } = this.options;
    if (result.isValid) {
      if (level === "verbose") {
        this.render(result);
      }
      return { stop: false };
    }

    if (level !== "silent") {
      this.render(result);
    }
    return { stop: failMode === "fail_fast" };
  }

  /**
   * Print the closing status and return the process exit code
   */
  finish(): number {
    const { level, failMode } = this.options;
    const failed = this.summary.invalidFileCount > 0;

    if (level === "verbose") {
      const { validatedFileCount, validFileCount, invalidFileCount } = this.summary;
      this.stderr(
        `Validated ${validatedFileCount} file(s): ${validFileCount} valid, ${invalidFileCount} invalid\n`,
      );
    }
    if (level !== "silent") {
      this.stderr(`${failed ? COMPLETED_WITH_ERRORS : COMPLETED_SUCCESSFULLY}\n`);
    }

    return failed && failMode !== "fail_never" ? 1 : 0;
  }
}
