/**
 * Reporter module types
 */

import type { FailMode, OutputFormat, OutputLevel } from "../../types/config.js";

export type WriteFn = (text: string) => void;

export interface ReporterOptions {
  format: OutputFormat;
  level: OutputLevel;
  failMode: FailMode;
  /** Receives rendered results; defaults to process.stdout */
  stdout?: WriteFn;
  /** Receives the summary and closing status; defaults to process.stderr */
  stderr?: WriteFn;
}

export interface ReportDecision {
  /** True when the batch should stop (fail_fast after an invalid file) */
  stop: boolean;
}

export interface SummaryRecord {
  validated_file_count: number;
  valid_file_count: number;
  invalid_file_count: number;
  error_files: string[];
}
