/**
 * Core data model types for schemax
 */

// ============================================================================
// Generic value tree
// ============================================================================

export type DocumentScalar = string | number | boolean | null;

export interface DocumentMapping {
  [key: string]: DocumentValue;
}

/**
 * DocumentValue - parsed but unvalidated document (JSON or YAML)
 */
export type DocumentValue = DocumentScalar | DocumentValue[] | DocumentMapping;

export function isDocumentMapping(value: DocumentValue | undefined): value is DocumentMapping {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ============================================================================
// Dataset schema (validated form)
// ============================================================================

export const COLUMN_TYPES = [
  "string",
  "integer",
  "float",
  "boolean",
  "date",
  "datetime",
] as const;

export type ColumnType = (typeof COLUMN_TYPES)[number];

export function isColumnType(value: unknown): value is ColumnType {
  return typeof value === "string" && (COLUMN_TYPES as readonly string[]).includes(value);
}

interface BaseColumn {
  name: string;
  nullable: boolean;
  unique: boolean;
  primary_key: boolean;
  description?: string | null;
}

export interface StringColumn extends BaseColumn {
  type: "string";
  min_length?: number | null;
  max_length?: number | null;
  pattern?: string | null;
}

export interface IntegerColumn extends BaseColumn {
  type: "integer";
  minimum?: number | null;
  maximum?: number | null;
}

export interface FloatColumn extends BaseColumn {
  type: "float";
  minimum?: number | null;
  maximum?: number | null;
  precision?: number | null;
}

export interface BooleanColumn extends BaseColumn {
  type: "boolean";
}

export interface DateColumn extends BaseColumn {
  type: "date";
  format: string;
}

export interface DateTimeColumn extends BaseColumn {
  type: "datetime";
  format: string;
  timezone?: string | null;
}

export type Column =
  | StringColumn
  | IntegerColumn
  | FloatColumn
  | BooleanColumn
  | DateColumn
  | DateTimeColumn;

export interface DatasetSchema {
  fqn: string;
  name: string;
  description?: string | null;
  version: string;
  columns: Column[];
  metadata?: Record<string, DocumentScalar> | null;
  tags?: string[] | null;
  inherits?: string[] | null;
  inherited_by?: string[] | null;
}

type DefaultedColumnKey = "nullable" | "unique" | "primary_key" | "format";

type ToColumnInput<C> = C extends Column
  ? Omit<C, DefaultedColumnKey> & {
      [K in Extract<keyof C, DefaultedColumnKey>]?: K extends "format" ? C[K] | null : C[K];
    }
  : never;

/**
 * Column as written in a document that passed structural validation,
 * before defaults are applied
 */
export type ColumnInput = ToColumnInput<Column>;

export type DatasetSchemaInput = Omit<DatasetSchema, "version" | "columns"> & {
  version?: string;
  columns: ColumnInput[];
};

// ============================================================================
// Validation results
// ============================================================================

export type LoadErrorKind = "not_found" | "unsupported_format" | "parse_error";

export type StructuralErrorKind =
  | "missing"
  | "type_error"
  | "constraint_violation"
  | "discriminator_mismatch"
  | "extra_field";

export type UniquenessErrorKind = "missing_fqn" | "duplicate_fqn";

export type ValidationErrorKind = LoadErrorKind | StructuralErrorKind | UniquenessErrorKind;

export const VALIDATION_ERROR_KINDS = [
  "not_found",
  "unsupported_format",
  "parse_error",
  "missing",
  "type_error",
  "constraint_violation",
  "discriminator_mismatch",
  "extra_field",
  "missing_fqn",
  "duplicate_fqn",
] as const satisfies readonly ValidationErrorKind[];

export function isValidationErrorKind(value: unknown): value is ValidationErrorKind {
  return typeof value === "string" && (VALIDATION_ERROR_KINDS as readonly string[]).includes(value);
}

/**
 * Raw information from the structural check that produced an issue
 */
export interface IssueDetail {
  type: string;
  msg: string;
}

export interface ValidationIssue {
  kind: ValidationErrorKind;
  /** Root-relative JSONPath-style location, e.g. `$.columns[0].name` */
  location: string;
  message: string;
  detail: IssueDetail | null;
}

export interface FileValidationResult {
  readonly filePath: string;
  readonly isValid: boolean;
  readonly errors: readonly ValidationIssue[];
  readonly errorCount: number;
}

/**
 * ValidationOutput - per-file output consumed by the text and JSON renderers
 *
 * Field names are a stable contract for CI log parsing.
 */
export interface ValidationOutput {
  file_path: string;
  valid: boolean;
  errors: Array<{
    type: ValidationErrorKind;
    error_at: string;
    message: string;
    pydantic_error: IssueDetail | null;
  }>;
  error_count: number;
}

export function createFileResult(
  filePath: string,
  errors: readonly ValidationIssue[],
): FileValidationResult {
  const frozenErrors = Object.freeze(errors.map((issue) => Object.freeze({ ...issue })));
  return Object.freeze({
    filePath,
    isValid: frozenErrors.length === 0,
    errors: frozenErrors,
    errorCount: frozenErrors.length,
  });
}

export function toValidationOutput(result: FileValidationResult): ValidationOutput {
  return {
    file_path: result.filePath,
    valid: result.isValid,
    errors: result.errors.map((issue) => ({
      type: issue.kind,
      error_at: issue.location,
      message: issue.message,
      pydantic_error: issue.detail ? { type: issue.detail.type, msg: issue.detail.msg } : null,
    })),
    error_count: result.errorCount,
  };
}
