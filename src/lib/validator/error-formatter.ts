/**
 * Translate Ajv errors into validation issues
 */

import type { ErrorObject } from "ajv";
import {
  COLUMN_TYPES,
  isColumnType,
  isDocumentMapping,
  type ColumnType,
  type DocumentValue,
  type StructuralErrorKind,
  type ValidationIssue,
} from "../../types/data-model.js";
import { COLUMN_TAG, isColumnUnionSchema } from "../schema/dataset-schema.js";
import { formatLocation, pointerToPath, valueAt, type PathSegment } from "./location.js";

const TYPE_NAMES: Record<string, string> = {
  array: "list",
  number: "float",
};

const EXPECTED_TAGS = `[${COLUMN_TYPES.map((columnType) => `'${columnType}'`).join(", ")}]`;

function issue(
  kind: StructuralErrorKind,
  path: readonly PathSegment[],
  message: string,
  error: ErrorObject,
): ValidationIssue {
  return {
    kind,
    location: formatLocation(path),
    message,
    detail: { type: error.keyword, msg: error.message ?? "" },
  };
}

function param(error: ErrorObject, name: string): unknown {
  return error.params[name];
}

function stringParam(error: ErrorObject, name: string): string {
  const value = param(error, name);
  return typeof value === "string" ? value : String(value);
}

function lastSegment(path: readonly PathSegment[]): string {
  const last = path[path.length - 1];
  return last === undefined ? "$" : String(last);
}

function expectedTypeText(types: unknown): string {
  let listed = (Array.isArray(types) ? types : [types]).map(String);
  // An optional attribute is `[type, "null"]`; name only the real type
  if (listed.length === 2 && listed[1] === "null") {
    listed = listed.slice(0, 1);
  }
  const names = listed.map((name) => TYPE_NAMES[name] ?? name);
  if (names.length === 1) {
    return `'${names[0]}' type`;
  }
  return `one of ${names.map((name) => `'${name}'`).join(", ")} types`;
}

function plural(count: unknown, word: string): string {
  return `${String(count)} ${word}${count === 1 ? "" : "s"}`;
}

/**
 * Column type of the column found at `path`, when `path` points at one
 */
function columnTypeAt(document: DocumentValue, path: readonly PathSegment[]): ColumnType | undefined {
  if (path.length !== 2 || path[0] !== "columns" || typeof path[1] !== "number") {
    return undefined;
  }
  const column = valueAt(document, path);
  if (!isDocumentMapping(column)) {
    return undefined;
  }
  const tag = column[COLUMN_TAG];
  return isColumnType(tag) ? tag : undefined;
}

function discriminatorIssue(
  document: DocumentValue,
  path: readonly PathSegment[],
  error: ErrorObject,
): ValidationIssue {
  if (valueAt(document, [...path, COLUMN_TAG]) === undefined) {
    return issue("discriminator_mismatch", path, `'${COLUMN_TAG}' attribute missing`, error);
  }
  return issue(
    "discriminator_mismatch",
    [...path, COLUMN_TAG],
    `'${COLUMN_TAG}' expected to be one of ${EXPECTED_TAGS}`,
    error,
  );
}

/**
 * Convert one Ajv error into a validation issue located in `document`
 */
export function toValidationIssue(error: ErrorObject, document: DocumentValue): ValidationIssue {
  const path = pointerToPath(document, error.instancePath);
  const field = lastSegment(path);

  switch (error.keyword) {
    case "required": {
      const property = stringParam(error, "missingProperty");
      return issue("missing", [...path, property], `'${property}' attribute missing`, error);
    }

    case "additionalProperties": {
      const property = stringParam(error, "additionalProperty");
      const columnType = columnTypeAt(document, path);
      const message = columnType
        ? `'${property}' invalid attribute for '${columnType}' type`
        : `invalid attribute '${property}' provided`;
      return issue("extra_field", [...path, property], message, error);
    }

    case "type":
      // A column that is not a mapping cannot carry a tag
      if (isColumnUnionSchema(error.parentSchema)) {
        return issue(
          "discriminator_mismatch",
          path,
          `'${field}' expected to be an object with a '${COLUMN_TAG}' attribute`,
          error,
        );
      }
      return issue(
        "type_error",
        path,
        `'${field}' expected to be ${expectedTypeText(param(error, "type"))}`,
        error,
      );

    case "discriminator":
      return discriminatorIssue(document, path, error);

    case "minLength":
      return issue(
        "constraint_violation",
        path,
        `'${field}' should have at least ${plural(param(error, "limit"), "character")}`,
        error,
      );

    case "maxLength":
      return issue(
        "constraint_violation",
        path,
        `'${field}' should have at most ${plural(param(error, "limit"), "character")}`,
        error,
      );

    case "minimum":
      return issue(
        "constraint_violation",
        path,
        `'${field}' should be greater than or equal to ${String(param(error, "limit"))}`,
        error,
      );

    case "maximum":
      return issue(
        "constraint_violation",
        path,
        `'${field}' should be less than or equal to ${String(param(error, "limit"))}`,
        error,
      );

    default:
      return issue("constraint_violation", path, `'${field}' ${error.message ?? "is invalid"}`, error);
  }
}
