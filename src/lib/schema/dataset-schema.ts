/**
 * Structural type model for dataset schema documents
 *
 * Expressed as a draft-07 JSON Schema compiled by Ajv. Every object level is
 * closed (`additionalProperties: false`) and columns are a tagged union
 * selected by Ajv's `discriminator` keyword on `type`.
 */

import type { SchemaObject } from "ajv";
import { COLUMN_TYPES, type ColumnType } from "../../types/data-model.js";
import type { RequiredAttributes } from "../../types/config.js";

export const COLUMN_TAG = "type";

export const DEFAULT_VERSION = "1.0";
export const DEFAULT_DATE_FORMAT = "YYYY-MM-DD";
export const DEFAULT_DATETIME_FORMAT = "YYYY-MM-DD HH:MM:SS";

const STRING: SchemaObject = { type: "string" };
const STRING_LIST: SchemaObject = { type: "array", items: STRING };

/**
 * Optional attributes also accept an explicit null (a YAML key with no value)
 */
function optional(schema: SchemaObject): SchemaObject {
  const types: unknown[] = Array.isArray(schema.type) ? schema.type : [schema.type];
  return { ...schema, type: [...types, "null"] };
}

const NON_NEGATIVE_INTEGER: SchemaObject = optional({ type: "integer", minimum: 0 });

export const DATASET_PROPERTIES: Record<string, SchemaObject> = {
  fqn: STRING,
  name: STRING,
  description: optional(STRING),
  version: { type: "string", default: DEFAULT_VERSION },
  // Filled in by buildDatasetSchema with the column union
  columns: { type: "array" },
  metadata: optional({
    type: "object",
    additionalProperties: { type: ["string", "number", "boolean", "null"] },
  }),
  tags: optional(STRING_LIST),
  inherits: optional(STRING_LIST),
  inherited_by: optional(STRING_LIST),
};

export const DATASET_REQUIRED = ["fqn", "name", "columns"];

const COLUMN_BASE_PROPERTIES: Record<string, SchemaObject> = {
  name: STRING,
  nullable: { type: "boolean", default: true },
  unique: { type: "boolean", default: false },
  primary_key: { type: "boolean", default: false },
  description: optional(STRING),
};

export const COLUMN_VARIANT_PROPERTIES: Record<ColumnType, Record<string, SchemaObject>> = {
  string: {
    min_length: NON_NEGATIVE_INTEGER,
    max_length: NON_NEGATIVE_INTEGER,
    pattern: optional(STRING),
  },
  integer: {
    minimum: optional({ type: "integer" }),
    maximum: optional({ type: "integer" }),
  },
  float: {
    minimum: optional({ type: "number" }),
    maximum: optional({ type: "number" }),
    precision: NON_NEGATIVE_INTEGER,
  },
  boolean: {},
  date: {
    format: optional({ type: "string", default: DEFAULT_DATE_FORMAT }),
  },
  datetime: {
    format: optional({ type: "string", default: DEFAULT_DATETIME_FORMAT }),
    timezone: optional(STRING),
  },
};

export const COLUMN_REQUIRED = ["name", COLUMN_TAG];

/**
 * All attribute names a column of the given type accepts
 */
export function columnAttributes(columnType: ColumnType): string[] {
  return [
    ...Object.keys(COLUMN_BASE_PROPERTIES),
    COLUMN_TAG,
    ...Object.keys(COLUMN_VARIANT_PROPERTIES[columnType]),
  ];
}

function mergeRequired(base: string[], extra: string[] = []): string[] {
  return [...new Set([...base, ...extra])];
}

function buildColumnVariant(columnType: ColumnType, extraRequired?: string[]): SchemaObject {
  return {
    type: "object",
    properties: {
      ...COLUMN_BASE_PROPERTIES,
      [COLUMN_TAG]: { const: columnType },
      ...COLUMN_VARIANT_PROPERTIES[columnType],
    },
    required: mergeRequired(COLUMN_REQUIRED, extraRequired),
    additionalProperties: false,
  };
}

/**
 * Schema of a single column: a discriminated union over COLUMN_TYPES
 */
export function buildColumnSchema(required: RequiredAttributes = {}): SchemaObject {
  return {
    type: "object",
    discriminator: { propertyName: COLUMN_TAG },
    oneOf: COLUMN_TYPES.map((columnType) =>
      buildColumnVariant(columnType, required.columns?.[columnType]),
    ),
  };
}

/**
 * Schema of a whole dataset document
 */
export function buildDatasetSchema(required: RequiredAttributes = {}): SchemaObject {
  return {
    $schema: "http://json-schema.org/draft-07/schema#",
    title: "DatasetSchema",
    type: "object",
    properties: {
      ...DATASET_PROPERTIES,
      columns: { type: "array", items: buildColumnSchema(required) },
    },
    required: mergeRequired(DATASET_REQUIRED, required.dataset),
    additionalProperties: false,
  };
}

/**
 * Whether an Ajv parent schema is the column union built above
 */
export function isColumnUnionSchema(schema: unknown): boolean {
  return (
    typeof schema === "object" &&
    schema !== null &&
    "discriminator" in schema &&
    "oneOf" in schema
  );
}
