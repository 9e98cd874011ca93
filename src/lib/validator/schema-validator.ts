/**
 * Structural validation of dataset schema documents using Ajv (rule PSX_VAL1)
 */

import AjvModule from "ajv";
import type { ValidateFunction } from "ajv";
import type {
  Column,
  ColumnInput,
  DatasetSchema,
  DatasetSchemaInput,
  DocumentValue,
  ValidationIssue,
} from "../../types/data-model.js";
import type { RequiredAttributes } from "../../types/config.js";
import {
  DEFAULT_DATE_FORMAT,
  DEFAULT_DATETIME_FORMAT,
  DEFAULT_VERSION,
  buildDatasetSchema,
} from "../schema/dataset-schema.js";
import { logger } from "../../utils/logger.js";
import { toValidationIssue } from "./error-formatter.js";
import type { RuleValidator } from "./types.js";

// ajv is CommonJS; under ESM the class sits on the default export's `default`
const Ajv = AjvModule.default;

export interface StructuralValidatorOptions {
  requiredAttributes?: RequiredAttributes;
}

export interface ParseOutcome {
  /** Present only when the document has no structural issues */
  dataset?: DatasetSchema;
  issues: ValidationIssue[];
}

function normalizeColumn(column: ColumnInput): Column {
  const flags = {
    nullable: column.nullable ?? true,
    unique: column.unique ?? false,
    primary_key: column.primary_key ?? false,
  };

  switch (column.type) {
    case "date":
      return { ...column, ...flags, format: column.format ?? DEFAULT_DATE_FORMAT };
    case "datetime":
      return { ...column, ...flags, format: column.format ?? DEFAULT_DATETIME_FORMAT };
    default:
      return { ...column, ...flags };
  }
}

function normalizeDataset(input: DatasetSchemaInput): DatasetSchema {
  return {
    ...input,
    version: input.version ?? DEFAULT_VERSION,
    columns: input.columns.map(normalizeColumn),
  };
}

/**
 * Validates a loaded document against the dataset structural type model
 */
export class StructuralValidator implements RuleValidator {
  readonly ruleId = "PSX_VAL1";
  readonly cacheable = true;

  private validateFn: ValidateFunction<DatasetSchemaInput>;

  constructor(options: StructuralValidatorOptions = {}) {
    const ajv = new Ajv({
      strict: false, // metadata values use a union type
      allErrors: true, // Collect every independent violation
      verbose: true, // parentSchema is needed to recognise column union errors
      discriminator: true,
    });
    this.validateFn = ajv.compile<DatasetSchemaInput>(
      buildDatasetSchema(options.requiredAttributes),
    );
    logger.debug("Dataset schema compiled", {
      requiredAttributes: options.requiredAttributes ?? {},
    });
  }

  /**
   * Validate a document and return the normalized dataset when it conforms
   */
  parse(document: DocumentValue): ParseOutcome {
    const candidate: unknown = document;
    if (this.validateFn(candidate)) {
      return { dataset: normalizeDataset(candidate), issues: [] };
    }

    const errors = this.validateFn.errors ?? [];
    return { issues: errors.map((error) => toValidationIssue(error, document)) };
  }

  validate(document: DocumentValue): ValidationIssue[] {
    return this.parse(document).issues;
  }
}
