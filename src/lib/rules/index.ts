/**
 * Rules module - rule selection and the per-file validation pipeline
 */

import {
  createFileResult,
  type DocumentValue,
  type FileValidationResult,
  type ValidationIssue,
} from "../../types/data-model.js";
import type { RequiredAttributes, RuleSelection } from "../../types/config.js";
import { ConfigError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { loadDocument } from "../loader/index.js";
import { ResultCache, hashContent } from "../cache/index.js";
import { FqnLedger, UniqueFqnValidator } from "../validator/fqn-validator.js";
import { StructuralValidator } from "../validator/schema-validator.js";
import type { RuleContext, RuleValidator } from "../validator/types.js";
import { RULE_IDS, isRuleId, type RuleDescription, type RuleId } from "./types.js";

export { RULE_IDS, isRuleId } from "./types.js";
export type { RuleDescription, RuleId } from "./types.js";

export const RULES: readonly RuleDescription[] = [
  { id: "PSX_VAL1", summary: "Document conforms to the dataset schema structure" },
  { id: "PSX_VAL2", summary: "Dataset fqn is unique across the validated files" },
];

export const DEFAULT_RULES: readonly RuleId[] = RULE_IDS;

function parseRuleIds(ids: readonly string[], option: string): RuleId[] {
  const unknownIds = ids.filter((id) => !isRuleId(id));
  if (unknownIds.length > 0) {
    throw new ConfigError(
      `Unknown rule id(s) in ${option}: ${unknownIds.join(", ")}. Known rules: ${RULE_IDS.join(", ")}`,
      { unknown: unknownIds, known: RULE_IDS },
    );
  }
  return ids.filter(isRuleId);
}

/**
 * Resolve which rules run, in declaration order
 *
 * `apply` restricts to exactly the listed rules, `ignore` removes rules from
 * the default set; giving both is a configuration error.
 */
export function resolveRuleSelection(selection: RuleSelection = {}): RuleId[] {
  const apply = selection.apply ?? [];
  const ignore = selection.ignore ?? [];

  if (apply.length > 0 && ignore.length > 0) {
    throw new ConfigError("Rule apply and rule ignore cannot be used together", {
      apply,
      ignore,
    });
  }

  if (apply.length > 0) {
    const applied = new Set(parseRuleIds(apply, "rule apply"));
    return RULE_IDS.filter((id) => applied.has(id));
  }

  const ignored = new Set(parseRuleIds(ignore, "rule ignore"));
  return DEFAULT_RULES.filter((id) => !ignored.has(id));
}

function createRuleValidator(id: RuleId, requiredAttributes: RequiredAttributes): RuleValidator {
  switch (id) {
    case "PSX_VAL1":
      return new StructuralValidator({ requiredAttributes });
    case "PSX_VAL2":
      return new UniqueFqnValidator();
  }
}

export interface RuleOrchestratorOptions {
  selection?: RuleSelection;
  requiredAttributes?: RequiredAttributes;
  cache?: ResultCache;
}

/**
 * Runs the document loader and the selected rules over files
 *
 * A load failure ends that file's processing with the load error as its only
 * error. Rules never short-circuit each other.
 */
export class RuleOrchestrator {
  readonly rules: readonly RuleId[];
  private validators: RuleValidator[];
  private cache: ResultCache | undefined;
  private settingsFingerprint: string;

  /**
   * @throws ConfigError for an invalid rule selection, before any file is read
   */
  constructor(options: RuleOrchestratorOptions = {}) {
    const requiredAttributes = options.requiredAttributes ?? {};
    this.rules = resolveRuleSelection(options.selection);
    this.validators = this.rules.map((id) => createRuleValidator(id, requiredAttributes));
    this.cache = options.cache;
    this.settingsFingerprint = hashContent(JSON.stringify(requiredAttributes)).slice(0, 16);
    logger.debug("Rules selected", { rules: this.rules });
  }

  /**
   * Validate one file, threading `ledger` through the uniqueness rule
   */
  async validateFile(filePath: string, ledger: FqnLedger): Promise<FileValidationResult> {
    const loaded = await loadDocument(filePath);
    if (!loaded.ok) {
      return createFileResult(filePath, [loaded.issue]);
    }

    const contentHash = this.cache ? hashContent(loaded.content) : "";
    const errors: ValidationIssue[] = [];

    for (const validator of this.validators) {
      errors.push(...this.runRule(validator, loaded.document, { filePath, ledger }, contentHash));
    }

    return createFileResult(filePath, errors);
  }

  private runRule(
    validator: RuleValidator,
    document: DocumentValue,
    context: RuleContext,
    contentHash: string,
  ): ValidationIssue[] {
    if (!this.cache || !validator.cacheable) {
      return validator.validate(document, context);
    }

    const key = ResultCache.key({
      filePath: context.filePath,
      contentHash,
      ruleId: validator.ruleId,
      settings: this.settingsFingerprint,
    });
    const cached = this.cache.get(key);
    if (cached !== undefined) {
      logger.debug("Cache hit", { filePath: context.filePath, rule: validator.ruleId });
      return cached.map((issue) => ({ ...issue }));
    }

    const issues = validator.validate(document, context);
    this.cache.set(key, issues);
    return issues;
  }

  /**
   * Validate a batch of files in input order with a fresh fqn ledger
   *
   * Stop consuming the generator to abandon the rest of the batch.
   */
  async *validateFiles(
    filePaths: Iterable<string> | AsyncIterable<string>,
  ): AsyncGenerator<FileValidationResult> {
    const ledger = new FqnLedger();
    for await (const filePath of filePaths) {
      yield await this.validateFile(filePath, ledger);
    }
  }

  /**
   * Validate a batch and collect every result
   */
  async validateAll(
    filePaths: Iterable<string> | AsyncIterable<string>,
  ): Promise<FileValidationResult[]> {
    const results: FileValidationResult[] = [];
    for await (const result of this.validateFiles(filePaths)) {
      results.push(result);
    }
    return results;
  }
}
