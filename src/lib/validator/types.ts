/**
 * Validator module types
 */

import type { DocumentValue, ValidationIssue } from "../../types/data-model.js";
import type { RuleId } from "../rules/types.js";
import type { FqnLedger } from "./fqn-validator.js";

/**
 * Per-file context handed to every rule
 */
export interface RuleContext {
  filePath: string;
  /** Batch-scoped; owned by the orchestrator */
  ledger: FqnLedger;
}

export interface RuleValidator {
  readonly ruleId: RuleId;
  /**
   * True when the output depends on the document content alone, so results
   * may be cached by content hash
   */
  readonly cacheable: boolean;
  validate(document: DocumentValue, context: RuleContext): ValidationIssue[];
}
