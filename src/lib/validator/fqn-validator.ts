/**
 * Cross-document fqn uniqueness (rule PSX_VAL2)
 */

import {
  isDocumentMapping,
  type DocumentValue,
  type ValidationIssue,
} from "../../types/data-model.js";
import { logger } from "../../utils/logger.js";
import type { RuleContext, RuleValidator } from "./types.js";

const FQN_LOCATION = "$.fqn";

/**
 * Ledger of fqn values seen in one batch, mapped to the file that first
 * declared them
 */
export class FqnLedger {
  private owners = new Map<string, string>();

  ownerOf(fqn: string): string | undefined {
    return this.owners.get(fqn);
  }

  has(fqn: string): boolean {
    return this.owners.has(fqn);
  }

  /**
   * Register `filePath` as the owner of `fqn`
   * @returns false when another file already owns it (first seen wins)
   */
  claim(fqn: string, filePath: string): boolean {
    if (this.owners.has(fqn)) {
      return false;
    }
    this.owners.set(fqn, filePath);
    return true;
  }

  size(): number {
    return this.owners.size;
  }

  entries(): Array<[string, string]> {
    return Array.from(this.owners.entries());
  }
}

function fqnIssue(kind: ValidationIssue["kind"], message: string): ValidationIssue {
  return { kind, location: FQN_LOCATION, message, detail: null };
}

/**
 * Flags documents whose fqn was already declared earlier in the batch
 *
 * Reads the raw `fqn` value, whether or not the document is structurally
 * valid.
 */
export class UniqueFqnValidator implements RuleValidator {
  readonly ruleId = "PSX_VAL2";
  readonly cacheable = false;

  validate(document: DocumentValue, context: RuleContext): ValidationIssue[] {
    const fqn = isDocumentMapping(document) ? document["fqn"] : undefined;

    if (fqn === undefined) {
      return [
        fqnIssue("missing_fqn", "Duplicate fqn check is enabled but fqn field is missing"),
      ];
    }

    if (typeof fqn !== "string") {
      return [
        fqnIssue("missing_fqn", "Duplicate fqn check is enabled but fqn field is not a string"),
      ];
    }

    const owner = context.ledger.ownerOf(fqn);
    if (owner !== undefined) {
      logger.debug("Duplicate fqn", { fqn, filePath: context.filePath, owner });
      return [fqnIssue("duplicate_fqn", `Duplicate FQN '${fqn}', already present at '${owner}'`)];
    }

    context.ledger.claim(fqn, context.filePath);
    return [];
  }
}
