/**
 * Validator module - the rule validators and their shared helpers
 */

export { StructuralValidator } from "./schema-validator.js";
export type { ParseOutcome, StructuralValidatorOptions } from "./schema-validator.js";
export { FqnLedger, UniqueFqnValidator } from "./fqn-validator.js";
export { toValidationIssue } from "./error-formatter.js";
export { formatLocation, pointerToPath, valueAt } from "./location.js";
export type { PathSegment } from "./location.js";
export type { RuleContext, RuleValidator } from "./types.js";
