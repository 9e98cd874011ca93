/**
 * Rules module types
 */

/**
 * Rule identifiers in declaration order; this order is the execution order
 */
export const RULE_IDS = ["PSX_VAL1", "PSX_VAL2"] as const;

export type RuleId = (typeof RULE_IDS)[number];

export function isRuleId(value: string): value is RuleId {
  return (RULE_IDS as readonly string[]).includes(value);
}

export interface RuleDescription {
  id: RuleId;
  summary: string;
}
