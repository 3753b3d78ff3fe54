/**
 * Intermediate representation rendered by every middleware target
 */

import type { PlanStep } from '../plan.js';
import type { AuditConfig, RuleType, SubjectField } from '../types.js';
import type { ValidatedPolicy } from '../validator.js';

interface EmbeddedBase<T extends RuleType> {
  id: string;
  index: number;
  type: T;
}

export interface EmbeddedListRule extends EmbeddedBase<'allowlist' | 'denylist'> {
  field: SubjectField;
  values: string[];
  description?: string;
}

export interface EmbeddedRateLimitRule extends EmbeddedBase<'rate_limit'> {
  max_requests: number;
  window_seconds: number;
  description?: string;
}

export interface EmbeddedSpendingCapRule extends EmbeddedBase<'spending_cap'> {
  max_amount: number;
  currency: string;
  window_seconds: number;
  description?: string;
}

/**
 * Rule constant as written into generated code. Keys are always emitted in
 * the declared order.
 */
export type EmbeddedRule = EmbeddedListRule | EmbeddedRateLimitRule | EmbeddedSpendingCapRule;

export interface MiddlewareIR {
  version: string;
  audit: AuditConfig;
  /** Rules in evaluation order */
  rules: EmbeddedRule[];
}

function withDescription<T extends EmbeddedRule>(embedded: T, description: string | undefined): T {
  return description === undefined ? embedded : { ...embedded, description };
}

function embed(step: PlanStep): EmbeddedRule {
  const base = { id: step.rule_id, index: step.index };
  switch (step.stage) {
    case 'allowlist':
    case 'denylist':
      return withDescription(
        { ...base, type: step.stage, field: step.rule.field, values: [...step.rule.values] },
        step.rule.description
      );
    case 'rate_limit':
      return withDescription(
        {
          ...base,
          type: step.stage,
          max_requests: step.rule.max_requests,
          window_seconds: step.rule.window_seconds,
        },
        step.rule.description
      );
    case 'spending_cap':
      return withDescription(
        {
          ...base,
          type: step.stage,
          max_amount: step.rule.max_amount,
          currency: step.rule.currency,
          window_seconds: step.rule.window_seconds,
        },
        step.rule.description
      );
  }
}

export function buildIR(policy: ValidatedPolicy): MiddlewareIR {
  return {
    version: policy.version,
    audit: { ...policy.audit },
    rules: policy.plan.map(embed),
  };
}
