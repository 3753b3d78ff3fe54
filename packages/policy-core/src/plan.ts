/**
 * Evaluation plan: the rules of a policy ordered by evaluation stage.
 *
 * The engine and every middleware renderer walk the same plan, so the
 * precedence below is the single source of truth.
 */

import type {
  AllowlistRule,
  DenylistRule,
  RateLimitRule,
  Rule,
  RuleEntry,
  RuleType,
  SpendingCapRule,
} from './types.js';

export const STAGE_ORDER: readonly RuleType[] = ['denylist', 'allowlist', 'rate_limit', 'spending_cap'];

interface StepOf<R extends Rule> {
  readonly stage: R['type'];
  readonly rule_id: string;
  readonly index: number;
  readonly rule: Readonly<R>;
}

export type PlanStep =
  | StepOf<DenylistRule>
  | StepOf<AllowlistRule>
  | StepOf<RateLimitRule>
  | StepOf<SpendingCapRule>;

export type StepFor<S extends RuleType> = Extract<PlanStep, { stage: S }>;

function toStep(entry: RuleEntry): PlanStep {
  const { id, index, rule } = entry;
  switch (rule.type) {
    case 'denylist':
      return { stage: 'denylist', rule_id: id, index, rule };
    case 'allowlist':
      return { stage: 'allowlist', rule_id: id, index, rule };
    case 'rate_limit':
      return { stage: 'rate_limit', rule_id: id, index, rule };
    case 'spending_cap':
      return { stage: 'spending_cap', rule_id: id, index, rule };
  }
}

/**
 * Order rule entries by stage, then by position in the policy
 */
export function planEvaluation(entries: readonly RuleEntry[]): PlanStep[] {
  const steps = entries.map(toStep);
  return STAGE_ORDER.flatMap((stage) => steps.filter((step) => step.stage === stage));
}

export function stepsFor<S extends RuleType>(plan: readonly PlanStep[], stage: S): StepFor<S>[] {
  return plan.filter((step): step is StepFor<S> => step.stage === stage);
}
