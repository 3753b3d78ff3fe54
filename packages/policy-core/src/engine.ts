/**
 * Evaluation Engine
 *
 * Walks the evaluation plan of a ValidatedPolicy for one request:
 * denylist, allowlist, rate limit, spending cap, stopping at the first
 * non-allow outcome. `evaluate()` only reads the StateStore; usage is
 * recorded by `commit()` once the protected action has succeeded.
 */

import { InternalError } from './errors.js';
import { matchesPattern, mostSpecificMatch, specificity } from './patterns.js';
import { stepsFor } from './plan.js';
import type { StepFor } from './plan.js';
import { fromUnits, stateKey, subjectKey, toUnits } from './state-store.js';
import type { StateStore } from './state-store.js';
import { SUBJECT_FIELDS } from './types.js';
import type { AllowlistMatch, Decision, EvaluationRequest, RequestInput, SubjectField } from './types.js';
import { assertValidatedPolicy } from './validator.js';
import type { ValidatedPolicy } from './validator.js';

/**
 * Apply request defaults: cost 0, timestamp now. Empty attributes count as absent.
 *
 * @throws InternalError (INVALID_REQUEST) for a negative or non-finite cost,
 * or a non-finite timestamp
 */
export function normalizeRequest(input: RequestInput, clock: () => number = Date.now): EvaluationRequest {
  const cost = input.estimated_cost ?? 0;
  if (!Number.isFinite(cost) || cost < 0) {
    throw new InternalError('INVALID_REQUEST', `estimated_cost must be a non-negative finite number, got ${cost}`);
  }

  const timestamp = input.timestamp ?? clock();
  if (!Number.isFinite(timestamp)) {
    throw new InternalError('INVALID_REQUEST', `timestamp must be a finite number of milliseconds, got ${timestamp}`);
  }

  const request: EvaluationRequest = { estimated_cost: cost, timestamp };
  for (const field of SUBJECT_FIELDS) {
    const value = input[field];
    if (value !== undefined && value !== '') {
      request[field] = value;
    }
  }
  return request;
}

function checkDenylists(steps: readonly StepFor<'denylist'>[], request: EvaluationRequest): Decision | undefined {
  for (const step of steps) {
    const { field, values } = step.rule;
    const value = request[field];
    if (value !== undefined && values.some((pattern) => matchesPattern(pattern, value))) {
      return { outcome: 'deny', reason: 'denylisted', rule_id: step.rule_id, field, value };
    }
  }
  return undefined;
}

function checkAllowlists(steps: readonly StepFor<'allowlist'>[], request: EvaluationRequest): Decision {
  const matches: AllowlistMatch[] = [];
  const fields: SubjectField[] = [...new Set(steps.map((step) => step.rule.field))];

  for (const field of fields) {
    const value = request[field];
    if (value === undefined) {
      continue;
    }

    const fieldSteps = steps.filter((step) => step.rule.field === field);
    let best: AllowlistMatch | undefined;
    for (const step of fieldSteps) {
      const pattern = mostSpecificMatch(step.rule.values, value);
      if (pattern !== undefined && (best === undefined || specificity(pattern) > specificity(best.pattern))) {
        best = { rule_id: step.rule_id, field, pattern };
      }
    }

    if (best === undefined) {
      return { outcome: 'deny', reason: 'not in allowlist', rule_id: fieldSteps[0].rule_id, field, value };
    }
    matches.push(best);
  }

  return { outcome: 'allow', allowlist_matches: matches };
}

function checkRateLimits(
  steps: readonly StepFor<'rate_limit'>[],
  subject: string,
  now: number,
  store: StateStore
): Decision | undefined {
  for (const step of steps) {
    const windowMs = step.rule.window_seconds * 1000;
    const { count, oldest } = store.peekRate(stateKey(step.rule_id, subject), windowMs, now);
    if (count >= step.rule.max_requests) {
      const waitMs = (oldest ?? now) + windowMs - now;
      return {
        outcome: 'rate_limited',
        retry_after_seconds: Math.max(1, Math.ceil(waitMs / 1000)),
        rule_id: step.rule_id,
      };
    }
  }
  return undefined;
}

function checkSpendingCaps(
  steps: readonly StepFor<'spending_cap'>[],
  subject: string,
  request: EvaluationRequest,
  store: StateStore
): Decision | undefined {
  const costUnits = toUnits(request.estimated_cost);
  for (const step of steps) {
    const { max_amount, currency, window_seconds } = step.rule;
    const limitUnits = toUnits(max_amount);
    const spent = store.peekSpending(stateKey(step.rule_id, subject), window_seconds * 1000, request.timestamp);
    if (spent + costUnits > limitUnits) {
      return {
        outcome: 'spending_cap_exceeded',
        current: fromUnits(spent),
        limit: max_amount,
        remaining: fromUnits(Math.max(0, limitUnits - spent)),
        currency,
        rule_id: step.rule_id,
      };
    }
  }
  return undefined;
}

/**
 * Decide a request against a validated policy without touching state.
 *
 * @throws InternalError when the policy is not a ValidatedPolicy or the
 * request breaks the input contract
 *
 * @example
 * ```typescript
 * const decision = evaluate(policy, { agent_id: 'agent-7', estimated_cost: 0.25 }, store);
 * if (decision.outcome === 'allow') {
 *   await handler();
 *   commit(policy, request, store);
 * }
 * ```
 */
export function evaluate(policy: ValidatedPolicy, input: RequestInput, store: StateStore): Decision {
  assertValidatedPolicy(policy);
  const request = normalizeRequest(input);
  const subject = subjectKey(request);
  const { plan } = policy;

  const denied = checkDenylists(stepsFor(plan, 'denylist'), request);
  if (denied) {
    return denied;
  }

  const allowlisted = checkAllowlists(stepsFor(plan, 'allowlist'), request);
  if (allowlisted.outcome !== 'allow') {
    return allowlisted;
  }

  const limited =
    checkRateLimits(stepsFor(plan, 'rate_limit'), subject, request.timestamp, store) ??
    checkSpendingCaps(stepsFor(plan, 'spending_cap'), subject, request, store);

  return limited ?? allowlisted;
}

/**
 * Record usage for a request that was allowed and whose protected action
 * succeeded. Call at most once per request.
 */
export function commit(policy: ValidatedPolicy, input: RequestInput, store: StateStore): void {
  assertValidatedPolicy(policy);
  const request = normalizeRequest(input);
  const subject = subjectKey(request);
  const now = request.timestamp;

  for (const step of stepsFor(policy.plan, 'rate_limit')) {
    store.recordRequest(stateKey(step.rule_id, subject), step.rule.window_seconds * 1000, now);
  }

  const costUnits = toUnits(request.estimated_cost);
  for (const step of stepsFor(policy.plan, 'spending_cap')) {
    store.recordSpending(stateKey(step.rule_id, subject), costUnits, step.rule.window_seconds * 1000, now);
  }
}
