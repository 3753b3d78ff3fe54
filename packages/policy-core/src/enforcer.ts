/**
 * PolicyEnforcer
 *
 * Owns the current ValidatedPolicy and one StateStore, and pairs every
 * decision with a one-shot commit.
 */

import { decisionRuleId } from './decision.js';
import { commit, evaluate, normalizeRequest } from './engine.js';
import { StateStore, subjectKey } from './state-store.js';
import type { AuditHook, Decision, EvaluationRequest, RequestInput } from './types.js';
import { assertValidatedPolicy } from './validator.js';
import type { ValidatedPolicy } from './validator.js';

export interface EnforcerOptions {
  policy: ValidatedPolicy;
  /** Defaults to a fresh store */
  store?: StateStore;
  /** Called per decision and per commit */
  onAudit?: AuditHook;
  /** Source of request timestamps, in epoch milliseconds */
  clock?: () => number;
}

export interface CheckResult {
  decision: Decision;
  /** Request with defaults applied */
  request: EvaluationRequest;
  /** Policy the decision was made against */
  policy: ValidatedPolicy;
  /**
   * Record usage for an allowed request. Returns false when the request was
   * not allowed or was already committed.
   */
  commit(): boolean;
}

export class PolicyEnforcer {
  readonly store: StateStore;
  private current: ValidatedPolicy;
  private readonly onAudit?: AuditHook;
  private readonly clock: () => number;

  constructor(options: EnforcerOptions) {
    assertValidatedPolicy(options.policy);
    this.current = options.policy;
    this.store = options.store ?? new StateStore();
    this.onAudit = options.onAudit;
    this.clock = options.clock ?? Date.now;
  }

  get policy(): ValidatedPolicy {
    return this.current;
  }

  /**
   * Swap in a new policy. Results already returned by `check()` keep the
   * policy they were evaluated against.
   */
  reload(policy: ValidatedPolicy): void {
    assertValidatedPolicy(policy);
    this.current = policy;
  }

  check(input: RequestInput): CheckResult {
    const policy = this.current;
    const request = normalizeRequest(input, this.clock);
    const decision = evaluate(policy, request, this.store);
    const subject = subjectKey(request);

    this.audit(subject, decisionRuleId(decision), decision.outcome, request.estimated_cost, request.timestamp);

    let committed = false;
    return {
      decision,
      request,
      policy,
      commit: () => {
        if (committed || decision.outcome !== 'allow') {
          return false;
        }
        committed = true;
        commit(policy, request, this.store);
        this.audit(subject, null, 'commit', request.estimated_cost, request.timestamp);
        return true;
      },
    };
  }

  private audit(...record: Parameters<AuditHook>): void {
    if (!this.onAudit) {
      return;
    }
    try {
      this.onAudit(...record);
    } catch (error) {
      console.error('Audit hook failed:', error);
    }
  }
}
