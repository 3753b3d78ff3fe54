/**
 * Decision helpers for consumers: diagnostics and HTTP responses
 */

import type { Decision, DecisionDiagnostic } from './types.js';

export function isAllowed(decision: Decision): boolean {
  return decision.outcome === 'allow';
}

/**
 * Rule that produced a non-allow decision, or null
 */
export function decisionRuleId(decision: Decision): string | null {
  return decision.outcome === 'allow' ? null : decision.rule_id;
}

/**
 * Structured form for CLI and JSON consumers
 */
export function toDiagnostic(decision: Decision): DecisionDiagnostic {
  switch (decision.outcome) {
    case 'allow':
      return { allowed: true, reason: 'allowed' };
    case 'deny':
      return { allowed: false, reason: decision.reason, rule_id: decision.rule_id };
    case 'rate_limited':
      return {
        allowed: false,
        reason: 'rate limited',
        rule_id: decision.rule_id,
        retry_after: decision.retry_after_seconds,
      };
    case 'spending_cap_exceeded':
      return {
        allowed: false,
        reason: 'spending cap exceeded',
        rule_id: decision.rule_id,
        spending: {
          current: decision.current,
          limit: decision.limit,
          remaining: decision.remaining,
          currency: decision.currency,
        },
      };
  }
}

export interface DecisionResponse {
  status: 402 | 403 | 429;
  headers: Record<string, string>;
  body: Record<string, string | number>;
}

/**
 * HTTP response for a rejected request; null when the request is allowed
 */
export function decisionResponse(decision: Decision): DecisionResponse | null {
  switch (decision.outcome) {
    case 'allow':
      return null;
    case 'deny':
      return {
        status: 403,
        headers: {},
        body: { error: 'Forbidden', reason: decision.reason, rule_id: decision.rule_id },
      };
    case 'rate_limited':
      return {
        status: 429,
        headers: { 'Retry-After': String(decision.retry_after_seconds) },
        body: {
          error: 'Too many requests',
          retry_after: decision.retry_after_seconds,
          rule_id: decision.rule_id,
        },
      };
    case 'spending_cap_exceeded':
      return {
        status: 402,
        headers: {},
        body: {
          error: 'Spending cap exceeded',
          current: decision.current,
          limit: decision.limit,
          remaining: decision.remaining,
          currency: decision.currency,
          rule_id: decision.rule_id,
        },
      };
  }
}
