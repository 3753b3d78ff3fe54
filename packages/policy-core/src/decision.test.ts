import { describe, expect, it } from 'vitest';
import { decisionResponse, decisionRuleId, toDiagnostic } from './decision.js';
import type { Decision } from './types.js';

const denied: Decision = {
  outcome: 'deny',
  reason: 'not in allowlist',
  rule_id: 'partners',
  field: 'agent_id',
  value: 'bot-1',
};

const limited: Decision = { outcome: 'rate_limited', retry_after_seconds: 12, rule_id: 'rate_limit-1' };

const overBudget: Decision = {
  outcome: 'spending_cap_exceeded',
  current: 9,
  limit: 10,
  remaining: 1,
  currency: 'USDC',
  rule_id: 'spending_cap-0',
};

describe('toDiagnostic', () => {
  it('describes allowed requests', () => {
    expect(toDiagnostic({ outcome: 'allow', allowlist_matches: [] })).toEqual({ allowed: true, reason: 'allowed' });
  });

  it('describes every rejection', () => {
    expect(toDiagnostic(denied)).toEqual({ allowed: false, reason: 'not in allowlist', rule_id: 'partners' });
    expect(toDiagnostic(limited)).toEqual({
      allowed: false,
      reason: 'rate limited',
      rule_id: 'rate_limit-1',
      retry_after: 12,
    });
    expect(toDiagnostic(overBudget)).toEqual({
      allowed: false,
      reason: 'spending cap exceeded',
      rule_id: 'spending_cap-0',
      spending: { current: 9, limit: 10, remaining: 1, currency: 'USDC' },
    });
  });
});

describe('decisionResponse', () => {
  it('maps decisions to HTTP responses', () => {
    expect(decisionResponse({ outcome: 'allow', allowlist_matches: [] })).toBeNull();
    expect(decisionResponse(denied)).toEqual({
      status: 403,
      headers: {},
      body: { error: 'Forbidden', reason: 'not in allowlist', rule_id: 'partners' },
    });
    expect(decisionResponse(limited)).toEqual({
      status: 429,
      headers: { 'Retry-After': '12' },
      body: { error: 'Too many requests', retry_after: 12, rule_id: 'rate_limit-1' },
    });
    expect(decisionResponse(overBudget)?.status).toBe(402);
  });
});

describe('decisionRuleId', () => {
  it('is null for allowed requests', () => {
    expect(decisionRuleId({ outcome: 'allow', allowlist_matches: [] })).toBeNull();
    expect(decisionRuleId(limited)).toBe('rate_limit-1');
  });
});
