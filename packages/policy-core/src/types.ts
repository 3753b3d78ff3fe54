/**
 * Policy model types
 */

/**
 * Request attributes that allowlist/denylist rules can match on
 */
export const SUBJECT_FIELDS = ['agent_id', 'wallet_address', 'ip_address'] as const;

export type SubjectField = (typeof SUBJECT_FIELDS)[number];

export const RULE_TYPES = ['allowlist', 'denylist', 'rate_limit', 'spending_cap'] as const;

export type RuleType = (typeof RULE_TYPES)[number];

interface RuleMeta {
  /** Stable identity used in state keys and audit records */
  id?: string;
  description?: string;
}

export interface AllowlistRule extends RuleMeta {
  type: 'allowlist';
  field: SubjectField;
  /** Literal values or patterns with a trailing `*` */
  values: string[];
}

export interface DenylistRule extends RuleMeta {
  type: 'denylist';
  field: SubjectField;
  values: string[];
}

export interface RateLimitRule extends RuleMeta {
  type: 'rate_limit';
  max_requests: number;
  window_seconds: number;
}

export interface SpendingCapRule extends RuleMeta {
  type: 'spending_cap';
  max_amount: number;
  currency: string;
  window_seconds: number;
}

export type Rule = AllowlistRule | DenylistRule | RateLimitRule | SpendingCapRule;

export type ListRule = AllowlistRule | DenylistRule;

export type AuditFormat = 'json' | 'csv';

export type AuditDestination = 'stdout' | 'stderr';

/**
 * Audit settings consumed by generated middleware
 */
export interface AuditConfig {
  enabled: boolean;
  format: AuditFormat;
  destination: AuditDestination;
}

/**
 * A parsed (not yet validated) policy document
 */
export interface Policy {
  version: string;
  rules: Rule[];
  audit: AuditConfig;
}

/**
 * A rule together with its resolved identity and position in the document
 */
export interface RuleEntry {
  readonly id: string;
  readonly index: number;
  readonly rule: Readonly<Rule>;
}

/**
 * Request descriptor as handed over by the request-handling layer
 */
export interface RequestInput {
  agent_id?: string;
  wallet_address?: string;
  ip_address?: string;
  /** Cost of the protected action; 0 when omitted */
  estimated_cost?: number;
  /** Epoch milliseconds; now when omitted */
  timestamp?: number;
}

/**
 * Request descriptor with defaults applied
 */
export interface EvaluationRequest {
  agent_id?: string;
  wallet_address?: string;
  ip_address?: string;
  estimated_cost: number;
  timestamp: number;
}

/**
 * Most specific allowlist entry matched for a field
 */
export interface AllowlistMatch {
  rule_id: string;
  field: SubjectField;
  pattern: string;
}

export type DenyReason = 'denylisted' | 'not in allowlist';

export type Decision =
  | { outcome: 'allow'; allowlist_matches: AllowlistMatch[] }
  | { outcome: 'deny'; reason: DenyReason; rule_id: string; field: SubjectField; value: string }
  | { outcome: 'rate_limited'; retry_after_seconds: number; rule_id: string }
  | {
      outcome: 'spending_cap_exceeded';
      current: number;
      limit: number;
      remaining: number;
      currency: string;
      rule_id: string;
    };

export type DecisionOutcome = Decision['outcome'];

/**
 * Structured form of a decision for CLI and JSON consumers
 */
export interface DecisionDiagnostic {
  allowed: boolean;
  reason: string;
  rule_id?: string;
  retry_after?: number;
  spending?: {
    current: number;
    limit: number;
    remaining: number;
    currency: string;
  };
}

/**
 * Audit hook shared by the engine and generated middleware
 */
export type AuditHook = (
  subjectKey: string,
  ruleId: string | null,
  decision: DecisionOutcome | 'commit',
  amount: number,
  timestamp: number
) => void;
