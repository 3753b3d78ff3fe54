/**
 * Policy Validator
 *
 * Checks a parsed Policy for internal consistency before it is trusted.
 * Every check runs; problems are returned as values, never thrown.
 */

import { InternalError } from './errors.js';
import { isValidPattern } from './patterns.js';
import { planEvaluation } from './plan.js';
import type { PlanStep } from './plan.js';
import type {
  AuditConfig,
  ListRule,
  Policy,
  RateLimitRule,
  Rule,
  RuleEntry,
  SpendingCapRule,
  SubjectField,
} from './types.js';

export const SUPPORTED_VERSIONS: readonly string[] = ['1.0'];

/** One year */
export const MAX_WINDOW_SECONDS = 31_536_000;

const CURRENCY_PATTERN = /^[A-Z0-9]{2,10}$/;

export type IssueSeverity = 'error' | 'warning';

export type ErrorCode =
  | 'EMPTY_POLICY'
  | 'UNSUPPORTED_VERSION'
  | 'CONFLICT'
  | 'OUT_OF_BOUNDS'
  | 'INVALID_PATTERN'
  | 'EMPTY_VALUES'
  | 'INVALID_CURRENCY'
  | 'DUPLICATE_RULE_ID';

export type WarningCode =
  | 'DUPLICATE_VALUE'
  | 'MULTIPLE_RATE_LIMITS'
  | 'MULTIPLE_SPENDING_CAPS'
  | 'MIXED_CURRENCIES';

export interface IssueSuggestion {
  description: string;
  action: string;
}

export interface ValidationIssue {
  severity: IssueSeverity;
  code: ErrorCode | WarningCode;
  message: string;
  /** Indices into `policies` of every rule involved */
  rule_indices: number[];
  field?: string;
  value?: string;
  suggestions: IssueSuggestion[];
}

export type ValidationResult =
  | { valid: true; policy: ValidatedPolicy; errors: ValidationIssue[]; warnings: ValidationIssue[] }
  | { valid: false; errors: ValidationIssue[]; warnings: ValidationIssue[] };

const CONSTRUCTION_TOKEN = Symbol('ValidatedPolicy');

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Resolve rule identities: the explicit `id`, otherwise `<type>-<index>`
 */
export function resolveEntries(rules: readonly Rule[]): RuleEntry[] {
  return rules.map((rule, index) => ({ id: rule.id ?? `${rule.type}-${index}`, index, rule }));
}

/**
 * A policy that passed validation. Deeply frozen; only `validatePolicy()`
 * can create one.
 */
export class ValidatedPolicy {
  readonly version: string;
  readonly audit: Readonly<AuditConfig>;
  readonly entries: readonly RuleEntry[];
  readonly plan: readonly PlanStep[];
  private readonly byId: ReadonlyMap<string, RuleEntry>;

  constructor(token: symbol, policy: Policy) {
    if (token !== CONSTRUCTION_TOKEN) {
      throw new InternalError('UNVALIDATED_POLICY', 'ValidatedPolicy can only be created by validatePolicy()');
    }
    const copy = structuredClone(policy);
    this.version = copy.version;
    this.audit = deepFreeze(copy.audit);
    this.entries = deepFreeze(resolveEntries(copy.rules));
    this.plan = deepFreeze(planEvaluation(this.entries));
    this.byId = new Map(this.entries.map((entry): [string, RuleEntry] => [entry.id, entry]));
    Object.freeze(this);
  }

  rule(id: string): RuleEntry | undefined {
    return this.byId.get(id);
  }

  /**
   * Mutable copy of the underlying document, e.g. for re-validation
   */
  toPolicy(): Policy {
    return {
      version: this.version,
      rules: this.entries.map((entry) => structuredClone(entry.rule)),
      audit: { ...this.audit },
    };
  }
}

/**
 * @throws InternalError when `policy` did not come from `validatePolicy()`
 */
export function assertValidatedPolicy(policy: unknown): asserts policy is ValidatedPolicy {
  if (!(policy instanceof ValidatedPolicy)) {
    throw new InternalError('UNVALIDATED_POLICY', 'Policy must be validated with validatePolicy() before use');
  }
}

function label(entry: RuleEntry): string {
  return `${entry.rule.type} rule #${entry.index}`;
}

function windowIssue(entry: RuleEntry, windowSeconds: number): ValidationIssue | undefined {
  if (Number.isInteger(windowSeconds) && windowSeconds >= 1 && windowSeconds <= MAX_WINDOW_SECONDS) {
    return undefined;
  }
  return {
    severity: 'error',
    code: 'OUT_OF_BOUNDS',
    message: `window_seconds in ${label(entry)} must be between 1 and ${MAX_WINDOW_SECONDS}, got ${windowSeconds}`,
    rule_indices: [entry.index],
    field: 'window_seconds',
    suggestions: [
      {
        description: 'Use a window between one second and one year',
        action: `Set window_seconds of rule #${entry.index} to a value in [1, ${MAX_WINDOW_SECONDS}]`,
      },
    ],
  };
}

function checkListRule(entry: RuleEntry, rule: Readonly<ListRule>, issues: ValidationIssue[]): void {
  if (rule.values.length === 0) {
    issues.push({
      severity: 'error',
      code: 'EMPTY_VALUES',
      message: `${label(entry)} has no values`,
      rule_indices: [entry.index],
      field: rule.field,
      suggestions: [
        { description: 'Add values or remove the rule', action: `Add at least one value to rule #${entry.index}` },
      ],
    });
  }

  const counts = new Map<string, number>();
  for (const value of rule.values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }

  for (const [value, count] of counts) {
    if (value.length === 0) {
      issues.push({
        severity: 'error',
        code: 'INVALID_PATTERN',
        message: `Empty value in ${label(entry)}`,
        rule_indices: [entry.index],
        field: rule.field,
        value,
        suggestions: [{ description: 'Remove the empty value', action: `Remove '' from rule #${entry.index}` }],
      });
    } else if (!isValidPattern(value)) {
      issues.push({
        severity: 'error',
        code: 'INVALID_PATTERN',
        message: `Invalid pattern '${value}' in ${label(entry)}: '*' is only allowed as the last character`,
        rule_indices: [entry.index],
        field: rule.field,
        value,
        suggestions: [
          {
            description: 'Use a literal value or a prefix ending in *',
            action: `Rewrite '${value}' in rule #${entry.index} so that '*' only appears at the end`,
          },
        ],
      });
    }

    if (count > 1) {
      issues.push({
        severity: 'warning',
        code: 'DUPLICATE_VALUE',
        message: `Value '${value}' appears ${count} times in ${label(entry)}`,
        rule_indices: [entry.index],
        field: rule.field,
        value,
        suggestions: [
          { description: 'Remove the duplicates', action: `Keep a single '${value}' in rule #${entry.index}` },
        ],
      });
    }
  }
}

function checkRateLimit(entry: RuleEntry, rule: Readonly<RateLimitRule>, issues: ValidationIssue[]): void {
  if (!Number.isInteger(rule.max_requests) || rule.max_requests < 1) {
    issues.push({
      severity: 'error',
      code: 'OUT_OF_BOUNDS',
      message: `max_requests in ${label(entry)} must be a whole number of at least 1, got ${rule.max_requests}`,
      rule_indices: [entry.index],
      field: 'max_requests',
      suggestions: [
        { description: 'Allow at least one request', action: `Set max_requests of rule #${entry.index} to 1 or more` },
      ],
    });
  }
  const windowProblem = windowIssue(entry, rule.window_seconds);
  if (windowProblem) {
    issues.push(windowProblem);
  }
}

function checkSpendingCap(entry: RuleEntry, rule: Readonly<SpendingCapRule>, issues: ValidationIssue[]): void {
  if (!Number.isFinite(rule.max_amount) || rule.max_amount <= 0) {
    issues.push({
      severity: 'error',
      code: 'OUT_OF_BOUNDS',
      message: `max_amount in ${label(entry)} must be a positive finite number, got ${rule.max_amount}`,
      rule_indices: [entry.index],
      field: 'max_amount',
      suggestions: [
        { description: 'Use a positive amount', action: `Set max_amount of rule #${entry.index} above 0` },
      ],
    });
  }
  if (!CURRENCY_PATTERN.test(rule.currency)) {
    issues.push({
      severity: 'error',
      code: 'INVALID_CURRENCY',
      message: `Invalid currency '${rule.currency}' in ${label(entry)}: expected 2-10 upper-case letters or digits`,
      rule_indices: [entry.index],
      field: 'currency',
      value: rule.currency,
      suggestions: [
        {
          description: 'Use an upper-case currency code',
          action: `Set currency of rule #${entry.index} to a code such as USDC`,
        },
      ],
    });
  }
  const windowProblem = windowIssue(entry, rule.window_seconds);
  if (windowProblem) {
    issues.push(windowProblem);
  }
}

function listEntries(entries: readonly RuleEntry[], type: 'allowlist' | 'denylist'): [RuleEntry, Readonly<ListRule>][] {
  const found: [RuleEntry, Readonly<ListRule>][] = [];
  for (const entry of entries) {
    const { rule } = entry;
    if (rule.type === type) {
      found.push([entry, rule]);
    }
  }
  return found;
}

function checkConflicts(entries: readonly RuleEntry[], issues: ValidationIssue[]): void {
  const denylists = listEntries(entries, 'denylist');

  for (const [allowEntry, allowRule] of listEntries(entries, 'allowlist')) {
    for (const [denyEntry, denyRule] of denylists) {
      if (allowRule.field !== denyRule.field) {
        continue;
      }
      const denied = new Set(denyRule.values);
      for (const value of new Set(allowRule.values)) {
        if (!denied.has(value)) {
          continue;
        }
        issues.push(conflictIssue(allowRule.field, value, allowEntry.index, denyEntry.index));
      }
    }
  }
}

function conflictIssue(field: SubjectField, value: string, allowIndex: number, denyIndex: number): ValidationIssue {
  return {
    severity: 'error',
    code: 'CONFLICT',
    message: `Conflict: ${field} '${value}' is in both allowlist rule #${allowIndex} and denylist rule #${denyIndex}`,
    rule_indices: [allowIndex, denyIndex],
    field,
    value,
    suggestions: [
      {
        description: 'Remove from denylist or allowlist',
        action: `Remove '${value}' from denylist rule #${denyIndex} or from allowlist rule #${allowIndex}`,
      },
    ],
  };
}

/**
 * Entry with the lowest rate. The first one wins ties.
 */
function mostRestrictive(candidates: readonly { entry: RuleEntry; rate: number }[]): RuleEntry {
  let best = candidates[0];
  for (const candidate of candidates.slice(1)) {
    if (candidate.rate < best.rate) {
      best = candidate;
    }
  }
  return best.entry;
}

function checkOverlaps(entries: readonly RuleEntry[], issues: ValidationIssue[]): void {
  const rateLimits: { entry: RuleEntry; rule: Readonly<RateLimitRule> }[] = [];
  const spendingCaps: { entry: RuleEntry; rule: Readonly<SpendingCapRule> }[] = [];
  for (const entry of entries) {
    const { rule } = entry;
    if (rule.type === 'rate_limit') {
      rateLimits.push({ entry, rule });
    } else if (rule.type === 'spending_cap') {
      spendingCaps.push({ entry, rule });
    }
  }

  if (rateLimits.length > 1) {
    const strictest = mostRestrictive(
      rateLimits.map(({ entry, rule }) => ({ entry, rate: rule.max_requests / rule.window_seconds }))
    );
    issues.push({
      severity: 'warning',
      code: 'MULTIPLE_RATE_LIMITS',
      message: `${rateLimits.length} rate_limit rules apply to every request; all of them are enforced`,
      rule_indices: rateLimits.map(({ entry }) => entry.index),
      suggestions: [
        {
          description: `Rule #${strictest.index} (${strictest.id}) is the most restrictive`,
          action: `Consider keeping only rate_limit rule #${strictest.index}`,
        },
      ],
    });
  }

  if (spendingCaps.length > 1) {
    const strictest = mostRestrictive(
      spendingCaps.map(({ entry, rule }) => ({ entry, rate: rule.max_amount / rule.window_seconds }))
    );
    issues.push({
      severity: 'warning',
      code: 'MULTIPLE_SPENDING_CAPS',
      message: `${spendingCaps.length} spending_cap rules apply to every request; all of them are enforced`,
      rule_indices: spendingCaps.map(({ entry }) => entry.index),
      suggestions: [
        {
          description: `Rule #${strictest.index} (${strictest.id}) is the most restrictive`,
          action: `Consider keeping only spending_cap rule #${strictest.index}`,
        },
      ],
    });

    const currencies = [...new Set(spendingCaps.map(({ rule }) => rule.currency))];
    if (currencies.length > 1) {
      issues.push({
        severity: 'warning',
        code: 'MIXED_CURRENCIES',
        message: `Spending caps use different currencies: ${currencies.join(', ')}`,
        rule_indices: spendingCaps.map(({ entry }) => entry.index),
        field: 'currency',
        suggestions: [
          {
            description: 'Caps are tracked per rule and never converted',
            action: 'Use a single currency for all spending_cap rules',
          },
        ],
      });
    }
  }
}

function checkRuleIds(entries: readonly RuleEntry[], issues: ValidationIssue[]): void {
  const indicesById = new Map<string, number[]>();
  for (const entry of entries) {
    const indices = indicesById.get(entry.id) ?? [];
    indices.push(entry.index);
    indicesById.set(entry.id, indices);
  }
  for (const [id, indices] of indicesById) {
    if (indices.length < 2) {
      continue;
    }
    issues.push({
      severity: 'error',
      code: 'DUPLICATE_RULE_ID',
      message: `Rule id '${id}' is used by rules ${indices.map((index) => `#${index}`).join(', ')}`,
      rule_indices: indices,
      field: 'id',
      value: id,
      suggestions: [{ description: 'Give every rule a unique id', action: `Rename all but one rule with id '${id}'` }],
    });
  }
}

/**
 * Validate a parsed policy.
 *
 * @example
 * ```typescript
 * const result = validatePolicy(parsePolicy(text));
 * if (!result.valid) {
 *   result.errors.forEach((issue) => console.error(formatIssue(issue)));
 * }
 * ```
 */
export function validatePolicy(policy: Policy): ValidationResult {
  const issues: ValidationIssue[] = [];
  const entries = resolveEntries(policy.rules);

  if (entries.length === 0) {
    issues.push({
      severity: 'error',
      code: 'EMPTY_POLICY',
      message: 'Policy has no rules',
      rule_indices: [],
      field: 'policies',
      suggestions: [{ description: 'Add at least one rule', action: "Add a rule under 'policies'" }],
    });
  }

  if (!SUPPORTED_VERSIONS.includes(policy.version)) {
    issues.push({
      severity: 'error',
      code: 'UNSUPPORTED_VERSION',
      message: `Unsupported policy version '${policy.version}'. Supported versions: ${SUPPORTED_VERSIONS.join(', ')}`,
      rule_indices: [],
      field: 'version',
      value: policy.version,
      suggestions: [
        { description: 'Use a supported version', action: `Set version to "${SUPPORTED_VERSIONS[0]}"` },
      ],
    });
  }

  checkRuleIds(entries, issues);

  for (const entry of entries) {
    const { rule } = entry;
    switch (rule.type) {
      case 'allowlist':
      case 'denylist':
        checkListRule(entry, rule, issues);
        break;
      case 'rate_limit':
        checkRateLimit(entry, rule, issues);
        break;
      case 'spending_cap':
        checkSpendingCap(entry, rule, issues);
        break;
    }
  }

  checkConflicts(entries, issues);
  checkOverlaps(entries, issues);

  const errors = issues.filter((issue) => issue.severity === 'error');
  const warnings = issues.filter((issue) => issue.severity === 'warning');

  if (errors.length > 0) {
    return { valid: false, errors, warnings };
  }
  return { valid: true, policy: new ValidatedPolicy(CONSTRUCTION_TOKEN, policy), errors, warnings };
}

/**
 * Overall verdict, e.g. "Policy validation failed: 2 errors, 1 warnings"
 */
export function summarizeValidation(result: Pick<ValidationResult, 'errors' | 'warnings'>): string {
  const errorCount = result.errors.length;
  const warningCount = result.warnings.length;
  if (errorCount > 0) {
    return `Policy validation failed: ${errorCount} errors, ${warningCount} warnings`;
  }
  if (warningCount > 0) {
    return `Policy validation passed with ${warningCount} warnings`;
  }
  return 'Policy validation passed successfully';
}

/**
 * One-line rendering of an issue, e.g. `error[CONFLICT] Conflict: agent_id ...`
 */
export function formatIssue(issue: ValidationIssue): string {
  return `${issue.severity}[${issue.code}] ${issue.message}`;
}
