/**
 * @tollgate/policy-core
 *
 * Declarative access and spending rules for machine clients: parse and
 * validate a policy, evaluate requests against it, or generate framework
 * middleware that enforces it.
 *
 * @example
 * ```typescript
 * import { PolicyEnforcer, parsePolicyFile, validatePolicy } from '@tollgate/policy-core';
 *
 * const result = validatePolicy(await parsePolicyFile('policy.yaml'));
 * if (!result.valid) throw new Error('invalid policy');
 *
 * const enforcer = new PolicyEnforcer({ policy: result.policy });
 * const check = enforcer.check({ agent_id: 'agent-7', estimated_cost: 0.5 });
 * if (check.decision.outcome === 'allow') {
 *   // ... perform the protected action, then
 *   check.commit();
 * }
 * ```
 */

export * from './types.js';
export { InternalError, PolicyParseError, UnsupportedFrameworkError } from './errors.js';
export type { InternalErrorCode } from './errors.js';
export { isValidPattern, matchesPattern, mostSpecificMatch, specificity } from './patterns.js';
export { DEFAULT_VERSION, parsePolicy, parsePolicyFile, parseRule } from './parser.js';
export type { ParseOptions, PolicyFormat } from './parser.js';
export {
  MAX_WINDOW_SECONDS,
  SUPPORTED_VERSIONS,
  ValidatedPolicy,
  assertValidatedPolicy,
  formatIssue,
  summarizeValidation,
  validatePolicy,
} from './validator.js';
export type {
  ErrorCode,
  IssueSeverity,
  IssueSuggestion,
  ValidationIssue,
  ValidationResult,
  WarningCode,
} from './validator.js';
export { STAGE_ORDER, planEvaluation } from './plan.js';
export type { PlanStep } from './plan.js';
export { AMOUNT_SCALE, StateStore, fromUnits, stateKey, subjectKey, toUnits } from './state-store.js';
export type { RateWindowState, SpendingWindowState, WindowState } from './state-store.js';
export { commit, evaluate, normalizeRequest } from './engine.js';
export { decisionResponse, decisionRuleId, isAllowed, toDiagnostic } from './decision.js';
export type { DecisionResponse } from './decision.js';
export { PolicyEnforcer } from './enforcer.js';
export type { CheckResult, EnforcerOptions } from './enforcer.js';
export {
  SUPPORTED_FRAMEWORKS,
  buildIR,
  extractEmbeddedRules,
  generateMiddleware,
  isSupportedFramework,
} from './codegen/index.js';
export type { EmbeddedRule, Framework, GenerateOptions, MiddlewareIR } from './codegen/index.js';
