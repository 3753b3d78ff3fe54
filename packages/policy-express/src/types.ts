import type { Request } from 'express';
import type { Decision, PolicyEnforcer, RequestInput } from '@tollgate/policy-core';

/**
 * Options for the Express middleware
 */
export interface MiddlewareOptions {
  /**
   * Enforcer holding the policy and its state
   */
  enforcer: PolicyEnforcer;

  /**
   * Middleware behavior mode
   * - "enforce": Reject denied, rate-limited and over-budget requests
   * - "observe": Attach the decision but let every request proceed
   * @default "enforce"
   */
  mode?: 'enforce' | 'observe';

  /**
   * Build the request descriptor from an incoming request
   * @default headers x-agent-id, x-wallet-address, x-estimated-cost and req.ip
   */
  extractRequest?: (req: Request) => RequestInput;

  /**
   * Property name to attach the decision to the request object
   * @default "tollgate"
   */
  attachProperty?: string;
}

/**
 * Policy info attached to the Express request
 */
export interface RequestPolicyInfo {
  decision: Decision;
  /** Whether usage was recorded for this request */
  committed: boolean;
}
