import type { Request, Response, NextFunction } from 'express';
import { decisionResponse } from '@tollgate/policy-core';
import type { CheckResult, RequestInput } from '@tollgate/policy-core';
import type { MiddlewareOptions, RequestPolicyInfo } from './types.js';

function headerValue(req: Request, name: string): string | undefined {
  const value = req.headers[name];
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Default request descriptor: `x-agent-id`, `x-wallet-address` and
 * `x-estimated-cost` headers plus the client address. A missing or
 * malformed cost counts as 0.
 */
export function extractPolicyRequest(req: Request): RequestInput {
  const cost = Number.parseFloat(headerValue(req, 'x-estimated-cost') ?? '0');
  return {
    agent_id: headerValue(req, 'x-agent-id'),
    wallet_address: headerValue(req, 'x-wallet-address'),
    ip_address: req.ip,
    estimated_cost: Number.isFinite(cost) && cost >= 0 ? cost : 0,
  };
}

/**
 * Express middleware enforcing a tollgate policy.
 *
 * This middleware:
 * 1. Evaluates the request against the enforcer's current policy
 * 2. Attaches the decision to the request object
 * 3. Rejects with 403, 429 or 402 (in "enforce" mode)
 * 4. Records usage once the response finishes with a status below 400
 *
 * @example
 * ```typescript
 * import express from 'express';
 * import { PolicyEnforcer, parsePolicyFile, validatePolicy } from '@tollgate/policy-core';
 * import { tollgateMiddleware } from '@tollgate/policy-express';
 *
 * const result = validatePolicy(await parsePolicyFile('policy.yaml'));
 * if (!result.valid) throw new Error('invalid policy');
 *
 * const app = express();
 * app.use('/api', tollgateMiddleware({ enforcer: new PolicyEnforcer({ policy: result.policy }) }));
 * ```
 */
export function tollgateMiddleware(
  options: MiddlewareOptions
): (req: Request, res: Response, next: NextFunction) => void {
  const { enforcer, mode = 'enforce', extractRequest = extractPolicyRequest, attachProperty = 'tollgate' } = options;

  return (req: Request, res: Response, next: NextFunction): void => {
    let result: CheckResult;
    try {
      result = enforcer.check(extractRequest(req));
    } catch (error) {
      next(error);
      return;
    }

    const info: RequestPolicyInfo = { decision: result.decision, committed: false };
    (req as unknown as Record<string, unknown>)[attachProperty] = info;

    const response = decisionResponse(result.decision);
    if (response && mode === 'enforce') {
      res.status(response.status).set(response.headers).json(response.body);
      return;
    }

    res.on('finish', () => {
      if (res.statusCode < 400) {
        info.committed = result.commit();
      }
    });

    next();
  };
}
