/**
 * Express target: `(req, res, next)` middleware that commits on `finish`
 */

import type { MiddlewareIR } from './ir.js';
import { renderRuntime } from './runtime.js';
import type { RenderContext } from './runtime.js';

const EXPRESS_ADAPTER = String.raw`function createPolicyMiddleware(options) {
  const settings = resolveOptions(options);

  return function policyMiddleware(req, res, next) {
    let request;
    try {
      request = normalizeRequest(settings.extractRequest(req), settings.now);
    } catch (error) {
      next(error);
      return;
    }

    const decision = evaluate(settings.state, request);
    const subject = subjectKey(request);
    emitAudit(settings.onAudit, subject, decisionRuleId(decision), decision.outcome, request.estimated_cost, request.timestamp);
    req.policyDecision = decision;

    const response = decisionResponse(decision);
    if (response !== null) {
      res.status(response.status).set(response.headers).json(response.body);
      return;
    }

    let committed = false;
    res.on('finish', () => {
      if (committed || res.statusCode >= 400) {
        return;
      }
      committed = true;
      commit(settings.state, request);
      emitAudit(settings.onAudit, subject, null, 'commit', request.estimated_cost, request.timestamp);
    });
    next();
  };
}

module.exports = createPolicyMiddleware;
module.exports.createPolicyMiddleware = createPolicyMiddleware;
module.exports.evaluate = evaluate;
module.exports.commit = commit;
module.exports.RULES = RULES;
module.exports.POLICY_VERSION = POLICY_VERSION;
`;

export function renderExpress(ir: MiddlewareIR, sourceName?: string): string {
  const context: RenderContext = {
    frameworkName: 'Express',
    sourceName,
    usage: [
      "const createPolicyMiddleware = require('./policy-middleware');",
      'app.use(createPolicyMiddleware({ onAudit: (subject, ruleId, decision, amount, timestamp) => {} }));',
    ],
  };
  return [renderRuntime(ir, context), EXPRESS_ADAPTER].join('\n\n');
}
