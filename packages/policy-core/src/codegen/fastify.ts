/**
 * Fastify target: plugin with `onRequest`/`onResponse` hooks
 */

import type { MiddlewareIR } from './ir.js';
import { renderRuntime } from './runtime.js';
import type { RenderContext } from './runtime.js';

const FASTIFY_ADAPTER = String.raw`function tollgatePolicy(fastify, options, done) {
  const settings = resolveOptions(options);
  const pending = new WeakMap();

  fastify.addHook('onRequest', (req, reply, hookDone) => {
    let request;
    try {
      request = normalizeRequest(settings.extractRequest(req), settings.now);
    } catch (error) {
      hookDone(error);
      return;
    }

    const decision = evaluate(settings.state, request);
    const subject = subjectKey(request);
    emitAudit(settings.onAudit, subject, decisionRuleId(decision), decision.outcome, request.estimated_cost, request.timestamp);
    req.policyDecision = decision;

    const response = decisionResponse(decision);
    if (response !== null) {
      reply.code(response.status).headers(response.headers).send(response.body);
      return;
    }

    pending.set(req, { request: request, subject: subject });
    hookDone();
  });

  fastify.addHook('onResponse', (req, reply, hookDone) => {
    const entry = pending.get(req);
    if (entry !== undefined) {
      pending.delete(req);
      if (reply.statusCode < 400) {
        commit(settings.state, entry.request);
        emitAudit(settings.onAudit, entry.subject, null, 'commit', entry.request.estimated_cost, entry.request.timestamp);
      }
    }
    hookDone();
  });

  done();
}

// Hooks apply to the parent scope instead of an encapsulated child context.
tollgatePolicy[Symbol.for('skip-override')] = true;
tollgatePolicy[Symbol.for('fastify.display-name')] = 'tollgate-policy';

module.exports = tollgatePolicy;
module.exports.default = tollgatePolicy;
module.exports.tollgatePolicy = tollgatePolicy;
module.exports.evaluate = evaluate;
module.exports.commit = commit;
module.exports.RULES = RULES;
module.exports.POLICY_VERSION = POLICY_VERSION;
`;

export function renderFastify(ir: MiddlewareIR, sourceName?: string): string {
  const context: RenderContext = {
    frameworkName: 'Fastify',
    sourceName,
    usage: [
      "const tollgatePolicy = require('./policy-plugin');",
      'fastify.register(tollgatePolicy, { onAudit: (subject, ruleId, decision, amount, timestamp) => {} });',
    ],
  };
  return [renderRuntime(ir, context), FASTIFY_ADAPTER].join('\n\n');
}
