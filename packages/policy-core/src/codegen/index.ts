/**
 * Code Generator
 *
 * Renders a ValidatedPolicy into standalone CommonJS middleware for a web
 * framework. The output embeds the rules between marker comments so they can
 * be read back with `extractEmbeddedRules()`.
 */

import { InternalError, PolicyParseError, UnsupportedFrameworkError } from '../errors.js';
import { isRecord, parseRule } from '../parser.js';
import type { RuleEntry } from '../types.js';
import { assertValidatedPolicy, formatIssue, validatePolicy } from '../validator.js';
import type { ValidatedPolicy } from '../validator.js';
import { renderExpress } from './express.js';
import { renderFastify } from './fastify.js';
import { buildIR } from './ir.js';
import type { MiddlewareIR } from './ir.js';

export { buildIR } from './ir.js';
export type { EmbeddedRule, MiddlewareIR } from './ir.js';
export { RULES_BEGIN_MARKER, RULES_END_MARKER } from './runtime.js';

export const SUPPORTED_FRAMEWORKS = ['express', 'fastify'] as const;

export type Framework = (typeof SUPPORTED_FRAMEWORKS)[number];

const RENDERERS: Record<Framework, (ir: MiddlewareIR, sourceName?: string) => string> = {
  express: renderExpress,
  fastify: renderFastify,
};

export function isSupportedFramework(name: string): name is Framework {
  return SUPPORTED_FRAMEWORKS.some((framework) => framework === name);
}

export interface GenerateOptions {
  /** Shown in the generated header, e.g. the policy file name */
  sourceName?: string;
}

/**
 * Generate middleware source for `framework`.
 *
 * Output is deterministic: the same policy always yields the same text.
 *
 * @throws UnsupportedFrameworkError for an unknown target
 * @throws InternalError when the policy is not validated or fails re-validation
 *
 * @example
 * ```typescript
 * const result = validatePolicy(await parsePolicyFile('policy.yaml'));
 * if (result.valid) {
 *   await writeFile('policy-middleware.js', generateMiddleware(result.policy, 'express'));
 * }
 * ```
 */
export function generateMiddleware(
  policy: ValidatedPolicy,
  framework: string,
  options: GenerateOptions = {}
): string {
  if (!isSupportedFramework(framework)) {
    throw new UnsupportedFrameworkError(framework, SUPPORTED_FRAMEWORKS);
  }
  assertValidatedPolicy(policy);

  const recheck = validatePolicy(policy.toPolicy());
  if (!recheck.valid) {
    throw new InternalError(
      'REVALIDATION_FAILED',
      `Validated policy failed re-validation: ${recheck.errors.map(formatIssue).join('; ')}`
    );
  }

  return RENDERERS[framework](buildIR(policy), options.sourceName);
}

const RULES_BLOCK = /\/\* tollgate:rules:begin \*\/([\s\S]*?)\/\* tollgate:rules:end \*\//;

/**
 * Read the rule constants back out of generated source, in policy order.
 * Rule ids of the form `<type>-<index>` are left implicit in the returned rules.
 */
export function extractEmbeddedRules(source: string): RuleEntry[] {
  const match = RULES_BLOCK.exec(source);
  if (!match) {
    throw new PolicyParseError('No embedded rules found between tollgate:rules markers');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(match[1]);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new PolicyParseError(`Embedded rules are not valid JSON: ${message}`);
  }
  if (!Array.isArray(raw)) {
    throw new PolicyParseError('Embedded rules must be a list');
  }

  const entries = raw.map((item: unknown, position: number): RuleEntry => {
    if (!isRecord(item)) {
      throw new PolicyParseError(`Embedded rule at position ${position} is not a mapping`);
    }
    const { id, index, ...fields } = item;
    if (typeof id !== 'string' || typeof index !== 'number') {
      throw new PolicyParseError(`Embedded rule at position ${position} has no id or index`);
    }
    const implicitId = `${String(fields.type)}-${index}`;
    const rule = parseRule(id === implicitId ? fields : { ...fields, id }, index);
    return { id, index, rule };
  });

  return entries.sort((a, b) => a.index - b.index);
}
