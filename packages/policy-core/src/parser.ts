/**
 * Policy Parser
 * Turns YAML or JSON configuration text into a Policy
 */

import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { ZodIssue } from 'zod';
import { PolicyParseError } from './errors.js';
import { AuditConfigSchema, FIELD_EXPECTATIONS, RULE_SCHEMAS } from './schema.js';
import { RULE_TYPES } from './types.js';
import type { AuditConfig, Policy, Rule, RuleType } from './types.js';

export type PolicyFormat = 'yaml' | 'json';

export interface ParseOptions {
  /**
   * Document syntax
   * @default "yaml"
   */
  format?: PolicyFormat;
}

export const DEFAULT_VERSION = '1.0';

const TOP_LEVEL_FIELDS = ['version', 'policies', 'audit'];

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isRuleType(value: unknown): value is RuleType {
  return RULE_TYPES.some((type) => type === value);
}

/**
 * Short description of a raw configuration value for error messages
 */
export function describeValue(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'list';
  }
  switch (typeof value) {
    case 'string':
      return `string ${JSON.stringify(value)}`;
    case 'number':
    case 'boolean':
      return `${typeof value} ${String(value)}`;
    case 'undefined':
      return 'nothing';
    case 'object':
      return 'mapping';
    default:
      return typeof value;
  }
}

function valueAtPath(root: unknown, path: readonly (string | number)[]): unknown {
  let current: unknown = root;
  for (const segment of path) {
    if (Array.isArray(current) && typeof segment === 'number') {
      current = current[segment];
    } else if (isRecord(current)) {
      current = current[String(segment)];
    } else {
      return undefined;
    }
  }
  return current;
}

function formatPath(path: readonly (string | number)[]): string {
  return path
    .map((segment) => (typeof segment === 'number' ? `[${segment}]` : `.${segment}`))
    .join('')
    .slice(1);
}

function issueToError(
  issue: ZodIssue,
  raw: Record<string, unknown>,
  context: string,
  location: { ruleIndex?: number; prefix?: string }
): PolicyParseError {
  const prefix = location.prefix ?? '';

  if (issue.code === 'unrecognized_keys') {
    const key = issue.keys[0];
    return new PolicyParseError(`Unknown field '${prefix}${key}' in ${context}`, {
      ruleIndex: location.ruleIndex,
      field: `${prefix}${key}`,
      expected: 'no additional fields',
    });
  }

  const field = String(issue.path[0] ?? '');
  const expected = FIELD_EXPECTATIONS[field] ?? 'a valid value';
  const value = valueAtPath(raw, issue.path);
  const details = { ruleIndex: location.ruleIndex, field: `${prefix}${field}`, expected };

  if (issue.path.length === 1 && value === undefined) {
    return new PolicyParseError(`Missing required field '${prefix}${field}' in ${context}`, details);
  }

  return new PolicyParseError(
    `Invalid value for '${prefix}${formatPath(issue.path)}' in ${context}: expected ${expected}, got ${describeValue(value)}`,
    details
  );
}

/**
 * Parse a single rule mapping found at `policies[index]`
 */
export function parseRule(raw: unknown, index: number): Rule {
  const where = `policies[${index}]`;

  if (!isRecord(raw)) {
    throw new PolicyParseError(`Rule at ${where} must be a mapping, got ${describeValue(raw)}`, {
      ruleIndex: index,
      expected: 'mapping',
    });
  }

  const type = raw.type;
  if (type === undefined) {
    throw new PolicyParseError(`Missing required field 'type' in rule at ${where}`, {
      ruleIndex: index,
      field: 'type',
      expected: FIELD_EXPECTATIONS.type,
    });
  }
  if (!isRuleType(type)) {
    throw new PolicyParseError(
      `Unknown rule type ${describeValue(type)} at ${where}: expected ${FIELD_EXPECTATIONS.type}`,
      { ruleIndex: index, field: 'type', expected: FIELD_EXPECTATIONS.type }
    );
  }

  const result = RULE_SCHEMAS[type].safeParse(raw);
  if (!result.success) {
    throw issueToError(result.error.issues[0], raw, `${type} rule at ${where}`, { ruleIndex: index });
  }
  return result.data;
}

function parseAudit(raw: unknown): AuditConfig {
  const section = raw ?? {};
  if (!isRecord(section)) {
    throw new PolicyParseError(`Invalid value for 'audit': expected mapping, got ${describeValue(section)}`, {
      field: 'audit',
      expected: 'mapping',
    });
  }
  const result = AuditConfigSchema.safeParse(section);
  if (!result.success) {
    throw issueToError(result.error.issues[0], section, 'audit section', { prefix: 'audit.' });
  }
  return result.data;
}

function readDocument(text: string, format: PolicyFormat): unknown {
  try {
    return format === 'json' ? JSON.parse(text) : parseYaml(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new PolicyParseError(`Invalid ${format === 'json' ? 'JSON' : 'YAML'}: ${message}`);
  }
}

/**
 * Parse configuration text into a Policy.
 *
 * Only types are checked here; value bounds and conflicts are reported by
 * `validatePolicy()`.
 *
 * @throws PolicyParseError at the first malformed construct
 *
 * @example
 * ```typescript
 * const policy = parsePolicy(`
 * version: "1.0"
 * policies:
 *   - type: denylist
 *     field: agent_id
 *     values: ["agent-bad"]
 *   - type: rate_limit
 *     max_requests: 100
 *     window_seconds: 3600
 * `);
 * ```
 */
export function parsePolicy(text: string, options: ParseOptions = {}): Policy {
  const format = options.format ?? 'yaml';
  const doc = readDocument(text, format);

  if (!isRecord(doc)) {
    throw new PolicyParseError(
      `Policy document must be a mapping with a 'policies' list, got ${describeValue(doc)}`,
      { expected: 'mapping' }
    );
  }

  for (const key of Object.keys(doc)) {
    if (!TOP_LEVEL_FIELDS.includes(key)) {
      throw new PolicyParseError(`Unknown top-level field '${key}'`, {
        field: key,
        expected: `one of ${TOP_LEVEL_FIELDS.join(', ')}`,
      });
    }
  }

  const version = doc.version ?? DEFAULT_VERSION;
  if (typeof version !== 'string') {
    throw new PolicyParseError(`Invalid value for 'version': expected string, got ${describeValue(version)}`, {
      field: 'version',
      expected: 'string',
    });
  }

  const policies = doc.policies;
  if (policies === undefined) {
    throw new PolicyParseError("Missing required field 'policies'", {
      field: 'policies',
      expected: 'list of rules',
    });
  }
  if (!Array.isArray(policies)) {
    throw new PolicyParseError(
      `Invalid value for 'policies': expected list of rules, got ${describeValue(policies)}`,
      { field: 'policies', expected: 'list of rules' }
    );
  }

  const rules = policies.map((raw: unknown, index: number) => parseRule(raw, index));

  return { version, rules, audit: parseAudit(doc.audit) };
}

/**
 * Read and parse a policy file. `.json` files are read as JSON, anything
 * else as YAML.
 */
export async function parsePolicyFile(path: string): Promise<Policy> {
  const text = await readFile(path, 'utf-8');
  const format: PolicyFormat = extname(path).toLowerCase() === '.json' ? 'json' : 'yaml';
  return parsePolicy(text, { format });
}
