/**
 * Shared section of generated middleware: header, embedded constants and the
 * evaluation runtime. Framework renderers append their adapter to it.
 *
 * The runtime mirrors engine.ts and state-store.ts; changes to evaluation
 * semantics must be made in both places.
 */

import type { EmbeddedRule, MiddlewareIR } from './ir.js';

export const RULES_BEGIN_MARKER = '/* tollgate:rules:begin */';
export const RULES_END_MARKER = '/* tollgate:rules:end */';

export interface RenderContext {
  /** Display name of the target framework */
  frameworkName: string;
  /** Where the policy came from, shown in the header */
  sourceName?: string;
  /** Usage lines shown in the header */
  usage: string[];
}

function commentSafe(text: string): string {
  return text.replace(/\*\//g, '* /');
}

function jsonLiteral(value: unknown): string {
  return JSON.stringify(value).replace(/\*\//g, '*\\/');
}

function describeRule(rule: EmbeddedRule): string {
  switch (rule.type) {
    case 'allowlist':
    case 'denylist':
      return `${rule.field}: ${rule.values.join(', ')}`;
    case 'rate_limit':
      return `${rule.max_requests} requests / ${rule.window_seconds}s`;
    case 'spending_cap':
      return `${rule.max_amount} ${rule.currency} / ${rule.window_seconds}s`;
  }
}

function renderHeader(ir: MiddlewareIR, context: RenderContext): string {
  const origin = context.sourceName ? ` from ${context.sourceName}` : '';
  const lines = [
    `Policy enforcement middleware for ${context.frameworkName}.`,
    `Generated by tollgate${origin} (policy version ${ir.version}). Regenerate instead of editing.`,
    '',
    'Evaluation order, first non-allow outcome wins:',
    ...ir.rules.map(
      (rule, position) => `  ${position + 1}. ${rule.type.padEnd(12)} ${rule.id} (${describeRule(rule)})`
    ),
    '',
    'Usage:',
    ...context.usage.map((line) => `  ${line}`),
  ];
  return ['/*', ...lines.map((line) => commentSafe(` * ${line}`).trimEnd()), ' */'].join('\n');
}

function renderConstants(ir: MiddlewareIR): string {
  const rules = ir.rules.map((rule) => `  ${jsonLiteral(rule)}`).join(',\n');
  return [
    `const POLICY_VERSION = ${jsonLiteral(ir.version)};`,
    `const AUDIT = ${jsonLiteral(ir.audit)};`,
    `const RULES = ${RULES_BEGIN_MARKER}[\n${rules}\n]${RULES_END_MARKER};`,
  ].join('\n');
}

const RUNTIME_SOURCE = String.raw`const SUBJECT_FIELDS = ['agent_id', 'wallet_address', 'ip_address'];
const AMOUNT_SCALE = 1000000;

function rulesOfType(type) {
  return RULES.filter((rule) => rule.type === type);
}

const DENYLIST_RULES = rulesOfType('denylist');
const ALLOWLIST_RULES = rulesOfType('allowlist');
const RATE_LIMIT_RULES = rulesOfType('rate_limit');
const SPENDING_CAP_RULES = rulesOfType('spending_cap');

function toUnits(amount) {
  return Math.round(amount * AMOUNT_SCALE);
}

function fromUnits(units) {
  return units / AMOUNT_SCALE;
}

function matchesPattern(pattern, value) {
  if (pattern.endsWith('*')) {
    return value.startsWith(pattern.slice(0, -1));
  }
  return pattern === value;
}

function specificity(pattern) {
  return pattern.endsWith('*') ? (pattern.length - 1) * 2 : pattern.length * 2 + 1;
}

function subjectKey(request) {
  for (const field of SUBJECT_FIELDS) {
    if (request[field] !== undefined) {
      return field + '=' + request[field];
    }
  }
  return 'anonymous';
}

function stateKey(ruleId, subject) {
  return ruleId + '|' + subject;
}

function normalizeRequest(input, now) {
  const cost = input.estimated_cost === undefined ? 0 : input.estimated_cost;
  if (typeof cost !== 'number' || !Number.isFinite(cost) || cost < 0) {
    throw new TypeError('estimated_cost must be a non-negative finite number, got ' + cost);
  }
  const timestamp = input.timestamp === undefined ? now() : input.timestamp;
  if (typeof timestamp !== 'number' || !Number.isFinite(timestamp)) {
    throw new TypeError('timestamp must be a finite number of milliseconds, got ' + timestamp);
  }
  const request = { estimated_cost: cost, timestamp: timestamp };
  for (const field of SUBJECT_FIELDS) {
    const value = input[field];
    if (typeof value === 'string' && value !== '') {
      request[field] = value;
    }
  }
  return request;
}

// Read-only: usage is recorded by commit() once the response succeeded.
function evaluate(state, request) {
  const subject = subjectKey(request);
  const now = request.timestamp;

  for (const rule of DENYLIST_RULES) {
    const value = request[rule.field];
    if (value !== undefined && rule.values.some((pattern) => matchesPattern(pattern, value))) {
      return { outcome: 'deny', reason: 'denylisted', rule_id: rule.id, field: rule.field, value: value };
    }
  }

  const matches = [];
  const fields = [];
  for (const rule of ALLOWLIST_RULES) {
    if (!fields.includes(rule.field)) {
      fields.push(rule.field);
    }
  }
  for (const field of fields) {
    const value = request[field];
    if (value === undefined) {
      continue;
    }
    const rules = ALLOWLIST_RULES.filter((rule) => rule.field === field);
    let best = null;
    for (const rule of rules) {
      for (const pattern of rule.values) {
        if (matchesPattern(pattern, value) && (best === null || specificity(pattern) > specificity(best.pattern))) {
          best = { rule_id: rule.id, field: field, pattern: pattern };
        }
      }
    }
    if (best === null) {
      return { outcome: 'deny', reason: 'not in allowlist', rule_id: rules[0].id, field: field, value: value };
    }
    matches.push(best);
  }

  for (const rule of RATE_LIMIT_RULES) {
    const windowMs = rule.window_seconds * 1000;
    const entry = state.get(stateKey(rule.id, subject));
    const inside = entry ? entry.timestamps.filter((timestamp) => timestamp > now - windowMs) : [];
    if (inside.length >= rule.max_requests) {
      const oldest = Math.min(...inside);
      return {
        outcome: 'rate_limited',
        retry_after_seconds: Math.max(1, Math.ceil((oldest + windowMs - now) / 1000)),
        rule_id: rule.id,
      };
    }
  }

  const costUnits = toUnits(request.estimated_cost);
  for (const rule of SPENDING_CAP_RULES) {
    const windowMs = rule.window_seconds * 1000;
    const limitUnits = toUnits(rule.max_amount);
    const entry = state.get(stateKey(rule.id, subject));
    const spent = entry && now - entry.window_start <= windowMs ? entry.accumulated_units : 0;
    if (spent + costUnits > limitUnits) {
      return {
        outcome: 'spending_cap_exceeded',
        current: fromUnits(spent),
        limit: rule.max_amount,
        remaining: fromUnits(Math.max(0, limitUnits - spent)),
        currency: rule.currency,
        rule_id: rule.id,
      };
    }
  }

  return { outcome: 'allow', allowlist_matches: matches };
}

function commit(state, request) {
  const subject = subjectKey(request);
  const now = request.timestamp;

  for (const rule of RATE_LIMIT_RULES) {
    const key = stateKey(rule.id, subject);
    const windowMs = rule.window_seconds * 1000;
    const entry = state.get(key);
    if (!entry) {
      state.set(key, { timestamps: [now] });
      continue;
    }
    entry.timestamps = entry.timestamps.filter((timestamp) => timestamp > now - windowMs);
    entry.timestamps.push(now);
  }

  const costUnits = toUnits(request.estimated_cost);
  for (const rule of SPENDING_CAP_RULES) {
    const key = stateKey(rule.id, subject);
    const windowMs = rule.window_seconds * 1000;
    const entry = state.get(key);
    if (!entry) {
      state.set(key, { accumulated_units: costUnits, window_start: now });
      continue;
    }
    if (now - entry.window_start > windowMs) {
      entry.accumulated_units = 0;
      entry.window_start = now;
    }
    entry.accumulated_units += costUnits;
  }
}

function decisionRuleId(decision) {
  return decision.outcome === 'allow' ? null : decision.rule_id;
}

function decisionResponse(decision) {
  switch (decision.outcome) {
    case 'deny':
      return {
        status: 403,
        headers: {},
        body: { error: 'Forbidden', reason: decision.reason, rule_id: decision.rule_id },
      };
    case 'rate_limited':
      return {
        status: 429,
        headers: { 'Retry-After': String(decision.retry_after_seconds) },
        body: { error: 'Too many requests', retry_after: decision.retry_after_seconds, rule_id: decision.rule_id },
      };
    case 'spending_cap_exceeded':
      return {
        status: 402,
        headers: {},
        body: {
          error: 'Spending cap exceeded',
          current: decision.current,
          limit: decision.limit,
          remaining: decision.remaining,
          currency: decision.currency,
          rule_id: decision.rule_id,
        },
      };
    default:
      return null;
  }
}

function csvField(value) {
  const text = value === null || value === undefined ? '' : String(value);
  return /[",\r\n]/.test(text) ? '"' + text.replace(/"/g, '""') + '"' : text;
}

function defaultAuditHook(subject, ruleId, decision, amount, timestamp) {
  if (!AUDIT.enabled) {
    return;
  }
  const stream = AUDIT.destination === 'stderr' ? process.stderr : process.stdout;
  const line =
    AUDIT.format === 'csv'
      ? [timestamp, subject, ruleId, decision, amount].map(csvField).join(',')
      : JSON.stringify({ timestamp: timestamp, subject_key: subject, rule_id: ruleId, decision: decision, amount: amount });
  stream.write(line + '\n');
}

function emitAudit(hook, subject, ruleId, decision, amount, timestamp) {
  try {
    hook(subject, ruleId, decision, amount, timestamp);
  } catch (error) {
    console.error('Audit hook failed:', error);
  }
}

function headerValue(headers, name) {
  const value = headers ? headers[name] : undefined;
  return Array.isArray(value) ? value[0] : value;
}

function defaultExtractRequest(req) {
  const cost = Number.parseFloat(headerValue(req.headers, 'x-estimated-cost') || '0');
  return {
    agent_id: headerValue(req.headers, 'x-agent-id'),
    wallet_address: headerValue(req.headers, 'x-wallet-address'),
    ip_address: req.ip,
    estimated_cost: Number.isFinite(cost) && cost >= 0 ? cost : 0,
  };
}

function resolveOptions(options) {
  const settings = options || {};
  return {
    state: settings.state || new Map(),
    now: settings.now || Date.now,
    extractRequest: settings.extractRequest || defaultExtractRequest,
    onAudit: settings.onAudit || defaultAuditHook,
  };
}`;

/**
 * Header, constants and runtime shared by every target
 */
export function renderRuntime(ir: MiddlewareIR, context: RenderContext): string {
  return ["'use strict';", renderHeader(ir, context), renderConstants(ir), RUNTIME_SOURCE].join('\n\n');
}
