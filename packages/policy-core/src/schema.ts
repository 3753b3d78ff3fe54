/**
 * Zod schemas for the policy configuration document
 */

import { z } from 'zod';
import { SUBJECT_FIELDS } from './types.js';

const ruleMeta = {
  id: z.string().optional(),
  description: z.string().optional(),
};

export const AllowlistRuleSchema = z
  .object({
    type: z.literal('allowlist'),
    field: z.enum(SUBJECT_FIELDS),
    values: z.array(z.string()),
    ...ruleMeta,
  })
  .strict();

export const DenylistRuleSchema = z
  .object({
    type: z.literal('denylist'),
    field: z.enum(SUBJECT_FIELDS),
    values: z.array(z.string()),
    ...ruleMeta,
  })
  .strict();

// Integers and numbers are type-checked here; bounds belong to the validator.
export const RateLimitRuleSchema = z
  .object({
    type: z.literal('rate_limit'),
    max_requests: z.number().int(),
    window_seconds: z.number().int(),
    ...ruleMeta,
  })
  .strict();

export const SpendingCapRuleSchema = z
  .object({
    type: z.literal('spending_cap'),
    max_amount: z.number(),
    currency: z.string(),
    window_seconds: z.number().int(),
    ...ruleMeta,
  })
  .strict();

export const RULE_SCHEMAS = {
  allowlist: AllowlistRuleSchema,
  denylist: DenylistRuleSchema,
  rate_limit: RateLimitRuleSchema,
  spending_cap: SpendingCapRuleSchema,
} as const;

export const AuditConfigSchema = z
  .object({
    enabled: z.boolean().default(true),
    format: z.enum(['json', 'csv']).default('json'),
    destination: z.enum(['stdout', 'stderr']).default('stdout'),
  })
  .strict();

/**
 * Expected type per field, as reported in parse errors
 */
export const FIELD_EXPECTATIONS: Record<string, string> = {
  type: 'one of allowlist, denylist, rate_limit, spending_cap',
  field: `one of ${SUBJECT_FIELDS.join(', ')}`,
  values: 'list of strings',
  max_requests: 'integer',
  window_seconds: 'integer',
  max_amount: 'number',
  currency: 'string',
  id: 'string',
  description: 'string',
  enabled: 'boolean',
  format: 'one of json, csv',
  destination: 'one of stdout, stderr',
};
