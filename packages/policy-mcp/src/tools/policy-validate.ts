/**
 * Policy Validate Tool
 * Parses and validates a policy file
 */

import { z } from 'zod';
import { parsePolicyFile, summarizeValidation, validatePolicy } from '@tollgate/policy-core';
import type { ValidationIssue } from '@tollgate/policy-core';
import type { ToolDefinition } from './types.js';

const ValidateRequestSchema = z.object({
  policy_file: z.string().min(1).describe('Path to a YAML or JSON policy file'),
});

export interface ValidateToolResult {
  status: 'valid' | 'invalid';
  issues: ValidationIssue[];
  error_count: number;
  warning_count: number;
  summary: string;
}

export class PolicyValidateTool {
  getDefinition(): ToolDefinition {
    return {
      name: 'policy_validate',
      description: 'Parse and validate a policy file. Returns every error and warning with suggestions.',
      inputSchema: {
        type: 'object',
        properties: {
          policy_file: {
            type: 'string',
            description: 'Path to a YAML or JSON policy file',
          },
        },
        required: ['policy_file'],
      },
    };
  }

  async validate(input: unknown): Promise<ValidateToolResult> {
    const request = ValidateRequestSchema.parse(input);
    const result = validatePolicy(await parsePolicyFile(request.policy_file));

    return {
      status: result.valid ? 'valid' : 'invalid',
      issues: [...result.errors, ...result.warnings],
      error_count: result.errors.length,
      warning_count: result.warnings.length,
      summary: summarizeValidation(result),
    };
  }
}
