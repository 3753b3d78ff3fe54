/**
 * Policy Generate Tool
 * Renders framework middleware from a policy file
 */

import { writeFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { z } from 'zod';
import { SUPPORTED_FRAMEWORKS, UnsupportedFrameworkError, generateMiddleware, isSupportedFramework } from '@tollgate/policy-core';
import type { Framework } from '@tollgate/policy-core';
import { loadValidatedPolicy } from './load.js';
import type { ToolDefinition } from './types.js';

const GenerateRequestSchema = z.object({
  policy_file: z.string().min(1).describe('Path to a YAML or JSON policy file'),
  framework: z.string().describe('Target framework'),
  output: z.string().min(1).optional().describe('File to write the middleware to'),
});

export type GenerateToolResult =
  | { framework: Framework; output: string; rule_count: number }
  | { framework: Framework; code: string; rule_count: number };

export class PolicyGenerateTool {
  getDefinition(): ToolDefinition {
    return {
      name: 'policy_generate',
      description:
        'Generate standalone Express or Fastify middleware enforcing a policy. Returns the code, or writes it to output.',
      inputSchema: {
        type: 'object',
        properties: {
          policy_file: {
            type: 'string',
            description: 'Path to a YAML or JSON policy file',
          },
          framework: {
            type: 'string',
            description: 'Target framework',
            enum: SUPPORTED_FRAMEWORKS,
          },
          output: {
            type: 'string',
            description: 'File to write the middleware to (code is returned when omitted)',
          },
        },
        required: ['policy_file', 'framework'],
      },
    };
  }

  async generate(input: unknown): Promise<GenerateToolResult> {
    const request = GenerateRequestSchema.parse(input);
    const { framework } = request;
    if (!isSupportedFramework(framework)) {
      throw new UnsupportedFrameworkError(framework, SUPPORTED_FRAMEWORKS);
    }

    const policy = await loadValidatedPolicy(request.policy_file);
    const code = generateMiddleware(policy, framework, { sourceName: basename(request.policy_file) });
    const rule_count = policy.entries.length;

    if (request.output) {
      await writeFile(request.output, code, 'utf-8');
      return { framework, output: request.output, rule_count };
    }
    return { framework, code, rule_count };
  }
}
