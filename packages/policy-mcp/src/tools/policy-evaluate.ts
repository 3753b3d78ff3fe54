/**
 * Policy Evaluate Tool
 * Evaluates a simulated request, keeping usage per policy file for the life of the process
 */

import { resolve } from 'node:path';
import { z } from 'zod';
import { PolicyEnforcer, toDiagnostic } from '@tollgate/policy-core';
import type { DecisionDiagnostic } from '@tollgate/policy-core';
import { loadValidatedPolicy } from './load.js';
import type { ToolDefinition } from './types.js';

const EvaluateRequestSchema = z.object({
  policy_file: z.string().min(1).describe('Path to a YAML or JSON policy file'),
  agent_id: z.string().optional().describe('Agent identifier'),
  wallet_address: z.string().optional().describe('Wallet address'),
  ip_address: z.string().optional().describe('Client IP address'),
  estimated_cost: z.number().nonnegative().optional().describe('Cost of the request'),
  commit: z.boolean().optional().describe('Record usage when allowed'),
});

export interface EvaluateToolResult {
  decision: DecisionDiagnostic;
  committed: boolean;
}

export class PolicyEvaluateTool {
  private enforcers = new Map<string, PolicyEnforcer>();

  constructor(private clock: () => number = Date.now) {}

  getDefinition(): ToolDefinition {
    return {
      name: 'policy_evaluate',
      description:
        'Evaluate a request against a policy. Usage from committed requests is kept per policy file, so rate limits and spending caps apply across calls.',
      inputSchema: {
        type: 'object',
        properties: {
          policy_file: {
            type: 'string',
            description: 'Path to a YAML or JSON policy file',
          },
          agent_id: {
            type: 'string',
            description: 'Agent identifier',
          },
          wallet_address: {
            type: 'string',
            description: 'Wallet address',
          },
          ip_address: {
            type: 'string',
            description: 'Client IP address',
          },
          estimated_cost: {
            type: 'number',
            description: 'Cost of the request (default 0)',
          },
          commit: {
            type: 'boolean',
            description: 'Record usage when the request is allowed (default false)',
          },
        },
        required: ['policy_file'],
      },
    };
  }

  async evaluate(input: unknown): Promise<EvaluateToolResult> {
    const { policy_file, commit, ...request } = EvaluateRequestSchema.parse(input);
    const enforcer = await this.enforcerFor(policy_file);

    const check = enforcer.check(request);
    const committed = commit === true && check.commit();

    return { decision: toDiagnostic(check.decision), committed };
  }

  private async enforcerFor(file: string): Promise<PolicyEnforcer> {
    const key = resolve(file);
    const existing = this.enforcers.get(key);
    if (existing) {
      return existing;
    }

    const enforcer = new PolicyEnforcer({ policy: await loadValidatedPolicy(key), clock: this.clock });
    this.enforcers.set(key, enforcer);
    return enforcer;
  }
}
