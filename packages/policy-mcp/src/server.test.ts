import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { callTool, createTools, listTools } from './server.js';
import type { PolicyTools } from './server.js';

const POLICY = `version: "1.0"
policies:
  - type: denylist
    field: agent_id
    values: ["agent-bad"]
  - type: rate_limit
    max_requests: 2
    window_seconds: 60
  - type: spending_cap
    id: daily
    max_amount: 5
    currency: USDC
    window_seconds: 86400
`;

const WARNING_POLICY = `policies:
  - type: allowlist
    field: agent_id
    values: ["a", "a"]
`;

function textOf(result: Awaited<ReturnType<typeof callTool>>): string {
  const [first] = result.content;
  if (first?.type !== 'text') {
    throw new Error('expected a text result');
  }
  return first.text;
}

describe('MCP tools', () => {
  let dir: string;
  let tools: PolicyTools;
  let now: number;

  async function policyFile(name: string, content: string): Promise<string> {
    const path = join(dir, name);
    await writeFile(path, content, 'utf-8');
    return path;
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tollgate-mcp-'));
    now = 1_700_000_000_000;
    tools = createTools(() => now);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('lists the three tools', () => {
    expect(listTools(tools).map((tool) => tool.name)).toEqual([
      'policy_validate',
      'policy_generate',
      'policy_evaluate',
    ]);
  });

  describe('policy_validate', () => {
    it('reports a valid policy', async () => {
      const result = await tools.validate.validate({ policy_file: await policyFile('policy.yaml', POLICY) });

      expect(result).toEqual({
        status: 'valid',
        issues: [],
        error_count: 0,
        warning_count: 0,
        summary: 'Policy validation passed successfully',
      });
    });

    it('includes warnings', async () => {
      const result = await tools.validate.validate({ policy_file: await policyFile('policy.yaml', WARNING_POLICY) });

      expect(result.status).toBe('valid');
      expect(result.warning_count).toBe(1);
      expect(result.issues[0].code).toBe('DUPLICATE_VALUE');
      expect(result.summary).toBe('Policy validation passed with 1 warnings');
    });

    it('rejects a missing policy_file argument', async () => {
      await expect(tools.validate.validate({})).rejects.toThrow();
    });
  });

  describe('policy_generate', () => {
    it('returns code when no output is given', async () => {
      const result = await tools.generate.generate({
        policy_file: await policyFile('policy.yaml', POLICY),
        framework: 'fastify',
      });

      expect(result.framework).toBe('fastify');
      expect(result.rule_count).toBe(3);
      expect('code' in result && result.code).toContain('Generated by tollgate from policy.yaml');
    });

    it('writes the output file', async () => {
      const output = join(dir, 'middleware.js');
      const result = await tools.generate.generate({
        policy_file: await policyFile('policy.yaml', POLICY),
        framework: 'express',
        output,
      });

      expect(result).toEqual({ framework: 'express', output, rule_count: 3 });
      expect(await readFile(output, 'utf-8')).toContain('createPolicyMiddleware');
    });

    it('rejects unsupported frameworks', async () => {
      await expect(
        tools.generate.generate({ policy_file: join(dir, 'missing.yaml'), framework: 'hapi' })
      ).rejects.toThrow('Unsupported framework: hapi. Supported frameworks: express, fastify');
    });
  });

  describe('policy_evaluate', () => {
    it('keeps usage across calls for the same policy file', async () => {
      const file = await policyFile('policy.yaml', POLICY);
      const input = { policy_file: file, agent_id: 'agent-7', commit: true };

      expect(await tools.evaluate.evaluate(input)).toEqual({
        decision: { allowed: true, reason: 'allowed' },
        committed: true,
      });
      await tools.evaluate.evaluate(input);
      now += 1000;

      expect(await tools.evaluate.evaluate(input)).toEqual({
        decision: { allowed: false, reason: 'rate limited', rule_id: 'rate_limit-1', retry_after: 59 },
        committed: false,
      });
    });

    it('does not commit unless asked', async () => {
      const file = await policyFile('policy.yaml', POLICY);

      for (let i = 0; i < 3; i++) {
        const result = await tools.evaluate.evaluate({ policy_file: file, agent_id: 'agent-7' });
        expect(result).toEqual({ decision: { allowed: true, reason: 'allowed' }, committed: false });
      }
    });

    it('reports spending cap details', async () => {
      const file = await policyFile('policy.yaml', POLICY);

      const result = await tools.evaluate.evaluate({ policy_file: file, wallet_address: '0xabc', estimated_cost: 6 });

      expect(result.decision).toEqual({
        allowed: false,
        reason: 'spending cap exceeded',
        rule_id: 'daily',
        spending: { current: 0, limit: 5, remaining: 5, currency: 'USDC' },
      });
    });

    it('refuses invalid policies', async () => {
      const file = await policyFile(
        'conflict.yaml',
        'policies:\n  - type: allowlist\n    field: agent_id\n    values: ["x"]\n  - type: denylist\n    field: agent_id\n    values: ["x"]\n'
      );

      await expect(tools.evaluate.evaluate({ policy_file: file, agent_id: 'x' })).rejects.toThrow(
        'Policy validation failed: 1 errors, 0 warnings'
      );
    });
  });

  describe('callTool', () => {
    it('wraps results as JSON text', async () => {
      const file = await policyFile('policy.yaml', POLICY);

      const result = await callTool(tools, 'policy_evaluate', { policy_file: file, agent_id: 'agent-bad' });

      expect(result.isError).toBeUndefined();
      expect(JSON.parse(textOf(result))).toEqual({
        decision: { allowed: false, reason: 'denylisted', rule_id: 'denylist-0' },
        committed: false,
      });
    });

    it('turns failures into error results', async () => {
      const result = await callTool(tools, 'policy_teleport', {});

      expect(result.isError).toBe(true);
      expect(textOf(result)).toBe('Error: Unknown tool: policy_teleport');
    });
  });
});
