import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { extractEmbeddedRules } from '@tollgate/policy-core';
import { runValidate } from './validate.js';
import { runGenerate } from './generate.js';
import { runCheck, EXIT_NOT_ALLOWED } from './check.js';

const VALID_POLICY = `version: "1.0"
policies:
  - type: denylist
    field: agent_id
    values: ["agent-bad"]
  - type: rate_limit
    id: burst
    max_requests: 2
    window_seconds: 60
`;

const CONFLICTING_POLICY = `policies:
  - type: allowlist
    field: agent_id
    values: ["agent-1"]
  - type: denylist
    field: agent_id
    values: ["agent-1"]
`;

describe('policy commands', () => {
  let dir: string;
  let logs: string[];
  let errors: string[];

  async function policyFile(name: string, content: string): Promise<string> {
    const path = join(dir, name);
    await writeFile(path, content, 'utf-8');
    return path;
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tollgate-cli-'));
    logs = [];
    errors = [];
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      logs.push(args.map(String).join(' '));
    });
    vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
      errors.push(args.map(String).join(' '));
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  describe('runValidate', () => {
    it('returns 0 for a valid policy', async () => {
      const code = await runValidate(await policyFile('policy.yaml', VALID_POLICY));

      expect(code).toBe(0);
      expect(logs.some((line) => line.includes('Policy validation passed successfully'))).toBe(true);
    });

    it('returns 1 and prints the conflict', async () => {
      const code = await runValidate(await policyFile('policy.yaml', CONFLICTING_POLICY));

      expect(code).toBe(1);
      expect(logs.some((line) => line.includes('error[CONFLICT]'))).toBe(true);
      expect(logs.some((line) => line.includes('Policy validation failed: 1 errors, 0 warnings'))).toBe(true);
    });

    it('returns 1 for a parse error', async () => {
      const code = await runValidate(await policyFile('policy.yaml', 'policies:\n  - type: teleport\n'));

      expect(code).toBe(1);
      expect(errors).toHaveLength(1);
      expect(errors[0]).toContain('Unknown rule type string "teleport" at policies[0]');
    });

    it('returns 1 for a missing file', async () => {
      const code = await runValidate(join(dir, 'missing.yaml'));

      expect(code).toBe(1);
      expect(errors).toHaveLength(1);
    });
  });

  describe('runGenerate', () => {
    it('writes middleware to the output file', async () => {
      const output = join(dir, 'middleware.js');
      const code = await runGenerate(await policyFile('policy.yaml', VALID_POLICY), {
        framework: 'express',
        output,
      });

      expect(code).toBe(0);
      const source = await readFile(output, 'utf-8');
      expect(source).toContain('createPolicyMiddleware');
      expect(extractEmbeddedRules(source).map((entry) => entry.id)).toEqual(['denylist-0', 'burst']);
    });

    it('prints to stdout without an output file', async () => {
      const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

      const code = await runGenerate(await policyFile('policy.yaml', VALID_POLICY), { framework: 'fastify' });

      expect(code).toBe(0);
      const printed = write.mock.calls.map((call) => String(call[0]));
      expect(printed.some((chunk) => chunk.includes('Generated by tollgate from policy.yaml'))).toBe(true);
    });

    it('returns 2 for an unsupported framework before reading the policy', async () => {
      const code = await runGenerate(join(dir, 'missing.yaml'), { framework: 'koa' });

      expect(code).toBe(2);
      expect(errors[0]).toContain('Unsupported framework: koa. Supported frameworks: express, fastify');
    });

    it('returns 1 for an invalid policy and writes nothing', async () => {
      const output = join(dir, 'middleware.js');
      const code = await runGenerate(await policyFile('policy.yaml', CONFLICTING_POLICY), {
        framework: 'express',
        output,
      });

      expect(code).toBe(1);
      await expect(readFile(output, 'utf-8')).rejects.toThrow();
    });
  });

  describe('runCheck', () => {
    it('allows a request and prints the diagnostic', async () => {
      const code = await runCheck(await policyFile('policy.yaml', VALID_POLICY), { agentId: 'agent-7' });

      expect(code).toBe(0);
      expect(logs).toEqual(['{"allowed":true,"reason":"allowed"}']);
    });

    it('returns 3 for a denied request', async () => {
      const code = await runCheck(await policyFile('policy.yaml', VALID_POLICY), { agentId: 'agent-bad' });

      expect(code).toBe(EXIT_NOT_ALLOWED);
      expect(JSON.parse(logs[0])).toEqual({ allowed: false, reason: 'denylisted', rule_id: 'denylist-0' });
    });

    it('commits repeated requests until the rate limit applies', async () => {
      const code = await runCheck(await policyFile('policy.yaml', VALID_POLICY), { agentId: 'agent-7', repeat: 3 });

      expect(code).toBe(EXIT_NOT_ALLOWED);
      expect(logs).toHaveLength(3);
      expect(JSON.parse(logs[0]).allowed).toBe(true);
      expect(JSON.parse(logs[1]).allowed).toBe(true);
      expect(JSON.parse(logs[2])).toMatchObject({ allowed: false, reason: 'rate limited', rule_id: 'burst' });
    });

    it('reads JSON policies', async () => {
      const file = await policyFile(
        'policy.json',
        JSON.stringify({
          policies: [{ type: 'spending_cap', max_amount: 1, currency: 'USDC', window_seconds: 3600 }],
        })
      );

      const code = await runCheck(file, { agentId: 'agent-7', cost: 2 });

      expect(code).toBe(EXIT_NOT_ALLOWED);
      expect(JSON.parse(logs[0])).toEqual({
        allowed: false,
        reason: 'spending cap exceeded',
        rule_id: 'spending_cap-0',
        spending: { current: 0, limit: 1, remaining: 1, currency: 'USDC' },
      });
    });

    it('returns 1 for an invalid policy', async () => {
      const code = await runCheck(await policyFile('policy.yaml', CONFLICTING_POLICY), { agentId: 'agent-1' });

      expect(code).toBe(1);
    });
  });
});
