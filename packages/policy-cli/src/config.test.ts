import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { loadConfig, resolvePolicyFile } from './config.js';

describe('loadConfig', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.TOLLGATE_POLICY_FILE;
    delete process.env.TOLLGATE_FRAMEWORK;
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it('returns default values when no env vars set', () => {
    const config = loadConfig();

    expect(config.policyFile).toBeUndefined();
    expect(config.framework).toBe('express');
  });

  it('respects TOLLGATE_POLICY_FILE env var', () => {
    process.env.TOLLGATE_POLICY_FILE = 'policies/api.yaml';
    const config = loadConfig();
    expect(config.policyFile).toBe('policies/api.yaml');
  });

  it('treats a blank TOLLGATE_POLICY_FILE as unset', () => {
    process.env.TOLLGATE_POLICY_FILE = '  ';
    const config = loadConfig();
    expect(config.policyFile).toBeUndefined();
  });

  it('respects TOLLGATE_FRAMEWORK fastify', () => {
    process.env.TOLLGATE_FRAMEWORK = 'fastify';
    const config = loadConfig();
    expect(config.framework).toBe('fastify');
  });

  it('throws on invalid TOLLGATE_FRAMEWORK', () => {
    process.env.TOLLGATE_FRAMEWORK = 'koa';
    expect(() => loadConfig()).toThrow('Invalid TOLLGATE_FRAMEWORK: koa. Must be one of express, fastify');
  });
});

describe('resolvePolicyFile', () => {
  it('prefers the command argument', () => {
    expect(resolvePolicyFile('cli.yaml', { policyFile: 'env.yaml', framework: 'express' })).toBe('cli.yaml');
  });

  it('falls back to the configured file', () => {
    expect(resolvePolicyFile(undefined, { policyFile: 'env.yaml', framework: 'express' })).toBe('env.yaml');
  });

  it('throws when neither is set', () => {
    expect(() => resolvePolicyFile(undefined, { framework: 'express' })).toThrow(
      'No policy file given. Pass one as an argument or set TOLLGATE_POLICY_FILE'
    );
  });
});
