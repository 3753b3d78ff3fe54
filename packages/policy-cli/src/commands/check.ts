/**
 * Evaluate one simulated request against a policy file
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { PolicyEnforcer, parsePolicyFile, toDiagnostic, validatePolicy } from '@tollgate/policy-core';
import type { RequestInput } from '@tollgate/policy-core';
import { loadConfig, resolvePolicyFile } from '../config.js';
import { printValidation } from './validate.js';

export interface CheckCommandOptions {
  agentId?: string;
  wallet?: string;
  ip?: string;
  cost?: number;
  /** Send the request this many times, committing each allowed one */
  repeat?: number;
}

export const EXIT_NOT_ALLOWED = 3;

function parseCost(value: string): number {
  const cost = Number(value);
  if (value.trim() === '' || !Number.isFinite(cost) || cost < 0) {
    throw new InvalidArgumentError('Must be a non-negative number.');
  }
  return cost;
}

function parseRepeat(value: string): number {
  const count = Number(value);
  if (!Number.isInteger(count) || count < 1) {
    throw new InvalidArgumentError('Must be a whole number of at least 1.');
  }
  return count;
}

/**
 * Prints one JSON diagnostic per attempt. Returns 0 when the last attempt was
 * allowed, 3 when it was not, 1 for an unusable policy.
 */
export async function runCheck(file: string, options: CheckCommandOptions): Promise<number> {
  let enforcer: PolicyEnforcer;
  try {
    const result = validatePolicy(await parsePolicyFile(file));
    if (!result.valid) {
      printValidation(result);
      return 1;
    }
    enforcer = new PolicyEnforcer({ policy: result.policy });
  } catch (error) {
    console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
    return 1;
  }

  const input: RequestInput = {
    agent_id: options.agentId,
    wallet_address: options.wallet,
    ip_address: options.ip,
    estimated_cost: options.cost,
  };

  let allowed = false;
  for (let attempt = 0; attempt < (options.repeat ?? 1); attempt++) {
    const check = enforcer.check(input);
    const diagnostic = toDiagnostic(check.decision);
    check.commit();
    allowed = diagnostic.allowed;
    console.log(JSON.stringify(diagnostic));
  }

  return allowed ? 0 : EXIT_NOT_ALLOWED;
}

export const checkCommand = new Command('check')
  .description('Evaluate a simulated request against a policy')
  .argument('[file]', 'Policy file (YAML or JSON)')
  .option('--agent-id <id>', 'Agent identifier')
  .option('--wallet <address>', 'Wallet address')
  .option('--ip <address>', 'Client IP address')
  .option('--cost <amount>', 'Estimated cost of the request', parseCost)
  .option('--repeat <count>', 'Number of identical requests to send', parseRepeat)
  .action(async (file: string | undefined, options: CheckCommandOptions) => {
    try {
      process.exitCode = await runCheck(resolvePolicyFile(file, loadConfig()), options);
    } catch (error) {
      console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
      process.exitCode = 1;
    }
  });
