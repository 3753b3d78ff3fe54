/**
 * Validate a policy file
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { parsePolicyFile, summarizeValidation, validatePolicy } from '@tollgate/policy-core';
import type { ValidationIssue, ValidationResult } from '@tollgate/policy-core';
import { loadConfig, resolvePolicyFile } from '../config.js';

function printIssue(issue: ValidationIssue): void {
  const color = issue.severity === 'error' ? chalk.red : chalk.yellow;
  console.log(color(`${issue.severity}[${issue.code}] ${issue.message}`));
  for (const suggestion of issue.suggestions) {
    console.log(chalk.gray(`  hint: ${suggestion.description}: ${suggestion.action}`));
  }
}

export function printValidation(result: ValidationResult): void {
  result.errors.forEach(printIssue);
  result.warnings.forEach(printIssue);

  const summary = summarizeValidation(result);
  console.log(result.valid ? chalk.green(summary) : chalk.red(summary));
}

/**
 * Returns the process exit code: 0 when the policy is valid, 1 otherwise.
 */
export async function runValidate(file: string): Promise<number> {
  let result: ValidationResult;
  try {
    result = validatePolicy(await parsePolicyFile(file));
  } catch (error) {
    console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
    return 1;
  }

  printValidation(result);
  return result.valid ? 0 : 1;
}

export const validateCommand = new Command('validate')
  .description('Parse and validate a policy file')
  .argument('[file]', 'Policy file (YAML or JSON)')
  .action(async (file: string | undefined) => {
    try {
      process.exitCode = await runValidate(resolvePolicyFile(file, loadConfig()));
    } catch (error) {
      console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
      process.exitCode = 1;
    }
  });
