/**
 * Generate framework middleware from a policy file
 */

import { writeFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import {
  SUPPORTED_FRAMEWORKS,
  generateMiddleware,
  isSupportedFramework,
  parsePolicyFile,
  validatePolicy,
} from '@tollgate/policy-core';
import { loadConfig, resolvePolicyFile } from '../config.js';
import { printValidation } from './validate.js';

export interface GenerateCommandOptions {
  framework: string;
  /** Write here instead of stdout */
  output?: string;
}

/**
 * Returns the process exit code: 0 on success, 1 for an unusable policy,
 * 2 for an unsupported framework.
 */
export async function runGenerate(file: string, options: GenerateCommandOptions): Promise<number> {
  if (!isSupportedFramework(options.framework)) {
    console.error(
      chalk.red(
        `Error: Unsupported framework: ${options.framework}. Supported frameworks: ${SUPPORTED_FRAMEWORKS.join(', ')}`
      )
    );
    return 2;
  }

  const spinner = ora({ text: `Generating ${options.framework} middleware...`, stream: process.stderr }).start();

  try {
    const result = validatePolicy(await parsePolicyFile(file));
    if (!result.valid) {
      spinner.fail('Policy is invalid');
      printValidation(result);
      return 1;
    }

    const source = generateMiddleware(result.policy, options.framework, { sourceName: basename(file) });

    if (options.output) {
      await writeFile(options.output, source, 'utf-8');
      spinner.succeed(`Wrote ${options.framework} middleware to ${options.output}`);
    } else {
      spinner.stop();
      process.stdout.write(source);
    }
    return 0;
  } catch (error) {
    spinner.fail('Failed to generate middleware');
    console.error(chalk.red(error instanceof Error ? error.message : String(error)));
    return 1;
  }
}

export const generateCommand = new Command('generate')
  .description('Generate Express or Fastify middleware that enforces a policy')
  .argument('[file]', 'Policy file (YAML or JSON)')
  .option('-f, --framework <name>', `Target framework (${SUPPORTED_FRAMEWORKS.join(', ')})`)
  .option('-o, --output <path>', 'Output file (default: stdout)')
  .action(async (file: string | undefined, options: { framework?: string; output?: string }) => {
    try {
      const config = loadConfig();
      process.exitCode = await runGenerate(resolvePolicyFile(file, config), {
        framework: options.framework ?? config.framework,
        output: options.output,
      });
    } catch (error) {
      console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
      process.exitCode = 1;
    }
  });
