import { SUPPORTED_FRAMEWORKS, isSupportedFramework } from '@tollgate/policy-core';
import type { Framework } from '@tollgate/policy-core';

export interface CliConfig {
  /** Policy file used when a command is given none */
  policyFile?: string;
  /** Default target of `tollgate generate` */
  framework: Framework;
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(): CliConfig {
  const policyFile = process.env.TOLLGATE_POLICY_FILE?.trim() || undefined;
  const framework = process.env.TOLLGATE_FRAMEWORK?.trim() || 'express';

  if (!isSupportedFramework(framework)) {
    throw new Error(
      `Invalid TOLLGATE_FRAMEWORK: ${framework}. Must be one of ${SUPPORTED_FRAMEWORKS.join(', ')}`
    );
  }

  return {
    policyFile,
    framework,
  };
}

/**
 * Command argument first, then TOLLGATE_POLICY_FILE
 */
export function resolvePolicyFile(file: string | undefined, config: CliConfig): string {
  const resolved = file ?? config.policyFile;
  if (!resolved) {
    throw new Error('No policy file given. Pass one as an argument or set TOLLGATE_POLICY_FILE');
  }
  return resolved;
}
