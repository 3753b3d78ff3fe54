import { formatIssue, parsePolicyFile, summarizeValidation, validatePolicy } from '@tollgate/policy-core';
import type { ValidatedPolicy } from '@tollgate/policy-core';

/**
 * Parse and validate a policy file, throwing with every error when it is invalid.
 */
export async function loadValidatedPolicy(file: string): Promise<ValidatedPolicy> {
  const result = validatePolicy(await parsePolicyFile(file));
  if (!result.valid) {
    throw new Error([summarizeValidation(result), ...result.errors.map(formatIssue)].join('\n'));
  }
  return result.policy;
}
