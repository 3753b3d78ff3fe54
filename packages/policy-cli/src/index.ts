export { loadConfig, resolvePolicyFile } from './config.js';
export type { CliConfig } from './config.js';
export { printValidation, runValidate, validateCommand } from './commands/validate.js';
export { generateCommand, runGenerate } from './commands/generate.js';
export type { GenerateCommandOptions } from './commands/generate.js';
export { EXIT_NOT_ALLOWED, checkCommand, runCheck } from './commands/check.js';
export type { CheckCommandOptions } from './commands/check.js';
