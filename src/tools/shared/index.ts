// ============================================================================
// Shared Helpers - Barrel Export
// ============================================================================

export { toolSuccess, toolError, renderOutcome } from './response.js';
export {
  compileArgsValidator,
  compileSchema,
  findSchemaProblems,
  validateArgs,
  optionalString,
  optionalNumber,
  optionalBoolean,
  optionalStringArray,
  requireString,
} from './validation.js';
export type { ArgsValidator } from './validation.js';
export { createCliClient, classifyCommandResult } from './cli.js';
export type { CliClient, CliProfile } from './cli.js';
