// ============================================================================
// Tool Catalogs
// ============================================================================
// Each server instance serves exactly one catalog. Catalogs are built once at
// startup from the configuration and an optional command runner.
// ============================================================================

import type { Config } from '../config.js';
import type { CommandRunner } from '../executor.js';
import { ToolSpec } from './types.js';
import { createAwsTools } from './aws/index.js';
import { createForticnappTools } from './forticnapp/index.js';
import { createAwsCli } from './aws.js';
import { createLaceworkCli } from './forticnapp.js';

export const CATALOG_NAMES = ['aws', 'forticnapp'] as const;
export type CatalogName = (typeof CATALOG_NAMES)[number];

export function isCatalogName(value: string): value is CatalogName {
  return CATALOG_NAMES.some((name) => name === value);
}

export function buildCatalog(
  name: CatalogName,
  config: Config,
  runner?: CommandRunner
): ToolSpec[] {
  switch (name) {
    case 'aws':
      return createAwsTools(createAwsCli(config.aws, runner));
    case 'forticnapp':
      return createForticnappTools(createLaceworkCli(config.lacework, runner));
  }
}

export function getCatalogToolNames(tools: ToolSpec[]): string[] {
  return tools.map(t => t.definition.name);
}
