// ============================================================================
// Server Startup Helpers
// ============================================================================
// Argument parsing and kernel construction for the stdio entrypoint.
// ============================================================================

import { getConfig, log } from './config.js';
import { createKernel, ToolKernel } from './kernel.js';
import type { CommandRunner } from './executor.js';
import { buildCatalog, CATALOG_NAMES, CatalogName, isCatalogName } from './tools/index.js';

export const SERVER_VERSION = '0.1.0';

export interface ServerArgs {
  catalog: CatalogName;
}

/**
 * Pick the catalog from `--catalog <name>`, `--catalog=<name>`, the first
 * positional argument, or CLOUDSEC_CATALOG, in that order. Defaults to aws.
 */
export function parseServerArgs(argv: string[], envCatalog?: string): ServerArgs {
  const args = argv.slice(2);
  let requested: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--catalog') {
      requested = args[i + 1];
      break;
    }
    if (arg.startsWith('--catalog=')) {
      requested = arg.slice('--catalog='.length);
      break;
    }
    if (!arg.startsWith('-') && requested === undefined) {
      requested = arg;
    }
  }

  const name = requested ?? envCatalog ?? 'aws';
  if (!isCatalogName(name)) {
    throw new Error(`Unknown catalog "${name}". Expected one of: ${CATALOG_NAMES.join(', ')}`);
  }
  return { catalog: name };
}

export function createServerKernel(catalog: CatalogName, runner?: CommandRunner): ToolKernel {
  const kernel = createKernel(buildCatalog(catalog, getConfig(), runner));

  kernel.on('result', (evt) => log(`${evt.tool} ok in ${evt.duration_ms}ms`));
  kernel.on('error', (evt) => log(`${evt.tool} ${evt.failure} in ${evt.duration_ms}ms`));

  return kernel;
}
