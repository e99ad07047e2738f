export interface CliConfig {
  /** Executable name or path handed to spawn */
  binary: string;
  timeoutMs: number;
}

export interface Config {
  env: string;
  /** Catalog requested through the environment, if any */
  catalog?: string;
  aws: CliConfig;
  lacework: CliConfig;
}

export const DEFAULT_AWS_TIMEOUT_MS = 30_000;
export const DEFAULT_LACEWORK_TIMEOUT_MS = 60_000;

function positiveInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

export function getConfig(): Config {
  return {
    env: process.env.CLOUDSEC_ENV || 'dev',
    catalog: process.env.CLOUDSEC_CATALOG || undefined,
    aws: {
      binary: process.env.CLOUDSEC_AWS_CLI || 'aws',
      timeoutMs: positiveInt(process.env.CLOUDSEC_AWS_TIMEOUT_MS, DEFAULT_AWS_TIMEOUT_MS),
    },
    lacework: {
      binary: process.env.CLOUDSEC_LACEWORK_CLI || 'lacework',
      timeoutMs: positiveInt(process.env.CLOUDSEC_LACEWORK_TIMEOUT_MS, DEFAULT_LACEWORK_TIMEOUT_MS),
    },
  };
}

// stdout carries the protocol, so everything goes to stderr
export function log(message: string, ...args: unknown[]): void {
  const config = getConfig();
  if (config.env === 'dev') {
    console.error(`[cloudsec-mcp] ${message}`, ...args);
  }
}
