#!/usr/bin/env node

// Usage: cloudsec-query-instance <instance-id>
// Starts the aws server as a child process with this shell's environment,
// so AWS credentials pass straight through.

import { fileURLToPath } from 'url';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import { SERVER_VERSION } from '../serverArgs.js';
import { queryInstance } from './queryInstance.js';

function inheritedEnv(): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) env[key] = value;
  }
  return env;
}

async function main(): Promise<number> {
  const instanceId = process.argv[2];
  if (!instanceId) {
    console.error('Usage: cloudsec-query-instance <instance-id>');
    return 1;
  }

  const transport = new StdioClientTransport({
    command: process.execPath,
    args: [fileURLToPath(new URL('../server.js', import.meta.url)), '--catalog', 'aws'],
    env: inheritedEnv(),
  });
  const client = new Client({ name: 'cloudsec-query-instance', version: SERVER_VERSION });

  await client.connect(transport);
  try {
    return await queryInstance(client, instanceId, (line) => console.log(line));
  } finally {
    await client.close();
  }
}

main().then(
  (code) => process.exit(code),
  (error: unknown) => {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
);
