// ============================================================================
// Instance Query
// ============================================================================
// Drives the aws catalog the way an agent would: describe the instance, then
// fetch its security groups if any are attached.
// ============================================================================

import type { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { ERROR_PREFIX } from '../errors.js';
import { asRecord, recordList } from '../tools/shared/fields.js';

export type LineWriter = (line: string) => void;

const RULE = '-'.repeat(60);

/** Concatenated text blocks of a tools/call result */
export function textOf(result: unknown): string {
  return recordList(asRecord(result)?.content)
    .filter((block) => block.type === 'text' && typeof block.text === 'string')
    .map((block) => String(block.text))
    .join('\n');
}

export async function callToolText(
  client: Client,
  name: string,
  args: Record<string, unknown>
): Promise<string> {
  return textOf(await client.callTool({ name, arguments: args }));
}

function attachedGroupIds(described: unknown): string[] {
  const ids = asRecord(asRecord(described)?.summary)?.security_group_ids;
  return Array.isArray(ids) ? ids.filter((id): id is string => typeof id === 'string') : [];
}

/**
 * Returns the process exit code: 0 on success, 1 when either call fails.
 */
export async function queryInstance(
  client: Client,
  instanceId: string,
  write: LineWriter
): Promise<number> {
  write(`Querying instance: ${instanceId}`);
  write('='.repeat(60));

  write('1. Getting instance metadata...');
  write(RULE);
  const described = await callToolText(client, 'describe_instance', { instance_id: instanceId });
  if (described.startsWith(ERROR_PREFIX)) {
    write(described);
    return 1;
  }

  const instance: unknown = JSON.parse(described);
  write(JSON.stringify(instance, null, 2));

  if (attachedGroupIds(instance).length === 0) {
    write('No security groups attached.');
    return 0;
  }

  write('2. Getting security group details...');
  write(RULE);
  const groups = await callToolText(client, 'get_security_groups', { instance_id: instanceId });
  if (groups.startsWith(ERROR_PREFIX)) {
    write(groups);
    return 1;
  }
  write(JSON.stringify(JSON.parse(groups), null, 2));
  return 0;
}
