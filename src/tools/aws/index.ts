// ============================================================================
// AWS Domain Tool Definitions
// ============================================================================

import { ToolSpec } from '../types.js';
import { toolSuccess } from '../shared/index.js';
import {
  optionalBoolean,
  optionalString,
  optionalStringArray,
  requireString,
} from '../shared/validation.js';
import { CliClient } from '../shared/cli.js';
import { describeInstance, getSecurityGroups } from '../aws.js';

export const INSTANCE_ID_PATTERN = '^i-[a-f0-9]+$';

const regionProperty = {
  type: 'string',
  description: 'AWS region (e.g., us-east-1). If not specified, uses default AWS CLI region.',
} as const;

const includeRawProperty = {
  type: 'boolean',
  description: 'Include raw AWS API response in addition to simplified summary (default: false)',
  default: false,
} as const;

// ============================================================================
// describe_instance
// ============================================================================

export function describeInstanceTool(cli: CliClient): ToolSpec {
  return {
    definition: {
      name: 'describe_instance',
      description:
        'Get comprehensive metadata for an EC2 instance by instance ID. ' +
        'Returns instance details including IPs, DNS names, VPC info, security groups, ' +
        'tags, IAM role, state, and more. Use it to gather context about a vulnerable ' +
        'instance before onboarding it to security tools.',
      inputSchema: {
        type: 'object',
        properties: {
          instance_id: {
            type: 'string',
            description: 'EC2 instance ID (e.g., i-1234567890abcdef0)',
            pattern: INSTANCE_ID_PATTERN,
          },
          region: regionProperty,
          include_raw: includeRawProperty,
        },
        required: ['instance_id'],
      },
    },
    handler: async (args) => {
      const instanceId = requireString(args, 'instance_id');
      if (!instanceId.ok) return instanceId;

      const result = await describeInstance(cli, {
        instance_id: instanceId.value,
        region: optionalString(args, 'region'),
        include_raw: optionalBoolean(args, 'include_raw'),
      });
      return result.ok ? toolSuccess(result.value) : result;
    },
  };
}

// ============================================================================
// get_security_groups
// ============================================================================

export function getSecurityGroupsTool(cli: CliClient): ToolSpec {
  return {
    definition: {
      name: 'get_security_groups',
      description:
        'Get detailed security group rules and configurations. Can fetch by security group IDs ' +
        'or automatically extract and fetch from an instance ID. Returns inbound/outbound rules ' +
        'with ports, protocols, and source/destination IPs, showing which services are exposed.',
      inputSchema: {
        type: 'object',
        properties: {
          instance_id: {
            type: 'string',
            description: 'EC2 instance ID to get security groups from (e.g., i-1234567890abcdef0)',
            pattern: INSTANCE_ID_PATTERN,
          },
          security_group_ids: {
            type: 'array',
            items: { type: 'string' },
            description: "List of security group IDs (e.g., ['sg-12345', 'sg-67890'])",
          },
          region: regionProperty,
          include_raw: includeRawProperty,
        },
      },
    },
    handler: async (args) => {
      const result = await getSecurityGroups(cli, {
        instance_id: optionalString(args, 'instance_id'),
        security_group_ids: optionalStringArray(args, 'security_group_ids'),
        region: optionalString(args, 'region'),
        include_raw: optionalBoolean(args, 'include_raw'),
      });
      return result.ok ? toolSuccess(result.value) : result;
    },
  };
}

export function createAwsTools(cli: CliClient): ToolSpec[] {
  return [describeInstanceTool(cli), getSecurityGroupsTool(cli)];
}
