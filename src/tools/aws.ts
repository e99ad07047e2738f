// ============================================================================
// AWS Domain
// ============================================================================
// EC2 instance and security-group lookups through the AWS CLI, and the
// normalizers that flatten describe-instances / describe-security-groups.
// ============================================================================

import { CliConfig, log } from '../config.js';
import { err, failures, ok, Result, ToolFailure } from '../errors.js';
import { CommandRunner } from '../executor.js';
import { CliClient, CliProfile, createCliClient } from './shared/cli.js';
import {
  asRecord,
  JsonRecord,
  numberOrNull,
  pluckStrings,
  recordList,
  stringOrNull,
} from './shared/fields.js';

// ============================================================================
// Types
// ============================================================================

export type TagMap = Record<string, string | null>;

export interface InstanceSummary {
  instance_id: string | null;
  instance_type: string | null;
  state: string | null;
  availability_zone: string | null;
  platform: string;
  public_ip: string | null;
  private_ip: string | null;
  public_dns: string | null;
  private_dns: string | null;
  vpc_id: string | null;
  subnet_id: string | null;
  security_group_ids: string[];
  iam_instance_profile: string | null;
  tags: TagMap;
  launch_time: string | null;
  architecture: string | null;
  virtualization_type: string | null;
}

interface RuleCommon {
  protocol: string;
  /** null on both bounds means every port */
  from_port: number | null;
  to_port: number | null;
  ip_ranges: string[];
  ipv6_ranges: string[];
  description: string | null;
}

export type InboundRule = RuleCommon & { source_security_groups: string[] };
export type OutboundRule = RuleCommon & { destination_security_groups: string[] };

export interface SecurityGroupSummary {
  group_id: string | null;
  group_name: string | null;
  description: string | null;
  vpc_id: string | null;
  inbound_rules: InboundRule[];
  outbound_rules: OutboundRule[];
  tags: TagMap;
}

export interface DescribeInstanceInput {
  instance_id: string;
  region?: string;
  include_raw?: boolean;
}

export interface DescribeInstanceOutput {
  instance_id: string;
  summary: InstanceSummary;
  raw?: unknown;
}

export interface GetSecurityGroupsInput {
  instance_id?: string;
  security_group_ids?: string[];
  region?: string;
  include_raw?: boolean;
}

export interface GetSecurityGroupsOutput {
  security_group_count: number;
  security_groups: SecurityGroupSummary[];
  raw?: unknown;
  instance_id?: string;
}

export type GroupResolution =
  | { source: 'explicit'; groupIds: string[] }
  | { source: 'instance'; instanceId: string; groupIds: string[] };

export type SecurityGroupPipeline =
  | { stage: 'resolution_failed'; error: ToolFailure }
  | { stage: 'fetch_failed'; resolution: GroupResolution; error: ToolFailure }
  | {
      stage: 'complete';
      resolution: GroupResolution;
      raw: unknown;
      groups: SecurityGroupSummary[];
    };

// ============================================================================
// CLI
// ============================================================================

export function awsProfile(config: CliConfig): CliProfile {
  return {
    label: 'AWS CLI',
    binary: config.binary,
    outputFlag: ['--output', 'json'],
    timeoutMs: config.timeoutMs,
    installHint: 'Please install it: https://aws.amazon.com/cli/',
  };
}

export function createAwsCli(config: CliConfig, runner?: CommandRunner): CliClient {
  return createCliClient(awsProfile(config), runner);
}

export function buildAwsArgs(args: readonly string[], region?: string): string[] {
  return region ? [...args, '--region', region] : [...args];
}

// ============================================================================
// Normalizers
// ============================================================================

/**
 * Fold AWS `[{Key, Value}]` tag lists into a map. Later duplicates win.
 */
export function foldTags(value: unknown): TagMap {
  const pairs: Array<[string, string | null]> = [];
  for (const entry of recordList(value)) {
    const key = entry.Key;
    if (typeof key !== 'string') continue;
    pairs.push([key, stringOrNull(entry.Value)]);
  }
  // fromEntries defines own properties, so "__proto__" is kept as a tag
  return Object.fromEntries(pairs);
}

function firstInstance(raw: unknown): JsonRecord | undefined {
  const reservation = recordList(asRecord(raw)?.Reservations)[0];
  return recordList(reservation?.Instances)[0];
}

export function extractInstanceSummary(raw: unknown): Result<InstanceSummary> {
  const instance = firstInstance(raw);
  if (!instance) {
    return err(failures.extraction('No instance data found'));
  }

  return ok({
    instance_id: stringOrNull(instance.InstanceId),
    instance_type: stringOrNull(instance.InstanceType),
    state: stringOrNull(asRecord(instance.State)?.Name),
    availability_zone: stringOrNull(asRecord(instance.Placement)?.AvailabilityZone),
    // AWS only sets Platform for Windows
    platform: stringOrNull(instance.Platform) ?? 'linux',

    public_ip: stringOrNull(instance.PublicIpAddress),
    private_ip: stringOrNull(instance.PrivateIpAddress),
    public_dns: stringOrNull(instance.PublicDnsName),
    private_dns: stringOrNull(instance.PrivateDnsName),

    vpc_id: stringOrNull(instance.VpcId),
    subnet_id: stringOrNull(instance.SubnetId),

    security_group_ids: pluckStrings(recordList(instance.SecurityGroups), 'GroupId'),
    iam_instance_profile: stringOrNull(asRecord(instance.IamInstanceProfile)?.Arn),

    tags: foldTags(instance.Tags),
    launch_time: stringOrNull(instance.LaunchTime),
    architecture: stringOrNull(instance.Architecture),
    virtualization_type: stringOrNull(instance.VirtualizationType),
  });
}

function normalizeProtocol(value: unknown): string {
  const protocol = stringOrNull(value);
  return protocol === null || protocol === '-1' ? 'all' : protocol;
}

function normalizeRule(rule: JsonRecord): RuleCommon & { peers: string[] } {
  const ipRanges = recordList(rule.IpRanges);
  return {
    protocol: normalizeProtocol(rule.IpProtocol),
    from_port: numberOrNull(rule.FromPort),
    to_port: numberOrNull(rule.ToPort),
    ip_ranges: pluckStrings(ipRanges, 'CidrIp'),
    ipv6_ranges: pluckStrings(recordList(rule.Ipv6Ranges), 'CidrIpv6'),
    peers: pluckStrings(recordList(rule.UserIdGroupPairs), 'GroupId'),
    description: stringOrNull(ipRanges[0]?.Description),
  };
}

function inboundRule(rule: JsonRecord): InboundRule {
  const { peers, ...common } = normalizeRule(rule);
  return { ...common, source_security_groups: peers };
}

function outboundRule(rule: JsonRecord): OutboundRule {
  const { peers, ...common } = normalizeRule(rule);
  return { ...common, destination_security_groups: peers };
}

export function extractSecurityGroupSummary(raw: unknown): SecurityGroupSummary[] {
  return recordList(asRecord(raw)?.SecurityGroups).map((group) => ({
    group_id: stringOrNull(group.GroupId),
    group_name: stringOrNull(group.GroupName),
    description: stringOrNull(group.Description),
    vpc_id: stringOrNull(group.VpcId),
    inbound_rules: recordList(group.IpPermissions).map(inboundRule),
    outbound_rules: recordList(group.IpPermissionsEgress).map(outboundRule),
    tags: foldTags(group.Tags),
  }));
}

// ============================================================================
// Operations
// ============================================================================

function describeInstancesArgs(instanceId: string, region?: string): string[] {
  return buildAwsArgs(['ec2', 'describe-instances', '--instance-ids', instanceId], region);
}

export async function describeInstance(
  cli: CliClient,
  input: DescribeInstanceInput
): Promise<Result<DescribeInstanceOutput>> {
  const raw = await cli.run(describeInstancesArgs(input.instance_id, input.region));
  if (!raw.ok) return raw;

  const summary = extractInstanceSummary(raw.value);
  if (!summary.ok) return summary;

  const output: DescribeInstanceOutput = {
    instance_id: input.instance_id,
    summary: summary.value,
  };
  if (input.include_raw) {
    output.raw = raw.value;
  }
  return ok(output);
}

/**
 * Step one: settle on the group ids. An explicit non-empty list wins;
 * otherwise the instance is looked up and its attached groups are used.
 */
export async function resolveSecurityGroupIds(
  cli: CliClient,
  input: GetSecurityGroupsInput
): Promise<Result<GroupResolution>> {
  const explicit = input.security_group_ids ?? [];
  if (explicit.length > 0) {
    return ok({ source: 'explicit', groupIds: explicit });
  }

  const instanceId = input.instance_id;
  if (!instanceId) {
    return err(failures.missingArgument(
      'instance_id',
      'Must provide either instance_id or security_group_ids'
    ));
  }

  const raw = await cli.run(describeInstancesArgs(instanceId, input.region));
  if (!raw.ok) return raw;

  const instance = firstInstance(raw.value);
  if (!instance) {
    return err(failures.resolution(`Instance ${instanceId} not found`));
  }

  const groupIds = pluckStrings(recordList(instance.SecurityGroups), 'GroupId');
  if (groupIds.length === 0) {
    return err(failures.resolution(`No security groups attached to instance ${instanceId}`));
  }
  return ok({ source: 'instance', instanceId, groupIds });
}

export async function runSecurityGroupPipeline(
  cli: CliClient,
  input: GetSecurityGroupsInput
): Promise<SecurityGroupPipeline> {
  const resolution = await resolveSecurityGroupIds(cli, input);
  if (!resolution.ok) {
    return { stage: 'resolution_failed', error: resolution.error };
  }

  const raw = await cli.run(buildAwsArgs(
    ['ec2', 'describe-security-groups', '--group-ids', ...resolution.value.groupIds],
    input.region
  ));
  if (!raw.ok) {
    log(`aws: resolved ${resolution.value.groupIds.join(', ')} but describe-security-groups failed`);
    return { stage: 'fetch_failed', resolution: resolution.value, error: raw.error };
  }

  return {
    stage: 'complete',
    resolution: resolution.value,
    raw: raw.value,
    groups: extractSecurityGroupSummary(raw.value),
  };
}

export async function getSecurityGroups(
  cli: CliClient,
  input: GetSecurityGroupsInput
): Promise<Result<GetSecurityGroupsOutput>> {
  const pipeline = await runSecurityGroupPipeline(cli, input);
  if (pipeline.stage !== 'complete') {
    return err(pipeline.error);
  }

  const output: GetSecurityGroupsOutput = {
    security_group_count: pipeline.groups.length,
    security_groups: pipeline.groups,
  };
  if (input.include_raw) {
    output.raw = pipeline.raw;
  }
  if (input.instance_id) {
    output.instance_id = input.instance_id;
  }
  return ok(output);
}
