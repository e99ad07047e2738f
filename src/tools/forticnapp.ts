// ============================================================================
// FortiCNAPP Domain
// ============================================================================
// Host vulnerability queries through the Lacework CLI. list-cves and
// list-hosts both answer with `{ data: [...] }`.
// ============================================================================

import { CliConfig } from '../config.js';
import { err, failures, ok, Result } from '../errors.js';
import { CommandRunner } from '../executor.js';
import { CliClient, CliProfile, createCliClient } from './shared/cli.js';
import { asRecord, JsonRecord, numberOrNull, scoreOrNull, stringOrNull } from './shared/fields.js';

// ============================================================================
// Types
// ============================================================================

export const SEVERITIES = ['Critical', 'High', 'Medium', 'Low'] as const;
export type Severity = (typeof SEVERITIES)[number];

export const DEFAULT_CRITICAL_THRESHOLD = 9.0;

export interface CveSummary {
  cve_id: string | null;
  severity: string | null;
  cvss_score: number | null;
  package_name: string | null;
  package_version: string | null;
  fixed_version: string | null;
  host_count: number | null;
}

export interface HostSummary {
  mid: string | null;
  hostname: string | null;
  external_ip: string | null;
  internal_ip: string | null;
  os: string | null;
  provider: string | null;
  instance_id: string | null;
  status: string | null;
}

export interface TimeRange {
  start_time?: string;
  end_time?: string;
}

export interface ListCvesInput extends TimeRange {
  severity_filter?: string;
  min_cvss_score?: number;
}

export interface ListCvesOutput {
  total_cves: number;
  filters_applied: ListCvesInput;
  cves: CveSummary[];
}

export interface ListHostsByCveInput extends TimeRange {
  cve_id: string;
}

export interface ListHostsByCveOutput {
  cve_id: string;
  affected_hosts_count: number;
  hosts: HostSummary[];
}

export interface GetCriticalCvesInput {
  min_cvss_score?: number;
  start_time?: string;
}

export interface GetCriticalCvesOutput {
  threshold: number;
  critical_cves_count: number;
  total_cves_scanned: number;
  critical_cves: CveSummary[];
}

// ============================================================================
// CLI
// ============================================================================

export function laceworkProfile(config: CliConfig): CliProfile {
  return {
    label: 'Lacework',
    binary: config.binary,
    outputFlag: ['--json'],
    timeoutMs: config.timeoutMs,
    installHint: 'Please install it: https://docs.lacework.net/cli',
  };
}

export function createLaceworkCli(config: CliConfig, runner?: CommandRunner): CliClient {
  return createCliClient(laceworkProfile(config), runner);
}

export function buildTimeRangeArgs(range: TimeRange): string[] {
  const args: string[] = [];
  if (range.start_time) args.push('--start', range.start_time);
  if (range.end_time) args.push('--end', range.end_time);
  return args;
}

// ============================================================================
// Normalizers
// ============================================================================

function dataRecords(raw: unknown, what: string): Result<JsonRecord[]> {
  const data = asRecord(raw)?.data;
  if (data === undefined || data === null) {
    return ok([]);
  }
  if (!Array.isArray(data)) {
    return err(failures.extraction(`Unexpected ${what} response: "data" is not a list`));
  }
  const records: JsonRecord[] = [];
  for (const item of data) {
    const record = asRecord(item);
    if (record) records.push(record);
  }
  return ok(records);
}

export function toCveSummary(record: JsonRecord): CveSummary {
  return {
    cve_id: stringOrNull(record.cve_id),
    severity: stringOrNull(record.severity),
    cvss_score: scoreOrNull(record.cvss_score),
    package_name: stringOrNull(record.package_name),
    package_version: stringOrNull(record.package_version),
    fixed_version: stringOrNull(record.fixed_version),
    host_count: numberOrNull(record.host_count),
  };
}

export function toHostSummary(record: JsonRecord): HostSummary {
  return {
    mid: stringOrNull(record.mid) ?? (typeof record.mid === 'number' ? String(record.mid) : null),
    hostname: stringOrNull(record.hostname),
    external_ip: stringOrNull(record.external_ip),
    internal_ip: stringOrNull(record.internal_ip),
    os: stringOrNull(record.os),
    provider: stringOrNull(record.provider),
    instance_id: stringOrNull(record.instance_id),
    status: stringOrNull(record.status),
  };
}

export function extractCves(raw: unknown): Result<CveSummary[]> {
  const records = dataRecords(raw, 'list-cves');
  if (!records.ok) return records;
  return ok(records.value.map(toCveSummary));
}

export function extractHosts(raw: unknown): Result<HostSummary[]> {
  const records = dataRecords(raw, 'list-hosts');
  if (!records.ok) return records;
  return ok(records.value.map(toHostSummary));
}

export function filterBySeverity(cves: CveSummary[], severity: string): CveSummary[] {
  const wanted = severity.toLowerCase();
  return cves.filter((cve) => (cve.severity ?? '').toLowerCase() === wanted);
}

export function filterByMinScore(cves: CveSummary[], minScore: number): CveSummary[] {
  return cves.filter((cve) => (cve.cvss_score ?? 0) >= minScore);
}

/** Highest score first; equal scores keep their input order */
export function sortByScoreDesc(cves: CveSummary[]): CveSummary[] {
  return [...cves].sort((a, b) => (b.cvss_score ?? 0) - (a.cvss_score ?? 0));
}

// ============================================================================
// Operations
// ============================================================================

export async function listCves(
  cli: CliClient,
  input: ListCvesInput
): Promise<Result<ListCvesOutput>> {
  const raw = await cli.run(['vulnerability', 'host', 'list-cves', ...buildTimeRangeArgs(input)]);
  if (!raw.ok) return raw;

  const extracted = extractCves(raw.value);
  if (!extracted.ok) return extracted;

  let cves = extracted.value;
  if (input.severity_filter) {
    cves = filterBySeverity(cves, input.severity_filter);
  }
  if (input.min_cvss_score !== undefined) {
    cves = filterByMinScore(cves, input.min_cvss_score);
  }

  const filters: ListCvesInput = {};
  if (input.severity_filter !== undefined) filters.severity_filter = input.severity_filter;
  if (input.min_cvss_score !== undefined) filters.min_cvss_score = input.min_cvss_score;
  if (input.start_time !== undefined) filters.start_time = input.start_time;
  if (input.end_time !== undefined) filters.end_time = input.end_time;

  return ok({
    total_cves: cves.length,
    filters_applied: filters,
    cves,
  });
}

export async function listHostsByCve(
  cli: CliClient,
  input: ListHostsByCveInput
): Promise<Result<ListHostsByCveOutput>> {
  const raw = await cli.run([
    'vulnerability', 'host', 'list-hosts', input.cve_id, ...buildTimeRangeArgs(input),
  ]);
  if (!raw.ok) return raw;

  const hosts = extractHosts(raw.value);
  if (!hosts.ok) return hosts;

  return ok({
    cve_id: input.cve_id,
    affected_hosts_count: hosts.value.length,
    hosts: hosts.value,
  });
}

export async function getCriticalCves(
  cli: CliClient,
  input: GetCriticalCvesInput
): Promise<Result<GetCriticalCvesOutput>> {
  const threshold = input.min_cvss_score ?? DEFAULT_CRITICAL_THRESHOLD;
  const raw = await cli.run([
    'vulnerability', 'host', 'list-cves', ...buildTimeRangeArgs({ start_time: input.start_time }),
  ]);
  if (!raw.ok) return raw;

  const all = extractCves(raw.value);
  if (!all.ok) return all;

  const critical = sortByScoreDesc(filterByMinScore(all.value, threshold));
  return ok({
    threshold,
    critical_cves_count: critical.length,
    total_cves_scanned: all.value.length,
    critical_cves: critical,
  });
}
