// ============================================================================
// FortiCNAPP Domain Tool Definitions
// ============================================================================

import { SchemaNode, ToolSpec } from '../types.js';
import { toolSuccess } from '../shared/index.js';
import { optionalNumber, optionalString, requireString } from '../shared/validation.js';
import { CliClient } from '../shared/cli.js';
import {
  DEFAULT_CRITICAL_THRESHOLD,
  getCriticalCves,
  listCves,
  listHostsByCve,
  SEVERITIES,
} from '../forticnapp.js';

export const CVE_ID_PATTERN = '^CVE-\\d{4}-\\d+$';

/**
 * "now", relative shorthand (-24h, -7d) with an optional snap unit (-1d@d),
 * or an ISO date or timestamp ("T" or a space between date and time)
 */
export const TIME_RANGE_PATTERN =
  '^(now|-\\d+[smhdwy](@[smhdwy])?|\\d{4}-\\d{2}-\\d{2}([T ]\\d{2}:\\d{2}(:\\d{2}(\\.\\d+)?)?(Z|[+-]\\d{2}:?\\d{2})?)?)$';

const TIME_FORMS =
  'Accepts now, -<n><s|m|h|d|w|y> with an optional @<unit> snap, or YYYY-MM-DD[Thh:mm[:ss]][Z|+hh:mm].';

function timeProperty(description: string): SchemaNode {
  return { type: 'string', description: `${description}. ${TIME_FORMS}`, pattern: TIME_RANGE_PATTERN };
}

function scoreProperty(description: string, defaultScore?: number): SchemaNode {
  const node: SchemaNode = { type: 'number', description, minimum: 0.0, maximum: 10.0 };
  if (defaultScore !== undefined) node.default = defaultScore;
  return node;
}

// ============================================================================
// list_cves
// ============================================================================

export function listCvesTool(cli: CliClient): ToolSpec {
  return {
    definition: {
      name: 'list_cves',
      description:
        'List all CVEs found in hosts in your environment. ' +
        'Returns CVE ID, severity, CVSS score, affected package, and host count. ' +
        'Optionally filter by severity level (Critical, High, Medium, Low) or CVSS threshold.',
      inputSchema: {
        type: 'object',
        properties: {
          severity_filter: {
            type: 'string',
            description: 'Filter by severity (Critical, High, Medium, Low)',
            enum: [...SEVERITIES],
          },
          min_cvss_score: scoreProperty('Minimum CVSS score (0.0-10.0)'),
          start_time: timeProperty('Start of time range (default: -24h)'),
          end_time: timeProperty('End of time range (default: now)'),
        },
      },
    },
    handler: async (args) => {
      const result = await listCves(cli, {
        severity_filter: optionalString(args, 'severity_filter'),
        min_cvss_score: optionalNumber(args, 'min_cvss_score'),
        start_time: optionalString(args, 'start_time'),
        end_time: optionalString(args, 'end_time'),
      });
      return result.ok ? toolSuccess(result.value) : result;
    },
  };
}

// ============================================================================
// list_hosts_by_cve
// ============================================================================

export function listHostsByCveTool(cli: CliClient): ToolSpec {
  return {
    definition: {
      name: 'list_hosts_by_cve',
      description:
        'List all hosts that contain a specific CVE ID. ' +
        'Returns machine ID, hostname, IP addresses, OS, cloud provider, instance ID, and status. ' +
        'Use it to find which instances need patching or remediation.',
      inputSchema: {
        type: 'object',
        properties: {
          cve_id: {
            type: 'string',
            description: 'CVE identifier (e.g., CVE-2024-1234)',
            pattern: CVE_ID_PATTERN,
          },
          start_time: timeProperty('Start of time range (default: -24h)'),
          end_time: timeProperty('End of time range (default: now)'),
        },
        required: ['cve_id'],
      },
    },
    handler: async (args) => {
      const cveId = requireString(args, 'cve_id');
      if (!cveId.ok) return cveId;

      const result = await listHostsByCve(cli, {
        cve_id: cveId.value,
        start_time: optionalString(args, 'start_time'),
        end_time: optionalString(args, 'end_time'),
      });
      return result.ok ? toolSuccess(result.value) : result;
    },
  };
}

// ============================================================================
// get_critical_cves
// ============================================================================

export function getCriticalCvesTool(cli: CliClient): ToolSpec {
  return {
    definition: {
      name: 'get_critical_cves',
      description:
        'Get high-priority CVEs that need immediate attention. ' +
        'Returns CVEs with CVSS score >= 9.0 (Critical) or as specified, highest first. ' +
        'Includes host count and severity details for prioritization.',
      inputSchema: {
        type: 'object',
        properties: {
          min_cvss_score: scoreProperty(
            'Minimum CVSS score threshold (default: 9.0 for Critical)',
            DEFAULT_CRITICAL_THRESHOLD
          ),
          start_time: timeProperty('Start of time range (default: -24h)'),
        },
      },
    },
    handler: async (args) => {
      const result = await getCriticalCves(cli, {
        min_cvss_score: optionalNumber(args, 'min_cvss_score'),
        start_time: optionalString(args, 'start_time'),
      });
      return result.ok ? toolSuccess(result.value) : result;
    },
  };
}

export function createForticnappTools(cli: CliClient): ToolSpec[] {
  return [listCvesTool(cli), listHostsByCveTool(cli), getCriticalCvesTool(cli)];
}
