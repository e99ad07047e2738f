import { describe, it, expect } from 'vitest';
import {
  createLaceworkCli,
  extractCves,
  getCriticalCves,
  listCves,
  listHostsByCve,
  sortByScoreDesc,
  toCveSummary,
} from '../../src/tools/forticnapp.js';
import { createKernel } from '../../src/kernel.js';
import { createForticnappTools } from '../../src/tools/forticnapp/index.js';
import { createFakeRunner, jsonResult, timedOutResult } from '../utils/fake-runner.js';
import { cveRecord, fiveCves, hostsResponse, scoredCves } from '../fixtures/lacework.js';

const cliConfig = { binary: 'lacework', timeoutMs: 60_000 };

describe('forticnapp normalizers', () => {
  it('should map a CVE record to a summary', () => {
    expect(toCveSummary(cveRecord('CVE-2024-0001', 'Critical', 9.8))).toEqual({
      cve_id: 'CVE-2024-0001',
      severity: 'Critical',
      cvss_score: 9.8,
      package_name: 'openssl',
      package_version: '1.1.1k',
      fixed_version: null,
      host_count: 2,
    });
  });

  it('should read numeric strings as scores', () => {
    expect(toCveSummary(cveRecord('CVE-2024-0009', 'High', '7.4')).cvss_score).toBe(7.4);
    expect(toCveSummary(cveRecord('CVE-2024-0009', 'High', 'n/a')).cvss_score).toBeNull();
  });

  it('should treat a missing data field as no records', () => {
    expect(extractCves({})).toEqual({ ok: true, value: [] });
  });

  it('should reject a data field that is not a list', () => {
    expect(extractCves({ data: { cve_id: 'CVE-2024-0001' } })).toEqual({
      ok: false,
      error: { kind: 'ExtractionError', message: 'Unexpected list-cves response: "data" is not a list' },
    });
  });

  it('should sort by score descending and keep ties in input order', () => {
    const cves = [
      toCveSummary(cveRecord('CVE-2024-0001', 'High', 7.0)),
      toCveSummary(cveRecord('CVE-2024-0002', 'Critical', 9.5)),
      toCveSummary(cveRecord('CVE-2024-0003', 'High', 7.0)),
    ];

    expect(sortByScoreDesc(cves).map((c) => c.cve_id)).toEqual([
      'CVE-2024-0002', 'CVE-2024-0001', 'CVE-2024-0003',
    ]);
  });
});

describe('listCves', () => {
  it('should filter by severity case-insensitively and keep source order', async () => {
    const fake = createFakeRunner(jsonResult(fiveCves));
    const cli = createLaceworkCli(cliConfig, fake.runner);

    const result = await listCves(cli, { severity_filter: 'critical' });

    expect(fake.calls[0].argv).toEqual(['lacework', 'vulnerability', 'host', 'list-cves', '--json']);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.total_cves).toBe(2);
    expect(result.value.cves.map((c) => c.cve_id)).toEqual(['CVE-2024-0001', 'CVE-2024-0003']);
    expect(result.value.filters_applied).toEqual({ severity_filter: 'critical' });
  });

  it('should apply a minimum score and pass the time range', async () => {
    const fake = createFakeRunner(jsonResult(fiveCves));
    const cli = createLaceworkCli(cliConfig, fake.runner);

    const result = await listCves(cli, { min_cvss_score: 5.3, start_time: '-7d', end_time: 'now' });

    expect(fake.calls[0].argv).toEqual([
      'lacework', 'vulnerability', 'host', 'list-cves', '--start', '-7d', '--end', 'now', '--json',
    ]);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.cves.map((c) => c.cve_id)).toEqual([
      'CVE-2024-0001', 'CVE-2024-0002', 'CVE-2024-0003', 'CVE-2024-0005',
    ]);
    expect(result.value.filters_applied).toEqual({ min_cvss_score: 5.3, start_time: '-7d', end_time: 'now' });
  });

  it('should return everything when no filter is given', async () => {
    const fake = createFakeRunner(jsonResult(fiveCves));
    const cli = createLaceworkCli(cliConfig, fake.runner);

    const result = await listCves(cli, {});

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.total_cves).toBe(5);
    expect(result.value.filters_applied).toEqual({});
  });

  it('should surface a timeout as CommandTimedOut', async () => {
    const fake = createFakeRunner(timedOutResult(60_000));
    const cli = createLaceworkCli(cliConfig, fake.runner);

    const result = await listCves(cli, {});

    expect(result).toEqual({
      ok: false,
      error: {
        kind: 'CommandTimedOut',
        command: 'lacework vulnerability host list-cves --json',
        timeoutMs: 60_000,
        message: 'Lacework command timed out after 60 seconds',
      },
    });
  });
});

describe('listHostsByCve', () => {
  it('should list the hosts carrying a CVE', async () => {
    const fake = createFakeRunner(jsonResult(hostsResponse));
    const cli = createLaceworkCli(cliConfig, fake.runner);

    const result = await listHostsByCve(cli, { cve_id: 'CVE-2024-0001', start_time: '-24h' });

    expect(fake.calls[0].argv).toEqual([
      'lacework', 'vulnerability', 'host', 'list-hosts', 'CVE-2024-0001', '--start', '-24h', '--json',
    ]);
    expect(result).toEqual({
      ok: true,
      value: {
        cve_id: 'CVE-2024-0001',
        affected_hosts_count: 2,
        hosts: [
          {
            mid: '1234',
            hostname: 'web-1',
            external_ip: '203.0.113.10',
            internal_ip: '10.0.1.15',
            os: 'ubuntu 22.04',
            provider: 'AWS',
            instance_id: 'i-0abc',
            status: 'Active',
          },
          {
            mid: 'm-2',
            hostname: 'web-2',
            external_ip: null,
            internal_ip: null,
            os: null,
            provider: null,
            instance_id: null,
            status: null,
          },
        ],
      },
    });
  });

  it('should report a malformed list-hosts response', async () => {
    const fake = createFakeRunner(jsonResult({ data: 'oops' }));
    const cli = createLaceworkCli(cliConfig, fake.runner);

    const result = await listHostsByCve(cli, { cve_id: 'CVE-2024-0001' });

    expect(result).toEqual({
      ok: false,
      error: { kind: 'ExtractionError', message: 'Unexpected list-hosts response: "data" is not a list' },
    });
  });
});

describe('getCriticalCves', () => {
  it('should keep CVEs at or above 9.0 by default, highest first', async () => {
    const fake = createFakeRunner(jsonResult(scoredCves));
    const cli = createLaceworkCli(cliConfig, fake.runner);

    const result = await getCriticalCves(cli, {});

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.threshold).toBe(9);
    expect(result.value.total_cves_scanned).toBe(3);
    expect(result.value.critical_cves_count).toBe(2);
    expect(result.value.critical_cves.map((c) => c.cvss_score)).toEqual([9.8, 9.1]);
    expect(result.value.critical_cves.map((c) => c.cve_id)).toEqual(['CVE-2024-1001', 'CVE-2024-1002']);
  });

  it('should honour a custom threshold and start time', async () => {
    const fake = createFakeRunner(jsonResult(scoredCves));
    const cli = createLaceworkCli(cliConfig, fake.runner);

    const result = await getCriticalCves(cli, { min_cvss_score: 7.0, start_time: '-7d' });

    expect(fake.calls[0].argv).toEqual([
      'lacework', 'vulnerability', 'host', 'list-cves', '--start', '-7d', '--json',
    ]);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.threshold).toBe(7);
    expect(result.value.critical_cves.map((c) => c.cvss_score)).toEqual([9.8, 9.1, 7.2]);
  });

  it('should rank unscored CVEs as zero', async () => {
    const fake = createFakeRunner(jsonResult({
      data: [{ cve_id: 'CVE-2024-2000', severity: 'Unknown' }, cveRecord('CVE-2024-2001', 'Low', 1.0)],
    }));
    const cli = createLaceworkCli(cliConfig, fake.runner);

    const atOne = await getCriticalCves(cli, { min_cvss_score: 1.0 });
    const atZero = await getCriticalCves(cli, { min_cvss_score: 0 });

    expect(atOne.ok && atOne.value.critical_cves.map((c) => c.cve_id)).toEqual(['CVE-2024-2001']);
    expect(atZero.ok && atZero.value.critical_cves.map((c) => c.cve_id)).toEqual([
      'CVE-2024-2001', 'CVE-2024-2000',
    ]);
  });
});

describe('time range arguments', () => {
  it.each(['now', '-24h', '-1d@d', '2024-01-01', '2024-01-01T00:00:00Z', '2024-01-31 23:59:59'])(
    'should pass %s through to --start',
    async (start) => {
      const fake = createFakeRunner(jsonResult(fiveCves));
      const kernel = createKernel(createForticnappTools(createLaceworkCli(cliConfig, fake.runner)));

      const response = await kernel.invoke('list_cves', { start_time: start });

      expect(response.isError).toBeUndefined();
      expect(fake.calls[0].argv).toEqual([
        'lacework', 'vulnerability', 'host', 'list-cves', '--start', start, '--json',
      ]);
    }
  );

  it('should name the accepted forms when rejecting a value', async () => {
    const fake = createFakeRunner(jsonResult(fiveCves));
    const kernel = createKernel(createForticnappTools(createLaceworkCli(cliConfig, fake.runner)));

    const response = await kernel.invoke('list_cves', { start_time: 'yesterday' });
    const [listCvesDescriptor] = kernel.listTools();

    expect(response.isError).toBe(true);
    expect(response.content[0].text.startsWith('Error: Invalid argument start_time: must match pattern')).toBe(true);
    expect(listCvesDescriptor.inputSchema.properties.start_time.description).toContain('@<unit> snap');
    expect(fake.calls).toHaveLength(0);
  });
});
