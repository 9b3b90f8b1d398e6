import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { DEFAULT_TEST_PLAN, ErrorCode, silentLogger } from '@portbench/core';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ReportOrchestrator } from './orchestrator.js';

let workDir: string;
let resultsDir: string;
let outDir: string;

beforeEach(async () => {
  workDir = await mkdtemp(path.join(tmpdir(), 'portbench-report-'));
  resultsDir = path.join(workDir, 'results');
  outDir = path.join(workDir, 'out');
  await mkdir(resultsDir);
});

afterEach(async () => {
  await rm(workDir, { recursive: true, force: true });
});

async function writeBenchmarkRun(): Promise<void> {
  await writeFile(
    path.join(resultsDir, 'summary.json'),
    JSON.stringify({
      timestamp: '2024-05-01T10:00:00Z',
      target: '127.0.0.1',
      tests: {
        pentool_common_ports: { time_ms: 1250 },
        nmap_common_ports: { time_ms: 2500, open_ports: 3 },
        nmap_port_range_1_100: { time_ms: 5000, open_ports: 2 },
        nmap_service_detection: { time_ms: 10000, open_ports: 3 },
      },
    })
  );
  await writeFile(
    path.join(resultsDir, 'nmap_common_time.txt'),
    'Time: 0:02.40\nMemory: 20480 KB\nCPU: 45%\n'
  );
  await writeFile(
    path.join(resultsDir, 'nmap_range_time.txt'),
    'Time: 0:05.10\nMemory: 10240 KB\nCPU: 120%\n'
  );
  await writeFile(
    path.join(resultsDir, 'nmap_service_time.txt'),
    'Time: 0:10.20\nMemory: 51200 KB\nCPU: 80%\n'
  );
}

function orchestrator(): ReportOrchestrator {
  return new ReportOrchestrator({
    resultsDir,
    outDir,
    plan: DEFAULT_TEST_PLAN,
    logger: silentLogger,
  });
}

describe('ReportOrchestrator', () => {
  it('writes the full report package', async () => {
    await writeBenchmarkRun();
    const outcome = await orchestrator().run();

    expect(outcome.status).toBe('success');
    expect(outcome.degraded).toBe(false);
    expect(outcome.artifacts.map((artifact) => artifact.name)).toEqual([
      'comparison_table.md',
      'comparison_table.txt',
      'results.json',
      'time_comparison.svg',
      'memory_comparison.svg',
      'cpu_comparison.svg',
      'architecture_diagram.svg',
    ]);
    expect((await readdir(outDir)).sort()).toEqual([
      'architecture_diagram.svg',
      'comparison_table.md',
      'comparison_table.txt',
      'cpu_comparison.svg',
      'memory_comparison.svg',
      'results.json',
      'time_comparison.svg',
    ]);
    expect(outcome.warnings).toEqual([
      `pentool/common_ports: Artifact ${path.join(resultsDir, 'pentool_scan_results.json')} not found`,
      `nmap/common_ports: Artifact ${path.join(resultsDir, 'nmap_common.txt')} not found`,
      `nmap/port_range: Artifact ${path.join(resultsDir, 'nmap_range.txt')} not found`,
    ]);
  });

  it('fills placeholders for the partially profiled tool', async () => {
    await writeBenchmarkRun();
    await orchestrator().run();

    const markdown = await readFile(path.join(outDir, 'comparison_table.md'), 'utf8');
    const rows = markdown.split('\n').filter((line) => /^\| (Pentool|Nmap) \|/.test(line));
    expect(rows).toEqual([
      '| Pentool | Common ports (15) | 1250 | 1.25 | N/A | N/A | N/A |',
      '| Nmap | Common ports (15) | 2500 | 2.50 | 3 | 20.0 | 45 |',
      '| Nmap | Port range 1-100 | 5000 | 5.00 | 2 | 10.0 | 120 |',
      '| Nmap | Service detection | 10000 | 10.00 | 3 | 50.0 | 80 |',
    ]);

    const cpu = await readFile(path.join(outDir, 'cpu_comparison.svg'), 'utf8');
    expect(cpu).toContain(
      '<rect x="48" y="360" width="32" height="0" fill="#3498db" data-tool="pentool" data-scenario="common_ports"/>'
    );
    expect(cpu).toContain(
      '<rect x="86" y="198" width="32" height="162" fill="#e74c3c" data-tool="nmap" data-scenario="common_ports"/>'
    );
  });

  it('serializes the result set with explicit nulls', async () => {
    await writeBenchmarkRun();
    await orchestrator().run();

    const results: unknown = JSON.parse(await readFile(path.join(outDir, 'results.json'), 'utf8'));
    expect(results).toMatchObject({
      meta: { timestamp: '2024-05-01T10:00:00Z', target: '127.0.0.1', degraded: false },
      results: [
        {
          tool: 'pentool',
          scenario: 'common_ports',
          elapsedSeconds: 1.25,
          peakMemoryKb: null,
          cpuPercent: null,
          openPortsFound: null,
        },
        {
          tool: 'nmap',
          scenario: 'common_ports',
          elapsedSeconds: 2.5,
          peakMemoryKb: 20480,
          cpuPercent: 45,
          openPortsFound: 3,
        },
        { tool: 'nmap', scenario: 'port_range' },
        { tool: 'nmap', scenario: 'service_detection' },
      ],
    });
  });

  it('keeps writing other artifacts when one cannot be written', async () => {
    await writeBenchmarkRun();
    await mkdir(path.join(outDir, 'cpu_comparison.svg'), { recursive: true });

    const outcome = await orchestrator().run();

    expect(outcome.status).toBe('partial');
    const failed = outcome.artifacts.filter((artifact) => !artifact.written);
    expect(failed.map((artifact) => artifact.name)).toEqual(['cpu_comparison.svg']);
    expect(failed[0]?.error?.errorCode).toBe(ErrorCode.WRITE_FAILED);
    expect(await readFile(path.join(outDir, 'comparison_table.md'), 'utf8')).toContain(
      '# Port Scanner Benchmark Report'
    );
    expect(await readFile(path.join(outDir, 'architecture_diagram.svg'), 'utf8')).toContain('<svg');
  });

  it('fails without writing anything when there is no input at all', async () => {
    const outcome = await orchestrator().run();

    expect(outcome.status).toBe('failed');
    expect(outcome.artifacts).toEqual([]);
    expect(outcome.error?.errorCode).toBe(ErrorCode.MISSING_MANDATORY_INPUT);
    await expect(readdir(outDir)).rejects.toThrow();
  });

  it('runs in degraded mode from raw artifacts alone', async () => {
    await writeFile(
      path.join(resultsDir, 'nmap_common_time.txt'),
      'Time: 0:02.40\nMemory: 20480 KB\nCPU: 45%\n'
    );

    const outcome = await orchestrator().run();

    expect(outcome.status).toBe('success');
    expect(outcome.degraded).toBe(true);
    const text = await readFile(path.join(outDir, 'comparison_table.txt'), 'utf8');
    expect(text).toContain('Source:    raw profiling artifacts only (no manifest)');
    expect(text).toContain('  No comparable timings.');
  });
});
