import { ResultSet, createSample, type TestPlan } from '@portbench/core';
import { describe, expect, it } from 'vitest';

import { FIXTURE_SAMPLES, fixtureInput, fixtureResultSet } from '../test-utils/fixtures.js';
import { renderMarkdownReport } from './markdown.js';

function tableRows(markdown: string): string[] {
  const lines = markdown.split('\n');
  const start = lines.indexOf('## 1. Performance comparison');
  const rows: string[] = [];
  for (const line of lines.slice(start + 2)) {
    if (!line.startsWith('|')) break;
    rows.push(line);
  }
  return rows;
}

describe('renderMarkdownReport', () => {
  it('renders one row per configured pair with placeholders for missing fields', () => {
    const rows = tableRows(renderMarkdownReport(fixtureInput()));
    expect(rows).toEqual([
      '| Tool | Scenario | Time (ms) | Time (s) | Open ports | Memory (MB) | CPU (%) |',
      '| --- | --- | --- | --- | --- | --- | --- |',
      '| Pentool | Common ports | 1250 | 1.25 | N/A | N/A | N/A |',
      '| Nmap | Common ports | 2500 | 2.50 | 3 | 20.0 | 45 |',
      '| Pentool | Port range | 500 | 0.50 | N/A | N/A | N/A |',
      '| Nmap | Port range | 5000 | 5.00 | 2 | 10.0 | 120 |',
      '| Pentool | Service detection | 2000 | 2.00 | N/A | N/A | N/A |',
      '| Nmap | Service detection | 10000 | 10.00 | 3 | 50.0 | 80 |',
    ]);
  });

  it('keeps rows for pairs with nothing measured', () => {
    const resultSet = fixtureResultSet([
      ...FIXTURE_SAMPLES.filter((entry) => entry.tool === 'nmap'),
      { tool: 'pentool', scenario: 'common_ports', sample: createSample() },
    ]);
    const rows = tableRows(renderMarkdownReport(fixtureInput({ resultSet })));
    expect(rows).toHaveLength(2 + 4);
    expect(rows[2]).toBe('| Pentool | Common ports | N/A | N/A | N/A | N/A | N/A |');
  });

  it('escapes pipes in tool and scenario labels', () => {
    const plan: TestPlan = {
      tools: [{ id: 'nmap', label: 'nmap | -sV' }],
      scenarios: [{ key: 'wide', label: 'Ports 1|100' }],
      cases: [],
      baselineTool: 'nmap',
    };
    const resultSet = ResultSet.build(plan, [
      { tool: 'nmap', scenario: 'wide', sample: createSample({ elapsedSeconds: 1 }) },
    ]);
    const rows = tableRows(renderMarkdownReport(fixtureInput({ plan, resultSet })));
    expect(rows[2]).toBe('| nmap \\| -sV | Ports 1\\|100 | 1000 | 1.00 | N/A | N/A | N/A |');
  });

  it('writes header metadata and the degraded notice', () => {
    const markdown = renderMarkdownReport(
      fixtureInput({
        degraded: true,
        meta: { manifestPath: '/results/summary.json' },
      })
    );
    const lines = markdown.split('\n');
    expect(lines.slice(0, 5)).toEqual([
      '# Port Scanner Benchmark Report',
      '',
      '- Test date: N/A',
      '- Target: N/A',
      '- Source: raw profiling artifacts only (no manifest)',
    ]);
  });

  it('lists speed ratios against the baseline tool', () => {
    const markdown = renderMarkdownReport(fixtureInput());
    expect(markdown).toContain('- Common ports: Pentool is 2.0x faster than Nmap');
    expect(markdown).toContain('- Port range: Pentool is 10.0x faster than Nmap');
    expect(markdown).toContain('- Service detection: Pentool is 5.0x faster than Nmap');
  });

  it('reports resource usage and detection per pair', () => {
    const lines = renderMarkdownReport(fixtureInput()).split('\n');
    expect(lines).toContain('- Nmap (Port range): 10.0 MB');
    expect(lines).toContain('- Pentool (Port range): N/A');
    expect(lines).toContain('- Nmap (Port range): 120%');
    expect(lines).toContain('- Nmap (Common ports): 3 open ports');
  });

  it('ends with the capability matrix', () => {
    const lines = renderMarkdownReport(fixtureInput()).split('\n');
    expect(lines.slice(-12)).toEqual([
      '| Capability | Pentool | Nmap | Masscan |',
      '| --- | --- | --- | --- |',
      '| Port scanning | ✓ | ✓ | ✓ |',
      '| Service detection | ✓ | ✓ | ✗ |',
      '| REST API | ✓ | ✗ | ✗ |',
      '| Distributed architecture | ✓ | ✗ | ✗ |',
      '| Horizontal scaling | ✓ | ✗ | ✗ |',
      '| Asynchronous processing | ✓ | ✗ | ✓ |',
      '| Results stored in a database | ✓ | ✗ | ✗ |',
      '| Internet-scale scanning | ✗ | ✗ | ✓ |',
      '| OS detection | ✗ | ✓ | ✗ |',
      '| Scripting engine | ✗ | ✓ | ✗ |',
    ]);
  });
});
