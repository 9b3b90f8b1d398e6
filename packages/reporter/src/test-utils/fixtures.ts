import { ResultSet, createSample, type MetricSample, type TestPlan } from '@portbench/core';

import type { ComparisonInput } from '../model/report.js';

export const FIXTURE_PLAN: TestPlan = {
  tools: [
    { id: 'pentool', label: 'Pentool' },
    { id: 'nmap', label: 'Nmap' },
  ],
  scenarios: [
    { key: 'common_ports', label: 'Common ports' },
    { key: 'port_range', label: 'Port range' },
    { key: 'service_detection', label: 'Service detection' },
  ],
  cases: [],
  baselineTool: 'pentool',
};

/**
 * Nmap fully profiled; Pentool with elapsed time only.
 */
export const FIXTURE_SAMPLES: ReadonlyArray<{
  tool: string;
  scenario: string;
  sample: MetricSample;
}> = [
  { tool: 'pentool', scenario: 'common_ports', sample: createSample({ elapsedSeconds: 1.25 }) },
  {
    tool: 'nmap',
    scenario: 'common_ports',
    sample: createSample({ elapsedSeconds: 2.5, peakMemoryKb: 20480, cpuPercent: 45, openPortsFound: 3 }),
  },
  { tool: 'pentool', scenario: 'port_range', sample: createSample({ elapsedSeconds: 0.5 }) },
  {
    tool: 'nmap',
    scenario: 'port_range',
    sample: createSample({ elapsedSeconds: 5, peakMemoryKb: 10240, cpuPercent: 120, openPortsFound: 2 }),
  },
  { tool: 'pentool', scenario: 'service_detection', sample: createSample({ elapsedSeconds: 2 }) },
  {
    tool: 'nmap',
    scenario: 'service_detection',
    sample: createSample({ elapsedSeconds: 10, peakMemoryKb: 51200, cpuPercent: 80, openPortsFound: 3 }),
  },
];

export function fixtureResultSet(
  samples: Iterable<{ tool: string; scenario: string; sample: MetricSample }> = FIXTURE_SAMPLES
): ResultSet {
  return ResultSet.build(FIXTURE_PLAN, samples);
}

export function fixtureInput(overrides: Partial<ComparisonInput> = {}): ComparisonInput {
  return {
    resultSet: fixtureResultSet(),
    plan: FIXTURE_PLAN,
    meta: {
      timestamp: '2024-05-01T10:00:00Z',
      target: '127.0.0.1',
      manifestPath: '/results/summary.json',
    },
    degraded: false,
    ...overrides,
  };
}
