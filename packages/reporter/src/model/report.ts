/**
 * Data handed to every renderer. The ResultSet is shared read-only; renderers
 * may run in any order.
 */
import type { ResultSet, RunMetadata, TestPlan } from '@portbench/core';

export interface ComparisonInput {
  resultSet: ResultSet;
  plan: TestPlan;
  meta: RunMetadata;
  degraded: boolean;
}

/** Placeholder for an absent value, per output format. */
export const PLACEHOLDERS = {
  markdown: 'N/A',
  text: '-',
} as const;

export type TableFormat = keyof typeof PLACEHOLDERS;

/** Output file names, relative to the report output directory. */
export const REPORT_FILES = {
  markdownTable: 'comparison_table.md',
  textTable: 'comparison_table.txt',
  results: 'results.json',
  timeChart: 'time_comparison.svg',
  memoryChart: 'memory_comparison.svg',
  cpuChart: 'cpu_comparison.svg',
  architecture: 'architecture_diagram.svg',
} as const;

export type ReportFileName = (typeof REPORT_FILES)[keyof typeof REPORT_FILES];
