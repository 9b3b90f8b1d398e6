import type { MetricSample, ResultEntry } from '@portbench/core';

import type { ComparisonInput } from '../model/report.js';

export type Align = 'left' | 'right';

export interface ComparisonColumn {
  header: string;
  align: Align;
  /** `undefined` means "not measured" and renders as the placeholder. */
  value(entry: ResultEntry): string | undefined;
}

const KB_PER_MB = 1024;

export function formatMilliseconds(seconds: number | undefined): string | undefined {
  return seconds === undefined ? undefined : String(Math.round(seconds * 1000));
}

export function formatSeconds(seconds: number | undefined): string | undefined {
  return seconds === undefined ? undefined : seconds.toFixed(2);
}

export function formatMegabytes(kilobytes: number | undefined): string | undefined {
  return kilobytes === undefined ? undefined : (kilobytes / KB_PER_MB).toFixed(1);
}

export function formatCount(value: number | undefined): string | undefined {
  return value === undefined ? undefined : String(value);
}

const sampleColumn = (
  header: string,
  pick: (sample: MetricSample) => string | undefined
): ComparisonColumn => ({
  header,
  align: 'right',
  value: (entry) => pick(entry.sample),
});

/**
 * Column set shared by the Markdown and text comparison tables.
 */
export const COMPARISON_COLUMNS: readonly ComparisonColumn[] = [
  { header: 'Tool', align: 'left', value: (entry) => entry.tool.label },
  { header: 'Scenario', align: 'left', value: (entry) => entry.scenario.label },
  sampleColumn('Time (ms)', (sample) => formatMilliseconds(sample.elapsedSeconds)),
  sampleColumn('Time (s)', (sample) => formatSeconds(sample.elapsedSeconds)),
  sampleColumn('Open ports', (sample) => formatCount(sample.openPortsFound)),
  sampleColumn('Memory (MB)', (sample) => formatMegabytes(sample.peakMemoryKb)),
  sampleColumn('CPU (%)', (sample) => formatCount(sample.cpuPercent)),
];

/**
 * One row per configured (tool, scenario) pair, in fixed order, including
 * pairs with nothing measured.
 */
export function buildComparisonRows(
  input: ComparisonInput,
  placeholder: string,
  columns: readonly ComparisonColumn[] = COMPARISON_COLUMNS
): string[][] {
  return input.resultSet
    .entries()
    .map((entry) => columns.map((column) => column.value(entry) ?? placeholder));
}
