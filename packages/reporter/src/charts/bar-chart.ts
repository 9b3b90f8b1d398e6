import type { MetricSample, ResultSet, Scenario, Tool } from '@portbench/core';

import { emitArtifact, type ArtifactOutcome } from '../io/write-artifact.js';
import { REPORT_FILES } from '../model/report.js';
import { escapeXml, num, svgDocument, text } from './svg.js';

export type ChartMetric = 'time' | 'memory' | 'cpu';

export const CHART_METRICS: readonly ChartMetric[] = ['time', 'memory', 'cpu'];

interface ChartSpec {
  title: string;
  axisLabel: string;
  fileName: string;
  /** Value in display units; `undefined` when not measured. */
  extract(sample: MetricSample): number | undefined;
  formatLabel(value: number): string;
  /** Fixed axis range; values above it are drawn at the top. */
  fixedMax?: number;
}

const KB_PER_MB = 1024;

export const CHART_SPECS: Readonly<Record<ChartMetric, ChartSpec>> = {
  time: {
    title: 'Scan execution time',
    axisLabel: 'Execution time (seconds)',
    fileName: REPORT_FILES.timeChart,
    extract: (sample) => sample.elapsedSeconds,
    formatLabel: (value) => `${value.toFixed(2)}s`,
  },
  memory: {
    title: 'Peak memory usage',
    axisLabel: 'Memory (MB)',
    fileName: REPORT_FILES.memoryChart,
    extract: (sample) =>
      sample.peakMemoryKb === undefined ? undefined : sample.peakMemoryKb / KB_PER_MB,
    formatLabel: (value) => `${value.toFixed(1)} MB`,
  },
  cpu: {
    title: 'CPU utilisation',
    axisLabel: 'CPU (%)',
    fileName: REPORT_FILES.cpuChart,
    extract: (sample) => sample.cpuPercent,
    formatLabel: (value) => `${value}%`,
    fixedMax: 100,
  },
};

export interface ChartBar {
  tool: Tool;
  /** Measured value in display units, never clipped. */
  value: number | undefined;
  /** Plotted value: 0 when absent, capped at the axis maximum. */
  plotted: number;
  label: string | undefined;
}

export interface BarGroup {
  scenario: Scenario;
  bars: ChartBar[];
}

export interface GroupedBarChart {
  metric: ChartMetric;
  title: string;
  axisLabel: string;
  axisMax: number;
  tools: readonly Tool[];
  groups: BarGroup[];
}

const NICE_STEPS = [1, 2, 2.5, 5, 10];

export function niceCeiling(value: number): number {
  if (!(value > 0)) {
    return 1;
  }
  const magnitude = 10 ** Math.floor(Math.log10(value));
  for (const step of NICE_STEPS) {
    if (step * magnitude >= value) {
      return step * magnitude;
    }
  }
  return 10 * magnitude;
}

/**
 * One group per scenario, one bar per tool, for every (tool, scenario) pair
 * whether configured or not, so bar positions never shift.
 */
export function buildGroupedBarChart(
  resultSet: ResultSet,
  metric: ChartMetric
): GroupedBarChart {
  const spec = CHART_SPECS[metric];
  const measured: number[] = [];
  for (const scenario of resultSet.scenarios) {
    for (const tool of resultSet.tools) {
      const value = spec.extract(resultSet.get(tool.id, scenario.key));
      if (value !== undefined) {
        measured.push(value);
      }
    }
  }
  const axisMax = spec.fixedMax ?? niceCeiling(Math.max(0, ...measured));

  const groups = resultSet.scenarios.map((scenario) => ({
    scenario,
    bars: resultSet.tools.map((tool): ChartBar => {
      const value = spec.extract(resultSet.get(tool.id, scenario.key));
      return {
        tool,
        value,
        plotted: value === undefined ? 0 : Math.min(Math.max(value, 0), axisMax),
        label: value === undefined ? undefined : spec.formatLabel(value),
      };
    }),
  }));

  return {
    metric,
    title: spec.title,
    axisLabel: spec.axisLabel,
    axisMax,
    tools: resultSet.tools,
    groups,
  };
}

export interface BarRect {
  tool: string;
  scenario: string;
  x: number;
  y: number;
  width: number;
  height: number;
  label: string | undefined;
}

export const CHART_LAYOUT = {
  margin: { top: 70, right: 160, bottom: 80, left: 80 },
  plotHeight: 360,
  barWidth: 32,
  barGap: 6,
  groupGap: 48,
} as const;

const PALETTE = ['#3498db', '#e74c3c', '#2ecc71', '#f39c12', '#9b59b6', '#1abc9c'];

export function toolColor(index: number): string {
  return PALETTE[index % PALETTE.length] ?? '#7f8c8d';
}

function groupWidth(toolCount: number): number {
  const { barWidth, barGap } = CHART_LAYOUT;
  return toolCount * barWidth + Math.max(0, toolCount - 1) * barGap;
}

/**
 * Bar rectangles in plot coordinates (origin at the plot's top-left).
 */
export function layoutBars(chart: GroupedBarChart): BarRect[] {
  const { plotHeight, barWidth, barGap, groupGap } = CHART_LAYOUT;
  const width = groupWidth(chart.tools.length);
  const rects: BarRect[] = [];
  chart.groups.forEach((group, groupIndex) => {
    const groupX = groupGap + groupIndex * (width + groupGap);
    group.bars.forEach((bar, barIndex) => {
      const height = (bar.plotted / chart.axisMax) * plotHeight;
      rects.push({
        tool: bar.tool.id,
        scenario: group.scenario.key,
        x: groupX + barIndex * (barWidth + barGap),
        y: plotHeight - height,
        width: barWidth,
        height,
        label: bar.label,
      });
    });
  });
  return rects;
}

const CHART_STYLE = [
  '.title { font-size: 18px; font-weight: bold; fill: #1f2937; }',
  '.axis-label { font-size: 12px; fill: #374151; }',
  '.tick { font-size: 10px; fill: #6b7280; }',
  '.group-label { font-size: 11px; fill: #374151; }',
  '.value-label { font-size: 10px; font-weight: bold; fill: #111827; }',
  '.grid-line { stroke: #e5e7eb; stroke-width: 1; stroke-dasharray: 4,3; }',
  '.axis { stroke: #374151; stroke-width: 1; }',
  '.legend-text { font-size: 11px; fill: #374151; }',
].join(' ');

export function renderBarChartSvg(chart: GroupedBarChart): string {
  const { margin, plotHeight, groupGap } = CHART_LAYOUT;
  const plotWidth =
    chart.groups.length * (groupWidth(chart.tools.length) + groupGap) + groupGap;
  const width = margin.left + plotWidth + margin.right;
  const height = margin.top + plotHeight + margin.bottom;
  const colorByTool = new Map(chart.tools.map((tool, index) => [tool.id, toolColor(index)]));

  const body: string[] = [
    text(width / 2, 32, chart.title, { class: 'title', 'text-anchor': 'middle' }),
    `<g transform="translate(${margin.left}, ${margin.top})">`,
  ];

  const ticks = 5;
  for (let index = 0; index <= ticks; index += 1) {
    const value = (chart.axisMax / ticks) * index;
    const y = plotHeight - (value / chart.axisMax) * plotHeight;
    body.push(
      `  <line x1="0" y1="${num(y)}" x2="${num(plotWidth)}" y2="${num(y)}" class="grid-line"/>`,
      `  ${text(-8, y + 3, num(value), { class: 'tick', 'text-anchor': 'end' })}`
    );
  }
  body.push(
    `  <line x1="0" y1="0" x2="0" y2="${plotHeight}" class="axis"/>`,
    `  <line x1="0" y1="${plotHeight}" x2="${num(plotWidth)}" y2="${plotHeight}" class="axis"/>`
  );

  const rects = layoutBars(chart);
  for (const rect of rects) {
    body.push(
      `  <rect x="${num(rect.x)}" y="${num(rect.y)}" width="${rect.width}" height="${num(
        rect.height
      )}" fill="${colorByTool.get(rect.tool) ?? '#7f8c8d'}" data-tool="${escapeXml(
        rect.tool
      )}" data-scenario="${escapeXml(rect.scenario)}"/>`
    );
    if (rect.label !== undefined) {
      body.push(
        `  ${text(rect.x + rect.width / 2, rect.y - 4, rect.label, {
          class: 'value-label',
          'text-anchor': 'middle',
        })}`
      );
    }
  }

  const barsWidth = groupWidth(chart.tools.length);
  chart.groups.forEach((group, index) => {
    const centre = groupGap + index * (barsWidth + groupGap) + barsWidth / 2;
    body.push(
      `  ${text(centre, plotHeight + 20, group.scenario.label, {
        class: 'group-label',
        'text-anchor': 'middle',
      })}`
    );
  });

  body.push(
    `  ${text(plotWidth / 2, plotHeight + 50, 'Scenario', {
      class: 'axis-label',
      'text-anchor': 'middle',
    })}`,
    `  ${text(-55, plotHeight / 2, chart.axisLabel, {
      class: 'axis-label',
      'text-anchor': 'middle',
      transform: `rotate(-90 -55 ${num(plotHeight / 2)})`,
    })}`,
    '</g>',
    `<g transform="translate(${num(margin.left + plotWidth + 20)}, ${margin.top})">`
  );
  chart.tools.forEach((tool, index) => {
    const y = index * 20;
    body.push(
      `  <rect x="0" y="${y}" width="14" height="14" fill="${toolColor(index)}"/>`,
      `  ${text(20, y + 11, tool.label, { class: 'legend-text' })}`
    );
  });
  body.push('</g>');

  return svgDocument(width, height, body, CHART_STYLE);
}

/**
 * Write the time, memory and CPU charts. Each chart is written independently;
 * one failure does not stop the others.
 */
export async function synthesizeCharts(
  resultSet: ResultSet,
  outDir: string
): Promise<ArtifactOutcome[]> {
  return Promise.all(
    CHART_METRICS.map((metric) =>
      emitArtifact(outDir, CHART_SPECS[metric].fileName, () =>
        renderBarChartSvg(buildGroupedBarChart(resultSet, metric))
      )
    )
  );
}
