import { PLACEHOLDERS, type ComparisonInput } from '../model/report.js';
import {
  CAPABILITY_MATRIX,
  CAPABILITY_TOOLS,
  supportMark,
} from './capabilities.js';
import {
  COMPARISON_COLUMNS,
  buildComparisonRows,
  formatCount,
  formatMegabytes,
} from './columns.js';
import { buildRatioLines } from './ratio.js';

const NA = PLACEHOLDERS.markdown;

function escapeCell(cell: string): string {
  return cell.replace(/\|/g, '\\|');
}

function tableRow(cells: readonly string[]): string {
  return `| ${cells.map(escapeCell).join(' | ')} |`;
}

function renderTable(headers: readonly string[], rows: string[][]): string[] {
  return [
    tableRow(headers),
    tableRow(headers.map(() => '---')),
    ...rows.map((row) => tableRow(row)),
  ];
}

function renderResourceUsage(input: ComparisonInput): string[] {
  const entries = input.resultSet.entries();
  const lines = ['**Memory:**'];
  entries.forEach(({ tool, scenario, sample }) => {
    const memory = formatMegabytes(sample.peakMemoryKb);
    lines.push(`- ${tool.label} (${scenario.label}): ${memory ? `${memory} MB` : NA}`);
  });
  lines.push('', '**CPU:**');
  entries.forEach(({ tool, scenario, sample }) => {
    const cpu = formatCount(sample.cpuPercent);
    lines.push(`- ${tool.label} (${scenario.label}): ${cpu ? `${cpu}%` : NA}`);
  });
  return lines;
}

function renderDetection(input: ComparisonInput): string[] {
  return input.resultSet.entries().map(({ tool, scenario, sample }) => {
    const ports = formatCount(sample.openPortsFound);
    return `- ${tool.label} (${scenario.label}): ${
      ports === undefined ? NA : `${ports} open ports`
    }`;
  });
}

export function renderMarkdownReport(input: ComparisonInput): string {
  const lines: string[] = [];

  lines.push('# Port Scanner Benchmark Report', '');
  lines.push(`- Test date: ${input.meta.timestamp ?? NA}`);
  lines.push(`- Target: ${input.meta.target ?? NA}`);
  if (input.degraded) {
    lines.push('- Source: raw profiling artifacts only (no manifest)');
  }

  lines.push('', '## 1. Performance comparison', '');
  lines.push(
    ...renderTable(
      COMPARISON_COLUMNS.map((column) => column.header),
      buildComparisonRows(input, NA)
    )
  );

  lines.push('', '## 2. Analysis', '', '### 2.1 Scan speed', '');
  const ratios = buildRatioLines(input.resultSet, input.plan.baselineTool);
  if (ratios.length) {
    ratios.forEach((ratio) => {
      lines.push(`- ${ratio.scenario.label}: ${ratio.text}`);
    });
  } else {
    lines.push('- No comparable timings.');
  }

  lines.push('', '### 2.2 Resource usage', '');
  lines.push(...renderResourceUsage(input));

  lines.push('', '### 2.3 Detection', '');
  lines.push(...renderDetection(input));

  lines.push('', '## 3. Capability matrix', '');
  lines.push(
    ...renderTable(
      ['Capability', ...CAPABILITY_TOOLS],
      CAPABILITY_MATRIX.map((row) => [
        row.capability,
        ...row.support.map(supportMark),
      ])
    )
  );

  return lines.join('\n');
}
