import { ARCHITECTURE_TEXT } from '../diagram/architecture.js';
import { PLACEHOLDERS, type ComparisonInput } from '../model/report.js';
import {
  CAPABILITY_MATRIX,
  CAPABILITY_TOOLS,
  supportMark,
} from './capabilities.js';
import {
  COMPARISON_COLUMNS,
  buildComparisonRows,
  type Align,
} from './columns.js';
import { buildRatioLines } from './ratio.js';

const RULE = '='.repeat(80);

function pad(value: string, width: number, align: Align): string {
  return align === 'right' ? value.padStart(width) : value.padEnd(width);
}

function border(widths: number[], left: string, middle: string, right: string): string {
  return `${left}${widths.map((width) => '─'.repeat(width + 2)).join(middle)}${right}`;
}

/**
 * Fixed-width box-drawn grid. Column widths fit the widest cell; headers are
 * left-aligned, cells follow their column alignment.
 */
export function renderTextGrid(
  headers: readonly string[],
  rows: readonly (readonly string[])[],
  aligns: readonly Align[] = headers.map(() => 'left')
): string[] {
  const widths = headers.map((header, index) =>
    Math.max(header.length, ...rows.map((row) => (row[index] ?? '').length))
  );
  const line = (cells: readonly string[], header: boolean): string =>
    `│ ${widths
      .map((width, index) =>
        pad(cells[index] ?? '', width, header ? 'left' : (aligns[index] ?? 'left'))
      )
      .join(' │ ')} │`;

  return [
    border(widths, '┌', '┬', '┐'),
    line(headers, true),
    border(widths, '├', '┼', '┤'),
    ...rows.map((row) => line(row, false)),
    border(widths, '└', '┴', '┘'),
  ];
}

function section(title: string): string[] {
  return [RULE, title, RULE, ''];
}

export function renderTextReport(input: ComparisonInput): string {
  const lines: string[] = [];
  const placeholder = PLACEHOLDERS.text;

  lines.push(RULE, '  PORT SCANNER BENCHMARK REPORT', RULE, '');
  lines.push(`Test date: ${input.meta.timestamp ?? placeholder}`);
  lines.push(`Target:    ${input.meta.target ?? placeholder}`);
  if (input.degraded) {
    lines.push('Source:    raw profiling artifacts only (no manifest)');
  }
  lines.push('');

  lines.push(...section('1. PERFORMANCE COMPARISON'));
  lines.push(
    ...renderTextGrid(
      COMPARISON_COLUMNS.map((column) => column.header),
      buildComparisonRows(input, placeholder),
      COMPARISON_COLUMNS.map((column) => column.align)
    ),
    ''
  );

  lines.push(...section('2. SCAN SPEED'));
  const ratios = buildRatioLines(input.resultSet, input.plan.baselineTool);
  if (ratios.length) {
    ratios.forEach((ratio) => {
      lines.push(`  ${ratio.scenario.label}: ${ratio.text}`);
    });
  } else {
    lines.push('  No comparable timings.');
  }
  lines.push('');

  lines.push(...section('3. ARCHITECTURE'));
  lines.push(...ARCHITECTURE_TEXT.map((row) => `  ${row}`), '');

  lines.push(...section('4. CAPABILITY MATRIX'));
  lines.push(
    ...renderTextGrid(
      ['Capability', ...CAPABILITY_TOOLS],
      CAPABILITY_MATRIX.map((row) => [row.capability, ...row.support.map(supportMark)])
    )
  );

  return lines.join('\n');
}
