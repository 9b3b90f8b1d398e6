import type { MetricSample, ResultSet, Scenario, Tool } from '@portbench/core';

export interface RatioLine {
  scenario: Scenario;
  subject: Tool;
  reference: Tool;
  /** subject elapsed / reference elapsed */
  ratio: number;
  text: string;
}

/**
 * Elapsed-time ratio of two samples, or `undefined` when either operand is
 * missing or the denominator is not strictly positive.
 */
export function computeTimeRatio(
  subject: MetricSample,
  reference: MetricSample
): number | undefined {
  const numerator = subject.elapsedSeconds;
  const denominator = reference.elapsedSeconds;
  if (numerator === undefined || denominator === undefined || !(denominator > 0)) {
    return undefined;
  }
  return numerator / denominator;
}

function describeRatio(subject: Tool, reference: Tool, ratio: number): string | undefined {
  if (ratio >= 1) {
    return `${subject.label} is ${ratio.toFixed(1)}x slower than ${reference.label}`;
  }
  if (ratio > 0) {
    return `${subject.label} is ${(1 / ratio).toFixed(1)}x faster than ${reference.label}`;
  }
  return undefined;
}

/**
 * Baseline tool against every other tool, per scenario. Pairs that cannot be
 * compared produce no line at all.
 */
export function buildRatioLines(resultSet: ResultSet, baselineTool: string): RatioLine[] {
  const subject = resultSet.tools.find((tool) => tool.id === baselineTool);
  if (!subject) {
    return [];
  }
  const lines: RatioLine[] = [];
  for (const scenario of resultSet.scenarios) {
    if (!resultSet.has(subject.id, scenario.key)) {
      continue;
    }
    for (const reference of resultSet.tools) {
      if (reference.id === subject.id || !resultSet.has(reference.id, scenario.key)) {
        continue;
      }
      const ratio = computeTimeRatio(
        resultSet.get(subject.id, scenario.key),
        resultSet.get(reference.id, scenario.key)
      );
      if (ratio === undefined) {
        continue;
      }
      const text = describeRatio(subject, reference, ratio);
      if (text) {
        lines.push({ scenario, subject, reference, ratio, text });
      }
    }
  }
  return lines;
}
