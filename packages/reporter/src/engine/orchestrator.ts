import {
  aggregateRun,
  type Logger,
  type MissingInputError,
  type TestPlan,
} from '@portbench/core';

import { synthesizeCharts } from '../charts/bar-chart.js';
import { renderArchitectureDiagram } from '../diagram/architecture.js';
import { emitArtifact, type ArtifactOutcome } from '../io/write-artifact.js';
import { REPORT_FILES, type ComparisonInput } from '../model/report.js';
import { renderMarkdownReport } from '../render/markdown.js';
import { renderTextReport } from '../render/text.js';

export interface ReportConfig {
  resultsDir: string;
  outDir: string;
  /** Defaults to `<resultsDir>/summary.json`. */
  manifestPath?: string;
  plan: TestPlan;
  logger: Logger;
}

export type ReportStatus = 'success' | 'partial' | 'failed';

export interface ReportOutcome {
  status: ReportStatus;
  artifacts: ArtifactOutcome[];
  warnings: string[];
  degraded: boolean;
  /** Set when status is `failed`. */
  error?: MissingInputError;
}

export function renderResultsJson(input: ComparisonInput, warnings: readonly string[]): string {
  const document = {
    meta: {
      timestamp: input.meta.timestamp ?? null,
      target: input.meta.target ?? null,
      manifest: input.meta.manifestPath,
      degraded: input.degraded,
    },
    tools: input.resultSet.tools,
    scenarios: input.resultSet.scenarios,
    results: input.resultSet.toJSON(),
    warnings,
  };
  return `${JSON.stringify(document, null, 2)}\n`;
}

/**
 * One report-generation run: aggregate, then write every artifact
 * independently. Only a missing mandatory input stops the run.
 */
export class ReportOrchestrator {
  constructor(private readonly config: ReportConfig) {}

  async run(): Promise<ReportOutcome> {
    const { plan, resultsDir, outDir, manifestPath, logger } = this.config;
    const aggregated = await aggregateRun({ plan, resultsDir, manifestPath, logger });
    if (!aggregated.ok) {
      logger.error(aggregated.error.message);
      return {
        status: 'failed',
        artifacts: [],
        warnings: [],
        degraded: true,
        error: aggregated.error,
      };
    }

    const { resultSet, meta, degraded, warnings } = aggregated.value;
    const input: ComparisonInput = { resultSet, plan, meta, degraded };

    const artifacts: ArtifactOutcome[] = [
      await emitArtifact(outDir, REPORT_FILES.markdownTable, () =>
        `${renderMarkdownReport(input)}\n`
      ),
      await emitArtifact(outDir, REPORT_FILES.textTable, () => `${renderTextReport(input)}\n`),
      await emitArtifact(outDir, REPORT_FILES.results, () =>
        renderResultsJson(input, warnings)
      ),
      ...(await synthesizeCharts(resultSet, outDir)),
      await renderArchitectureDiagram(outDir),
    ];

    for (const artifact of artifacts) {
      if (artifact.written) {
        logger.info(`Wrote ${artifact.path}`);
      } else {
        logger.error(artifact.error?.message ?? `Failed to write ${artifact.path}`);
      }
    }

    return {
      status: artifacts.every((artifact) => artifact.written) ? 'success' : 'partial',
      artifacts,
      warnings,
      degraded,
    };
  }
}
