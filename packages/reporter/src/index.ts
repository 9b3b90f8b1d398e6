export {
  ReportOrchestrator,
  renderResultsJson,
  type ReportConfig,
  type ReportOutcome,
  type ReportStatus,
} from './engine/orchestrator.js';
export {
  PLACEHOLDERS,
  REPORT_FILES,
  type ComparisonInput,
  type ReportFileName,
  type TableFormat,
} from './model/report.js';
export { renderMarkdownReport } from './render/markdown.js';
export { renderTextReport, renderTextGrid } from './render/text.js';
export {
  COMPARISON_COLUMNS,
  buildComparisonRows,
  type ComparisonColumn,
} from './render/columns.js';
export { buildRatioLines, computeTimeRatio, type RatioLine } from './render/ratio.js';
export { CAPABILITY_MATRIX, CAPABILITY_TOOLS } from './render/capabilities.js';
export {
  CHART_METRICS,
  buildGroupedBarChart,
  layoutBars,
  renderBarChartSvg,
  synthesizeCharts,
  type ChartMetric,
  type GroupedBarChart,
} from './charts/bar-chart.js';
export {
  ARCHITECTURE_TEXT,
  renderArchitectureDiagram,
  renderArchitectureSvg,
} from './diagram/architecture.js';
export { emitArtifact, writeArtifact, type ArtifactOutcome } from './io/write-artifact.js';
export { runCli, runGenerateCommand, exitCodeFor } from './cli.js';
