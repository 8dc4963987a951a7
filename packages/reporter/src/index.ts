// @qoslens/reporter entry point
//
// Baseline vs. treatment comparison model, text/Markdown/JSON renderers,
// SVG charts and the artifact writer used by the CLI.

export * from './model/comparison.js';
export {
  DEFAULT_LABELS,
  DEFAULT_REPORT_TITLE,
  KEY_FINDING_NARRATIVE,
  buildComparison,
  improvementPct,
  type BuildComparisonOptions,
} from './engine/comparison-builder.js';

// Renderers
export { renderTextReport, WAF_ESTIMATE_NOTE } from './render/text.js';
export { renderMarkdownReport } from './render/markdown.js';
export {
  COMPARISON_SCHEMA_PATH,
  renderJsonReport,
  validateComparisonDocument,
} from './render/json.js';
export { formatFixed, formatImprovement, formatSigned } from './render/format.js';

// Charts
export {
  CHART_FILES,
  MAX_CDF_POINTS,
  TAIL_METRICS,
  cdfPoints,
  createChartRenderer,
  type ChartKind,
  type ChartRenderer,
} from './charts/renderer.js';
export {
  DEFAULT_CHART_THEME,
  resolveChartTheme,
  type ChartTheme,
} from './charts/theme.js';
export { escapeXml } from './charts/svg.js';

// Artifacts
export {
  REPORT_FILES,
  REPORT_FORMATS,
  writeAnalysisArtifacts,
  type ArtifactResult,
  type ReportFormat,
  type WriteArtifactsOptions,
  type WrittenArtifact,
} from './artifacts/writer.js';
