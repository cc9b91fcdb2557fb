// hidden-text-audit: programmatic API entry point
// This module re-exports the public API for consumers using the library as a dependency.

// ── Core types ────────────────────────────────────────────────────────
export type {
  RGB,
  BoundingBox,
  TextSpan,
  PageBounds,
  SpanDocument,
  VisibilityCategory,
  HiddenCategory,
  VisibilityVerdict,
  RiskLevel,
  PatternId,
  RiskIssue,
  RiskAssessment,
  VisibilityThresholds,
  RiskThresholds,
  ScanScope,
  AnalysisConfig,
  DocumentAnalysis,
  DocumentOutcome,
  ScanStatus,
  SanitizationStrategy,
  SanitizationReport,
  ReportFormat,
} from './core/types.js';

// ── Plugin interfaces ─────────────────────────────────────────────────
export { SpanDocumentError, type SpanSource } from './plugins/interfaces.js';
export { jsonSpanSource, parseSpanDocument } from './plugins/json-spans/loader.js';

// ── Config ────────────────────────────────────────────────────────────
export { auditConfigSchema, type AuditConfigInput, type AuditConfigResolved } from './config/schema.js';
export { DEFAULT_CONFIG, DEFAULT_ANALYSIS_CONFIG, toAnalysisConfig } from './config/defaults.js';
export { loadConfig, ConfigError } from './config/loader.js';

// ── Engine ────────────────────────────────────────────────────────────
export {
  contrastRatio,
  effectiveContrast,
  compositeOver,
  relativeLuminance,
  srgbToLinear,
  formatRatio,
  parseColor,
  toHex,
} from './core/color-utils.js';
export {
  classifySpan,
  CATEGORY_SEVERITY_ORDER,
  UNPERCEIVABLE_CATEGORIES,
  HARD_TO_READ_CATEGORIES,
} from './core/visibility-classifier.js';
export { INJECTION_PATTERNS, scanForInjection, collectScanText, describePattern, type InjectionPattern } from './core/injection-patterns.js';
export { aggregateRisk, levelForScore, statusFor, unperceivableCount, CATEGORY_WEIGHTS, RISK_BANDS } from './core/risk-aggregator.js';
export { buildRecommendations } from './core/recommendations.js';
export { sanitizeSpans, type SanitizeOptions } from './core/sanitizer.js';

// ── Pipeline ──────────────────────────────────────────────────────────
export {
  analyzeDocument,
  cleanDocument,
  loadDocument,
  runScan,
  exitCodeFor,
  EXIT_CODES,
  type CleanResult,
  type ExitCode,
  type ScanOptions,
  type ScanRunResult,
} from './core/pipeline.js';

// ── Reports ───────────────────────────────────────────────────────────
export { toScanResponse, generateJsonReport, type ScanResponse } from './core/report/json.js';
export { generateReport } from './core/report/markdown.js';
export { formatTextReport } from './core/report/text.js';
