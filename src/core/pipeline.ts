import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { relative, resolve } from 'node:path';
import { globSync } from 'glob';
import { DEFAULT_ANALYSIS_CONFIG } from '../config/defaults.js';
import { jsonSpanSource } from '../plugins/json-spans/loader.js';
import { SpanDocumentError, type SpanSource } from '../plugins/interfaces.js';
import { collectScanText, scanForInjection } from './injection-patterns.js';
import { aggregateRisk, statusFor } from './risk-aggregator.js';
import { sanitizeSpans, type SanitizeOptions } from './sanitizer.js';
import { classifySpan } from './visibility-classifier.js';
import { generateReport } from './report/markdown.js';
import { generateJsonReport } from './report/json.js';
import type {
  AnalysisConfig,
  DocumentAnalysis,
  DocumentOutcome,
  PageBounds,
  ReportFormat,
  SanitizationReport,
  SpanDocument,
} from './types.js';

const MAX_REPORT_COUNTER = 100;

/** Process exit codes for the scan command */
export const EXIT_CODES = {
  SAFE: 1,
  SUSPICIOUS: 2,
  ERROR: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export interface ScanRunResult {
  documents: DocumentOutcome[];
  report: string;
  /** Where the report was written */
  reportPath: string;
  exitCode: ExitCode;
}

export interface ScanOptions {
  /** Span document glob patterns (e.g., ['docs/**\/*.spans.json']) */
  src: string[];

  /** Project root directory */
  cwd: string;

  /** Engine thresholds */
  analysis: AnalysisConfig;

  /** Report output directory */
  reportDir: string;

  /** Report format */
  format: ReportFormat;

  /** Reader for the span files. Defaults to the JSON span format */
  source?: SpanSource;

  /** If true, print progress to stderr */
  verbose?: boolean;
}

function log(verbose: boolean | undefined, msg: string): void {
  if (verbose) console.error(msg);
}

/**
 * Classifies every span of a document, scans the selected text for
 * prompt-injection phrasing and aggregates the document risk.
 * Pure: no I/O, no shared state.
 */
export function analyzeDocument(
  document: SpanDocument,
  config: AnalysisConfig = DEFAULT_ANALYSIS_CONFIG,
): DocumentAnalysis {
  const bounds = new Map<number, PageBounds>();
  for (const page of document.pages) {
    bounds.set(page.page, page);
  }

  const verdicts = document.spans.map((span) =>
    classifySpan(
      span,
      bounds.get(span.page) ?? { page: span.page, ...config.pageSize },
      config.visibility,
    ),
  );

  const matches = scanForInjection(collectScanText(verdicts, config.scanScope));
  const assessment = aggregateRisk(verdicts, matches, config.risk);

  return { verdicts, assessment };
}

/**
 * Reads one span file through the given source.
 * Read and parse failures surface as SpanDocumentError.
 */
export function loadDocument(filePath: string, source: SpanSource = jsonSpanSource): SpanDocument {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new SpanDocumentError(`File read error: ${message}`, filePath, { cause: err });
  }
  return source.parse(content, filePath);
}

/**
 * Scan exit code: any suspicious document wins, then any failure
 * (or nothing to scan), otherwise safe.
 */
export function exitCodeFor(documents: readonly DocumentOutcome[]): ExitCode {
  const suspicious = documents.some(
    (d) => d.kind === 'scanned' && statusFor(d.analysis.assessment) === 'SUSPICIOUS',
  );
  if (suspicious) return EXIT_CODES.SUSPICIOUS;
  if (documents.length === 0 || documents.some((d) => d.kind === 'failed')) {
    return EXIT_CODES.ERROR;
  }
  return EXIT_CODES.SAFE;
}

/**
 * Generates a unique report path: {reportDir}/scan-YYYY-MM-DD.{ext}
 * If that file exists, appends -1, -2, etc. Never overwrites: throws once
 * every numbered name for the day is taken.
 */
function getOutputPath(reportDir: string, format: ReportFormat): string {
  mkdirSync(reportDir, { recursive: true });

  const ext = format === 'json' ? 'json' : 'md';
  const today = new Date().toISOString().slice(0, 10);
  const baseName = `scan-${today}`;

  const firstPath = resolve(reportDir, `${baseName}.${ext}`);
  if (!existsSync(firstPath)) return firstPath;

  for (let counter = 1; counter <= MAX_REPORT_COUNTER; counter++) {
    const candidate = resolve(reportDir, `${baseName}-${counter}.${ext}`);
    if (!existsSync(candidate)) return candidate;
  }
  throw new Error(
    `No free report name in ${reportDir}: ${baseName}.${ext} through -${MAX_REPORT_COUNTER} exist`,
  );
}

/**
 * Runs the full scan:
 * 1. Expand span file globs
 * 2. Load + analyze each document (a failing file never aborts the others)
 * 3. Generate and write the report
 */
export function runScan(options: ScanOptions): ScanRunResult {
  const { cwd, analysis, reportDir, format, verbose } = options;
  const source = options.source ?? jsonSpanSource;
  const patterns = options.src.length > 0 ? options.src : source.filePatterns;

  log(verbose, '[hidden-text-audit] Collecting span files...');
  const filePaths = [
    ...new Set(
      patterns.flatMap((pattern) =>
        globSync(pattern, { cwd, absolute: true, nodir: true, ignore: ['**/node_modules/**'] }),
      ),
    ),
  ].sort();
  log(verbose, `  ${filePaths.length} files matched`);

  const documents: DocumentOutcome[] = [];
  for (const filePath of filePaths) {
    const relPath = relative(cwd, filePath);
    try {
      const document = loadDocument(filePath, source);
      const result = analyzeDocument(document, analysis);
      log(
        verbose,
        `  ${relPath}: ${result.assessment.hiddenSpans}/${result.assessment.totalSpans} hidden, ${result.assessment.level}`,
      );
      documents.push({ kind: 'scanned', file: relPath, analysis: result });
    } catch (err) {
      if (!(err instanceof SpanDocumentError)) throw err;
      console.warn(`[hidden-text-audit] Skipping ${relPath}: ${err.message}`);
      documents.push({ kind: 'failed', file: relPath, error: err.message });
    }
  }

  log(verbose, '[hidden-text-audit] Generating report...');
  const report = format === 'json' ? generateJsonReport(documents) : generateReport(documents);

  const outputPath = getOutputPath(resolve(cwd, reportDir), format);
  writeFileSync(outputPath, report, 'utf-8');
  log(verbose, `Report saved to: ${relative(cwd, outputPath)}`);

  return { documents, report, reportPath: outputPath, exitCode: exitCodeFor(documents) };
}

export interface CleanResult {
  analysis: DocumentAnalysis;
  sanitization: SanitizationReport;
}

/**
 * Analyzes a document and strips or flags its hidden text.
 * Without an explicit strategy the document's risk level picks one.
 */
export function cleanDocument(
  document: SpanDocument,
  config: AnalysisConfig,
  options: SanitizeOptions,
): CleanResult {
  const analysis = analyzeDocument(document, config);
  const sanitization = sanitizeSpans(analysis.verdicts, {
    ...options,
    riskLevel: options.riskLevel ?? analysis.assessment.level,
  });
  return { analysis, sanitization };
}
