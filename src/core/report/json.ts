import { statusFor } from '../risk-aggregator.js';
import type {
  DocumentOutcome,
  HiddenCategory,
  PatternId,
  RiskAssessment,
  RiskLevel,
  ScanStatus,
} from '../types.js';

const MAX_ISSUE_TEXT = 100;

/** JSON response for one analyzed document */
export interface ScanResponse {
  status: ScanStatus;
  risk_score: number;
  risk_level: RiskLevel;
  total_spans: number;
  hidden_spans: number;
  issues: {
    page: number;
    text: string;
    severity: HiddenCategory;
    reasons: string[];
  }[];
  prompt_injection: boolean;
  prompt_injection_patterns: PatternId[];
}

/** Cuts long span text to MAX_ISSUE_TEXT characters plus "..." */
export function truncateText(text: string, max: number = MAX_ISSUE_TEXT): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

/**
 * Maps an assessment onto the JSON response consumed by presentation layers.
 */
export function toScanResponse(assessment: RiskAssessment): ScanResponse {
  return {
    status: statusFor(assessment),
    risk_score: assessment.score,
    risk_level: assessment.level,
    total_spans: assessment.totalSpans,
    hidden_spans: assessment.hiddenSpans,
    issues: assessment.issues.map((issue) => ({
      page: issue.page,
      text: truncateText(issue.text),
      severity: issue.category,
      reasons: [...issue.reasons],
    })),
    prompt_injection: assessment.promptInjectionDetected,
    prompt_injection_patterns: [...assessment.promptInjectionPatterns],
  };
}

/**
 * Generates a structured JSON scan report for a set of documents.
 * Includes summary statistics and one response per scanned document.
 */
export function generateJsonReport(documents: DocumentOutcome[]): string {
  const scanned = documents.flatMap((d) => (d.kind === 'scanned' ? [d] : []));

  return JSON.stringify(
    {
      timestamp: new Date().toISOString(),
      summary: {
        documentsScanned: scanned.length,
        documentsFailed: documents.length - scanned.length,
        suspiciousDocuments: scanned.filter(
          (d) => statusFor(d.analysis.assessment) === 'SUSPICIOUS',
        ).length,
        totalSpans: scanned.reduce((s, d) => s + d.analysis.assessment.totalSpans, 0),
        hiddenSpans: scanned.reduce((s, d) => s + d.analysis.assessment.hiddenSpans, 0),
        promptInjectionDocuments: scanned.filter(
          (d) => d.analysis.assessment.promptInjectionDetected,
        ).length,
      },
      documents: documents.map((d) =>
        d.kind === 'scanned'
          ? { file: d.file, ...toScanResponse(d.analysis.assessment) }
          : { file: d.file, error: d.error },
      ),
    },
    null,
    2,
  );
}
