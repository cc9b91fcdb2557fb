import { buildRecommendations } from '../recommendations.js';
import { statusFor } from '../risk-aggregator.js';
import type { DocumentAnalysis } from '../types.js';
import { truncateText } from './json.js';

const PREVIEW_LENGTH = 40;
const MAX_LISTED_ISSUES = 10;

export interface TextReportOptions {
  /** Adds per-span reasons and recommendations */
  verbose?: boolean;
}

/**
 * Renders the terminal summary for one document.
 */
export function formatTextReport(
  file: string,
  analysis: DocumentAnalysis,
  options: TextReportOptions = {},
): string {
  const { assessment } = analysis;
  const lines: string[] = [];

  lines.push(`Scanning: ${file}`);
  lines.push(`  Status: ${statusFor(assessment)}`);
  lines.push(`  Spans: ${assessment.totalSpans} total, ${assessment.hiddenSpans} hidden`);
  lines.push(`  Risk: ${assessment.level} (score ${assessment.score}/100)`);

  if (assessment.promptInjectionDetected) {
    lines.push(
      `  WARNING: Prompt injection detected (${assessment.promptInjectionPatterns.join(', ')})`,
    );
  }

  if (assessment.issues.length > 0) {
    lines.push('  Hidden text:');
    for (const issue of assessment.issues.slice(0, MAX_LISTED_ISSUES)) {
      lines.push(
        `    [page ${issue.page}] ${issue.category} '${truncateText(issue.text, PREVIEW_LENGTH)}'`,
      );
      if (options.verbose) {
        for (const reason of issue.reasons) {
          lines.push(`      - ${reason}`);
        }
      }
    }
    if (assessment.issues.length > MAX_LISTED_ISSUES) {
      lines.push(`    ... ${assessment.issues.length - MAX_LISTED_ISSUES} more`);
    }
  }

  if (options.verbose) {
    lines.push('  Recommendations:');
    for (const advice of buildRecommendations(assessment)) {
      lines.push(`    - ${advice}`);
    }
  }

  return lines.join('\n');
}
