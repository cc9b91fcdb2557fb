import { describePattern } from '../injection-patterns.js';
import { buildRecommendations } from '../recommendations.js';
import { statusFor } from '../risk-aggregator.js';
import type { DocumentOutcome, RiskAssessment, RiskIssue } from '../types.js';
import { truncateText } from './json.js';

type ScannedDocument = Extract<DocumentOutcome, { kind: 'scanned' }>;
type FailedDocument = Extract<DocumentOutcome, { kind: 'failed' }>;

const MAX_ISSUES_PER_DOCUMENT = 50;

/**
 * Generates a Markdown scan report.
 * One section per document, issues grouped by page.
 */
export function generateReport(documents: DocumentOutcome[]): string {
  const now = new Date().toISOString().replace('T', ' ').slice(0, 19);
  const lines: string[] = [];

  lines.push('# Hidden Text Scan Report');
  lines.push(`> Generated: ${now}`);
  lines.push('');

  const scanned = documents.filter((d): d is ScannedDocument => d.kind === 'scanned');
  const failed = documents.filter((d): d is FailedDocument => d.kind === 'failed');
  const suspicious = scanned.filter((d) => statusFor(d.analysis.assessment) === 'SUSPICIOUS');
  const totalSpans = scanned.reduce((s, d) => s + d.analysis.assessment.totalSpans, 0);
  const hiddenSpans = scanned.reduce((s, d) => s + d.analysis.assessment.hiddenSpans, 0);
  const injected = scanned.filter((d) => d.analysis.assessment.promptInjectionDetected);

  lines.push('## Summary');
  lines.push('');
  lines.push('| Metric | Value |');
  lines.push('|--------|-------|');
  lines.push(`| Documents scanned | ${scanned.length} |`);
  lines.push(`| **Suspicious documents** | **${suspicious.length}** |`);
  lines.push(`| Prompt injection found | ${injected.length} |`);
  lines.push(`| Text spans analyzed | ${totalSpans} |`);
  lines.push(`| Hidden spans | ${hiddenSpans} |`);
  lines.push(`| Failed to load | ${failed.length} |`);
  lines.push('');

  for (const { file, analysis } of scanned) {
    const { assessment } = analysis;
    lines.push(`## \`${file}\``);
    lines.push('');
    lines.push(
      `**${statusFor(assessment)}**: risk ${assessment.level} (score ${assessment.score}/100), ` +
        `${assessment.hiddenSpans} of ${assessment.totalSpans} spans hidden`,
    );
    lines.push('');

    if (assessment.promptInjectionDetected) {
      lines.push('### Prompt injection patterns');
      lines.push('');
      for (const id of assessment.promptInjectionPatterns) {
        lines.push(`- \`${id}\`: ${describePattern(id) ?? 'unknown pattern'}`);
      }
      lines.push('');
    }

    pushIssues(lines, assessment);

    lines.push('### Recommendations');
    lines.push('');
    for (const advice of buildRecommendations(assessment)) {
      lines.push(`- ${advice}`);
    }
    lines.push('');
  }

  if (failed.length > 0) {
    lines.push('## Failed Documents');
    lines.push('');
    lines.push('| File | Error |');
    lines.push('|------|-------|');
    for (const d of failed) {
      lines.push(`| ${d.file} | ${escapeCell(d.error)} |`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

function pushIssues(lines: string[], assessment: RiskAssessment): void {
  if (assessment.issues.length === 0) {
    lines.push('No hidden text found.');
    lines.push('');
    return;
  }

  for (const [page, issues] of groupByPage(assessment.issues)) {
    lines.push(`### Page ${page}`);
    lines.push('');
    lines.push('| Severity | Text | Reasons |');
    lines.push('|----------|------|---------|');
    for (const issue of issues) {
      lines.push(
        `| ${issue.category} | ${escapeCell(truncateText(issue.text))} | ${escapeCell(issue.reasons.join('; '))} |`,
      );
    }
    lines.push('');
  }

  const omitted = assessment.issues.length - MAX_ISSUES_PER_DOCUMENT;
  if (omitted > 0) {
    lines.push(`_${omitted} more hidden spans not shown._`);
    lines.push('');
  }
}

/** Groups issues by page, keeping at most MAX_ISSUES_PER_DOCUMENT in total */
function groupByPage(issues: readonly RiskIssue[]): Map<number, RiskIssue[]> {
  const map = new Map<number, RiskIssue[]>();

  for (const issue of issues.slice(0, MAX_ISSUES_PER_DOCUMENT)) {
    const existing = map.get(issue.page);
    if (existing) {
      existing.push(issue);
    } else {
      map.set(issue.page, [issue]);
    }
  }

  return map;
}

function escapeCell(value: string): string {
  return value.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}
