import type {
  HiddenCategory,
  PatternId,
  RiskAssessment,
  RiskIssue,
  RiskLevel,
  RiskThresholds,
  ScanStatus,
  VisibilityVerdict,
} from './types.js';
import { CATEGORY_SEVERITY_ORDER, UNPERCEIVABLE_CATEGORIES } from './visibility-classifier.js';

/** Points each hidden span adds, by primary category */
export const CATEGORY_WEIGHTS: Readonly<Record<HiddenCategory, number>> = {
  INVISIBLE: 15,
  MICROSCOPIC: 12,
  OFFSCREEN: 10,
  LOW_CONTRAST: 6,
  SMALL: 4,
};

/** Most points a single category can contribute before density scaling */
export const CATEGORY_CONTRIBUTION_CAP = 60;

export const MAX_SCORE = 100;

/** Lower bounds applied after weighting */
export const HIGH_FLOOR = 60;
export const MEDIUM_FLOOR = 30;
export const PROMPT_INJECTION_FLOOR = 70;

/**
 * Score bands, highest first. A score maps to the first band whose
 * minimum it reaches.
 */
export const RISK_BANDS: readonly { min: number; level: RiskLevel }[] = [
  { min: 85, level: 'CRITICAL' },
  { min: 60, level: 'HIGH' },
  { min: 30, level: 'MEDIUM' },
  { min: 1, level: 'LOW' },
  { min: 0, level: 'SAFE' },
];

/**
 * Aggregates per-span verdicts and prompt-injection matches into a
 * document-level assessment.
 *
 * Scoring:
 *   1. Sum category weights over hidden spans (per-category cap, total cap)
 *   2. Scale by hidden density: weighted * (0.5 + 0.5 * hidden / total)
 *   3. Raise to the HIGH floor when unperceivable spans (INVISIBLE, MICROSCOPIC,
 *      OFFSCREEN) reach invisibleSpanThreshold,
 *      to the MEDIUM floor when hidden spans reach suspiciousSpanThreshold
 *   4. Raise to the prompt-injection floor on any pattern match
 *
 * Floors only ever raise the score. An empty document is SAFE with score 0;
 * matches passed in for it are not reported, since there is no span they
 * could have come from.
 */
export function aggregateRisk(
  verdicts: readonly VisibilityVerdict[],
  promptInjectionMatches: readonly PatternId[],
  thresholds: RiskThresholds,
): RiskAssessment {
  const totalSpans = verdicts.length;
  if (totalSpans === 0) {
    return {
      score: 0,
      level: 'SAFE',
      totalSpans: 0,
      hiddenSpans: 0,
      categoryCounts: emptyCategoryCounts(),
      issues: [],
      promptInjectionPatterns: [],
      promptInjectionDetected: false,
    };
  }

  const hidden = verdicts.filter((v) => v.isHidden);
  const categoryCounts = countCategories(hidden);
  const patterns = [...new Set(promptInjectionMatches)];

  let score = scaledWeightedScore(categoryCounts, hidden.length, totalSpans);

  if (unperceivableCount(categoryCounts) >= thresholds.invisibleSpanThreshold) {
    score = Math.max(score, HIGH_FLOOR);
  }
  if (hidden.length >= thresholds.suspiciousSpanThreshold) {
    score = Math.max(score, MEDIUM_FLOOR);
  }
  if (patterns.length > 0) {
    score = Math.max(score, PROMPT_INJECTION_FLOOR);
  }

  score = Math.min(MAX_SCORE, Math.max(0, score));

  return {
    score,
    level: levelForScore(score),
    totalSpans,
    hiddenSpans: hidden.length,
    categoryCounts,
    issues: buildIssues(hidden),
    promptInjectionPatterns: patterns,
    promptInjectionDetected: patterns.length > 0,
  };
}

/** Maps a 0-100 score onto its risk band */
export function levelForScore(score: number): RiskLevel {
  for (const band of RISK_BANDS) {
    if (score >= band.min) return band.level;
  }
  return 'SAFE';
}

/** SAFE when nothing is hidden and no injection phrase was found */
export function statusFor(assessment: RiskAssessment): ScanStatus {
  return assessment.hiddenSpans === 0 && !assessment.promptInjectionDetected
    ? 'SAFE'
    : 'SUSPICIOUS';
}

/** @internal Exported for unit testing */
export function scaledWeightedScore(
  counts: Readonly<Record<HiddenCategory, number>>,
  hiddenSpans: number,
  totalSpans: number,
): number {
  if (hiddenSpans === 0 || totalSpans === 0) return 0;

  let weighted = 0;
  for (const category of CATEGORY_SEVERITY_ORDER) {
    weighted += Math.min(counts[category] * CATEGORY_WEIGHTS[category], CATEGORY_CONTRIBUTION_CAP);
  }
  weighted = Math.min(weighted, MAX_SCORE);

  const density = Math.min(1, hiddenSpans / totalSpans);
  return Math.round(weighted * (0.5 + 0.5 * density));
}

/** Hidden spans no reader can make out at all */
export function unperceivableCount(counts: Readonly<Record<HiddenCategory, number>>): number {
  let total = 0;
  for (const category of UNPERCEIVABLE_CATEGORIES) {
    total += counts[category];
  }
  return total;
}

function emptyCategoryCounts(): Record<HiddenCategory, number> {
  return { INVISIBLE: 0, MICROSCOPIC: 0, OFFSCREEN: 0, LOW_CONTRAST: 0, SMALL: 0 };
}

function countCategories(hidden: readonly VisibilityVerdict[]): Record<HiddenCategory, number> {
  const counts = emptyCategoryCounts();
  for (const v of hidden) {
    if (v.category !== 'VISIBLE') counts[v.category] += 1;
  }
  return counts;
}

/**
 * One issue per hidden span, pages ascending, source order within a page.
 */
function buildIssues(hidden: readonly VisibilityVerdict[]): RiskIssue[] {
  const byPage = new Map<number, RiskIssue[]>();

  for (const v of hidden) {
    if (v.category === 'VISIBLE') continue;
    const issue: RiskIssue = {
      page: v.span.page,
      category: v.category,
      text: v.span.text,
      reasons: v.reasons,
    };
    const existing = byPage.get(issue.page);
    if (existing) {
      existing.push(issue);
    } else {
      byPage.set(issue.page, [issue]);
    }
  }

  return [...byPage.keys()]
    .sort((a, b) => a - b)
    .flatMap((page) => byPage.get(page) ?? []);
}
