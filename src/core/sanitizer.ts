import type {
  RiskLevel,
  SanitizationReport,
  SanitizationStrategy,
  VisibilityVerdict,
} from './types.js';
import { HARD_TO_READ_CATEGORIES } from './visibility-classifier.js';

const MAX_REMOVED_SAMPLES = 10;

export interface SanitizeOptions {
  /** Explicit strategy. When omitted, picked from riskLevel */
  strategy?: SanitizationStrategy;
  riskLevel?: RiskLevel;
  /** Strategy used when neither strategy nor a decisive riskLevel is given */
  defaultStrategy: SanitizationStrategy;
  /** strip: also remove LOW_CONTRAST / SMALL spans */
  removeSuspicious: boolean;
  /** flag: prefix for LOW_CONTRAST / SMALL spans */
  flagPrefix: string;
}

type SpanAction = 'keep' | 'flag' | 'remove';

/**
 * Produces the text that is safe to hand to a language model.
 *
 *   strip: drop unperceivable spans (and hard-to-read ones with removeSuspicious)
 *   flag: drop unperceivable spans, prefix hard-to-read ones
 *   preserve: keep everything
 */
export function sanitizeSpans(
  verdicts: readonly VisibilityVerdict[],
  options: SanitizeOptions,
): SanitizationReport {
  const strategy = options.strategy ?? pickStrategy(options.riskLevel, options.defaultStrategy);

  const kept: { verdict: VisibilityVerdict; flagged: boolean }[] = [];
  const removed: VisibilityVerdict[] = [];

  for (const verdict of verdicts) {
    const action = actionFor(verdict, strategy, options.removeSuspicious);
    if (action === 'remove') {
      removed.push(verdict);
    } else {
      kept.push({ verdict, flagged: action === 'flag' });
    }
  }

  const safeText = sortByReadingOrder(kept)
    .map(({ verdict, flagged }) =>
      flagged ? `${options.flagPrefix}${verdict.span.text}` : verdict.span.text,
    )
    .join(' ');

  return {
    originalSpanCount: verdicts.length,
    keptSpanCount: kept.length,
    removedCount: removed.length,
    flaggedCount: kept.filter((k) => k.flagged).length,
    strategy,
    removedTextSample: removed.slice(0, MAX_REMOVED_SAMPLES).map((v) => v.span.text),
    safeText,
  };
}

/** HIGH/CRITICAL documents are stripped, MEDIUM ones flagged */
export function pickStrategy(
  riskLevel: RiskLevel | undefined,
  fallback: SanitizationStrategy,
): SanitizationStrategy {
  if (riskLevel === 'HIGH' || riskLevel === 'CRITICAL') return 'strip';
  if (riskLevel === 'MEDIUM') return 'flag';
  return fallback;
}

function actionFor(
  verdict: VisibilityVerdict,
  strategy: SanitizationStrategy,
  removeSuspicious: boolean,
): SpanAction {
  if (strategy === 'preserve' || verdict.category === 'VISIBLE') return 'keep';

  if (!HARD_TO_READ_CATEGORIES.has(verdict.category)) return 'remove';

  if (strategy === 'flag') return 'flag';
  return removeSuspicious ? 'remove' : 'keep';
}

/** Page, then top edge, then left edge. Stable for equal or malformed boxes */
function sortByReadingOrder<T extends { verdict: VisibilityVerdict }>(items: T[]): T[] {
  return [...items].sort((a, b) => {
    const sa = a.verdict.span;
    const sb = b.verdict.span;
    return (
      sa.page - sb.page ||
      orderDelta(sa.bbox[1], sb.bbox[1]) ||
      orderDelta(sa.bbox[0], sb.bbox[0])
    );
  });
}

function orderDelta(a: number, b: number): number {
  const d = a - b;
  return Number.isNaN(d) ? 0 : d;
}
