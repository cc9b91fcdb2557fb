import { effectiveContrast, formatRatio } from './color-utils.js';
import type {
  BoundingBox,
  HiddenCategory,
  PageBounds,
  TextSpan,
  VisibilityThresholds,
  VisibilityVerdict,
} from './types.js';

/**
 * Hidden categories from most to least severe.
 * The first triggered entry becomes the verdict's primary category.
 */
export const CATEGORY_SEVERITY_ORDER: readonly HiddenCategory[] = [
  'INVISIBLE',
  'MICROSCOPIC',
  'OFFSCREEN',
  'LOW_CONTRAST',
  'SMALL',
];

/** Categories no reader can make out: stripped by the sanitizer, counted by the HIGH floor */
export const UNPERCEIVABLE_CATEGORIES: ReadonlySet<HiddenCategory> = new Set([
  'INVISIBLE',
  'MICROSCOPIC',
  'OFFSCREEN',
]);

/** Categories a reader can still make out with effort */
export const HARD_TO_READ_CATEGORIES: ReadonlySet<HiddenCategory> = new Set([
  'LOW_CONTRAST',
  'SMALL',
]);

export const INSUFFICIENT_METADATA_REASON = 'insufficient metadata to assess';
export const MALFORMED_BBOX_REASON = 'malformed bounding box, position not assessed';
export const INVALID_FONT_SIZE_REASON = 'invalid font size, not assessed';
export const ZERO_AREA_REASON = 'zero-area bounding box';

/**
 * Classifies a single span against three independent criteria:
 *
 *   1. Position: bbox entirely outside the page => OFFSCREEN,
 *      bbox with no width or no height => INVISIBLE
 *   2. Contrast: only when both colors are known => INVISIBLE / LOW_CONTRAST
 *   3. Font size: only when known => MICROSCOPIC / SMALL
 *
 * Triggered categories are unioned and their reasons kept in criterion order.
 * A span nothing could be assessed on stays VISIBLE and says so in its reasons.
 */
export function classifySpan(
  span: TextSpan,
  page: PageBounds,
  thresholds: VisibilityThresholds,
): VisibilityVerdict {
  const triggered = new Set<HiddenCategory>();
  const reasons: string[] = [];

  // ── Position ──────────────────────────────────────────────────────
  if (!isWellFormedBox(span.bbox)) {
    reasons.push(MALFORMED_BBOX_REASON);
  } else {
    if (isOutsidePage(span.bbox, page)) {
      triggered.add('OFFSCREEN');
      reasons.push(`positioned outside the page (${page.width}x${page.height})`);
    }
    if (hasZeroArea(span.bbox)) {
      triggered.add('INVISIBLE');
      reasons.push(ZERO_AREA_REASON);
    }
  }

  // ── Contrast ──────────────────────────────────────────────────────
  let ratio: number | undefined;
  if (span.color !== undefined && span.backgroundColor !== undefined) {
    ratio = effectiveContrast(span.color, span.backgroundColor);
    if (ratio < thresholds.invisibleContrastThreshold) {
      triggered.add('INVISIBLE');
      reasons.push(`nearly invisible (contrast: ${formatRatio(ratio)})`);
    } else if (ratio < thresholds.contrastThreshold) {
      triggered.add('LOW_CONTRAST');
      reasons.push(`low contrast (${formatRatio(ratio)})`);
    }
  }

  // ── Font size ─────────────────────────────────────────────────────
  let fontAssessed = false;
  if (span.fontSize !== undefined) {
    const size = span.fontSize;
    if (!Number.isFinite(size) || size < 0) {
      reasons.push(INVALID_FONT_SIZE_REASON);
    } else {
      fontAssessed = true;
      if (size < thresholds.microscopicFontSize) {
        triggered.add('MICROSCOPIC');
        reasons.push(`impossible to read, ${formatPoints(size)}pt`);
      } else if (size < thresholds.smallFontSize) {
        triggered.add('SMALL');
        reasons.push(`very difficult to read, ${formatPoints(size)}pt`);
      }
    }
  }

  const categories = CATEGORY_SEVERITY_ORDER.filter((c) => triggered.has(c));
  const category = categories[0] ?? 'VISIBLE';

  if (category === 'VISIBLE' && ratio === undefined && !fontAssessed) {
    reasons.push(INSUFFICIENT_METADATA_REASON);
  }

  return {
    category,
    categories,
    reasons,
    isHidden: category !== 'VISIBLE',
    ...(ratio !== undefined ? { contrastRatio: ratio } : {}),
    span,
  };
}

/** @internal Exported for unit testing */
export function isWellFormedBox(bbox: BoundingBox): boolean {
  const [x0, y0, x1, y1] = bbox;
  return (
    [x0, y0, x1, y1].every((n) => Number.isFinite(n)) &&
    x1 >= x0 &&
    y1 >= y0
  );
}

/** @internal Exported for unit testing. Expects a well-formed box */
export function hasZeroArea(bbox: BoundingBox): boolean {
  const [x0, y0, x1, y1] = bbox;
  return x1 === x0 || y1 === y0;
}

/** @internal Exported for unit testing */
export function isOutsidePage(bbox: BoundingBox, page: PageBounds): boolean {
  const [x0, y0, x1, y1] = bbox;
  return x1 < 0 || y1 < 0 || x0 > page.width || y0 > page.height;
}

/** 3 -> "3.0", 0.5 -> "0.5" */
function formatPoints(size: number): string {
  return Number.isInteger(size) ? size.toFixed(1) : String(size);
}
