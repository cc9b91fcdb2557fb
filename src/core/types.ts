// ===== Shared Types for Hidden Text Audit =====

/** 8-bit sRGB color, each channel 0-255 */
export interface RGB {
  r: number;
  g: number;
  b: number;
  /** Opacity in [0, 1]; absent means opaque */
  a?: number;
}

/** Bounding box in page coordinate units: [x0, y0, x1, y1] */
export type BoundingBox = readonly [number, number, number, number];

/**
 * A contiguous run of extracted text with its position and styling.
 * Extractors leave a field out when they could not determine it
 * (OCR-derived spans usually carry neither colors nor a font size).
 */
export interface TextSpan {
  readonly text: string;
  /** 1-indexed page number */
  readonly page: number;
  readonly bbox: BoundingBox;
  /** Font size in points */
  readonly fontSize?: number;
  /** Foreground (glyph) color */
  readonly color?: RGB;
  /** Color painted behind the glyphs */
  readonly backgroundColor?: RGB;
}

/** Visible area of a page, same units as TextSpan.bbox */
export interface PageBounds {
  page: number;
  width: number;
  height: number;
}

/** A span document as produced by the extraction layer */
export interface SpanDocument {
  pages: PageBounds[];
  spans: TextSpan[];
}

export type VisibilityCategory =
  | 'VISIBLE'
  | 'LOW_CONTRAST'
  | 'INVISIBLE'
  | 'MICROSCOPIC'
  | 'SMALL'
  | 'OFFSCREEN';

/** Every category except VISIBLE */
export type HiddenCategory = Exclude<VisibilityCategory, 'VISIBLE'>;

export interface VisibilityVerdict {
  /** Most severe triggered category, VISIBLE when nothing triggered */
  readonly category: VisibilityCategory;
  /** All triggered categories, most severe first */
  readonly categories: readonly HiddenCategory[];
  readonly reasons: readonly string[];
  readonly isHidden: boolean;
  /** WCAG contrast ratio, present only when both colors are known */
  readonly contrastRatio?: number;
  readonly span: TextSpan;
}

export type RiskLevel = 'SAFE' | 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

/** Identifier of an entry in the prompt-injection catalog */
export type PatternId = string;

export interface RiskIssue {
  readonly page: number;
  readonly category: HiddenCategory;
  readonly text: string;
  readonly reasons: readonly string[];
}

export interface RiskAssessment {
  /** Integer in [0, 100] */
  readonly score: number;
  readonly level: RiskLevel;
  readonly totalSpans: number;
  readonly hiddenSpans: number;
  /** Hidden spans per primary category */
  readonly categoryCounts: Readonly<Record<HiddenCategory, number>>;
  /** Hidden spans grouped by ascending page, source order within a page */
  readonly issues: readonly RiskIssue[];
  /** Matched catalog ids in catalog order */
  readonly promptInjectionPatterns: readonly PatternId[];
  readonly promptInjectionDetected: boolean;
}

/** Thresholds consumed by the visibility classifier */
export interface VisibilityThresholds {
  /** Contrast below this ratio is LOW_CONTRAST (default 3.0) */
  contrastThreshold: number;
  /** Contrast below this ratio is INVISIBLE (default 1.5) */
  invisibleContrastThreshold: number;
  /** Font size below this is MICROSCOPIC (default 1.0pt) */
  microscopicFontSize: number;
  /** Font size below this is SMALL (default 4.0pt) */
  smallFontSize: number;
}

/** Span-count floors consumed by the risk aggregator */
export interface RiskThresholds {
  /** Unperceivable spans at or above this count lift the score into HIGH (default 2) */
  invisibleSpanThreshold: number;
  /** Hidden spans at or above this count lift the score into MEDIUM (default 5) */
  suspiciousSpanThreshold: number;
}

/** Which span texts the prompt-injection matcher reads */
export type ScanScope = 'hidden' | 'all';

export interface AnalysisConfig {
  visibility: VisibilityThresholds;
  risk: RiskThresholds;
  scanScope: ScanScope;
  /** Bounds used for pages the span document does not describe */
  pageSize: { width: number; height: number };
}

export interface DocumentAnalysis {
  verdicts: VisibilityVerdict[];
  assessment: RiskAssessment;
}

/** Document-level status shown to users */
export type ScanStatus = 'SAFE' | 'SUSPICIOUS';

export type SanitizationStrategy = 'strip' | 'flag' | 'preserve';

export interface SanitizationReport {
  originalSpanCount: number;
  keptSpanCount: number;
  removedCount: number;
  flaggedCount: number;
  strategy: SanitizationStrategy;
  /** First removed span texts, for review */
  removedTextSample: string[];
  safeText: string;
}

/** Result of scanning one span file */
export type DocumentOutcome =
  | { kind: 'scanned'; file: string; analysis: DocumentAnalysis }
  | { kind: 'failed'; file: string; error: string };

export type ReportFormat = 'markdown' | 'json';
