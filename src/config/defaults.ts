import type { AnalysisConfig } from '../core/types.js';
import type { AuditConfigResolved } from './schema.js';

/** Resolved defaults (what you get with zero config) */
export const DEFAULT_CONFIG: AuditConfigResolved = {
  src: ['**/*.spans.json'],
  contrastThreshold: 3.0,
  invisibleContrastThreshold: 1.5,
  microscopicFontSize: 1.0,
  smallFontSize: 4.0,
  invisibleSpanThreshold: 2,
  suspiciousSpanThreshold: 5,
  scanScope: 'hidden',
  pageSize: { width: 612, height: 792 },
  reportDir: 'hidden-text-reports',
  format: 'markdown',
  sanitize: {
    strategy: 'strip',
    removeSuspicious: false,
    flagPrefix: '[HIDDEN] ',
  },
};

/**
 * Splits a resolved config into the groups the engine consumes.
 */
export function toAnalysisConfig(config: AuditConfigResolved): AnalysisConfig {
  return {
    visibility: {
      contrastThreshold: config.contrastThreshold,
      invisibleContrastThreshold: config.invisibleContrastThreshold,
      microscopicFontSize: config.microscopicFontSize,
      smallFontSize: config.smallFontSize,
    },
    risk: {
      invisibleSpanThreshold: config.invisibleSpanThreshold,
      suspiciousSpanThreshold: config.suspiciousSpanThreshold,
    },
    scanScope: config.scanScope,
    pageSize: { ...config.pageSize },
  };
}

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = toAnalysisConfig(DEFAULT_CONFIG);
