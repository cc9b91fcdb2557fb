import { unperceivableCount } from './risk-aggregator.js';
import type { RiskAssessment } from './types.js';

/**
 * Generates handling advice for a document from its assessment.
 * Wording depends on the risk level and on what made the document risky.
 */
export function buildRecommendations(assessment: RiskAssessment): string[] {
  const { level, hiddenSpans, categoryCounts, promptInjectionDetected } = assessment;
  const unperceivable = unperceivableCount(categoryCounts);
  const hardToRead = categoryCounts.LOW_CONTRAST + categoryCounts.SMALL;

  switch (level) {
    case 'CRITICAL':
      return [
        'Do not send this document to a language model',
        promptInjectionDetected
          ? 'Prompt injection phrasing found in hidden text'
          : `${hiddenSpans} hidden spans found`,
        'Manual security review required',
        'Consider reporting the document as malicious',
      ];

    case 'HIGH':
      return promptInjectionDetected
        ? [
            'Block language model processing: prompt injection detected',
            'Review the matched patterns before proceeding',
            'Manual review strongly recommended',
          ]
        : [
            'Block language model processing: excessive hidden text',
            `Found ${unperceivable} spans a reader cannot see`,
            'Manual review strongly recommended',
          ];

    case 'MEDIUM': {
      const advice: string[] = [];
      if (unperceivable > 0) {
        advice.push('Warn the user about hidden text before language model processing');
        advice.push(`Strip ${unperceivable} hidden spans from the extracted text`);
      }
      if (hardToRead > 0) {
        advice.push(`Review ${hardToRead} hard-to-read spans for legitimacy`);
      }
      advice.push('Consider manual verification');
      return advice;
    }

    case 'LOW':
      return [
        'Safe to process with caution',
        `Monitor ${hiddenSpans} hard-to-read spans`,
        'Likely legitimate fine print or low-contrast styling',
      ];

    case 'SAFE':
      return ['Safe to process with language models', 'No hidden content detected'];
  }
}
