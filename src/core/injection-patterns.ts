import type { PatternId, ScanScope, VisibilityVerdict } from './types.js';

export interface InjectionPattern {
  readonly id: PatternId;
  readonly description: string;
  /** Case-insensitive, non-global (no lastIndex state between scans) */
  readonly pattern: RegExp;
}

/**
 * Known instruction-override phrasings. Order is the reporting order.
 */
export const INJECTION_PATTERNS: readonly InjectionPattern[] = Object.freeze([
  {
    id: 'ignore-previous-instructions',
    description: 'Asks the model to ignore earlier instructions',
    pattern: /\bignore\s+(?:all\s+)?(?:the\s+)?(?:previous|prior|above|earlier|all)\s+(?:instructions?|prompts?|commands?|rules)\b/i,
  },
  {
    id: 'disregard-previous',
    description: 'Asks the model to disregard earlier content',
    pattern: /\bdisregard\s+(?:all\s+)?(?:the\s+)?(?:previous|prior|above|earlier|all)\b/i,
  },
  {
    id: 'forget-previous',
    description: 'Asks the model to forget its context',
    pattern: /\bforget\s+(?:everything|all|previous|prior|above|your\s+instructions)\b/i,
  },
  {
    id: 'system-prompt',
    description: 'Mentions the system prompt',
    pattern: /\bsystem\s+prompt\b/i,
  },
  {
    id: 'system-role-prefix',
    description: 'Chat transcript "system:" turn marker',
    pattern: /\bsystem\s*:/i,
  },
  {
    id: 'assistant-role-prefix',
    description: 'Chat transcript "assistant:" turn marker',
    pattern: /\bassistant\s*:/i,
  },
  {
    id: 'role-prefix',
    description: 'Explicit "role:" declaration',
    pattern: /\brole\s*:/i,
  },
  {
    id: 'you-are-now',
    description: 'Reassigns the model identity ("you are now ...")',
    pattern: /\byou\s+are\s+now\b/i,
  },
  {
    id: 'privileged-mode',
    description: 'Claims a debug, developer or unrestricted mode',
    pattern: /\b(?:debug|developer|god|jailbreak|unrestricted)\s+mode\b/i,
  },
  {
    id: 'pretend-persona',
    description: 'Asks the model to pretend to be someone else',
    pattern: /\bpretend\s+(?:to\s+be|you\s+are)\b/i,
  },
  {
    id: 'act-as',
    description: 'Asks the model to act as another persona',
    pattern: /\bact\s+as\s+(?:if|a|an)\b/i,
  },
  {
    id: 'new-instructions',
    description: 'Introduces replacement instructions',
    pattern: /\bnew\s+(?:instructions?|prompts?|commands?)\b/i,
  },
  {
    id: 'override-instructions',
    description: 'Asks to override instructions or settings',
    pattern: /\boverride\s+(?:all\s+)?(?:previous|prior|settings?|instructions?|safety)\b/i,
  },
  {
    id: 'reveal-prompt',
    description: 'Asks the model to reveal its prompt or instructions',
    pattern: /\b(?:reveal|print|show|repeat)\s+(?:your|the)\s+(?:system\s+|initial\s+|hidden\s+)?(?:prompt|instructions)\b/i,
  },
] satisfies InjectionPattern[]);

/**
 * Scans text against the whole catalog.
 * Returns matched pattern ids in catalog order, each at most once.
 */
export function scanForInjection(text: string): PatternId[] {
  if (!text) return [];
  return INJECTION_PATTERNS.filter(({ pattern }) => pattern.test(text)).map(({ id }) => id);
}

/**
 * Builds the text handed to the matcher: hidden span texts by default,
 * every span text for scope 'all'. One span per line.
 */
export function collectScanText(
  verdicts: readonly VisibilityVerdict[],
  scope: ScanScope = 'hidden',
): string {
  return verdicts
    .filter((v) => scope === 'all' || v.isHidden)
    .map((v) => v.span.text)
    .join('\n');
}

/** Looks up a catalog entry by id */
export function describePattern(id: PatternId): string | undefined {
  return INJECTION_PATTERNS.find((p) => p.id === id)?.description;
}
