import { z } from 'zod';

const positive = z.number().finite().positive();

export const auditConfigSchema = z
  .object({
    /** Span document glob patterns */
    src: z.array(z.string()).default(['**/*.spans.json']),

    /** Contrast below this ratio is LOW_CONTRAST */
    contrastThreshold: positive.default(3.0),

    /** Contrast below this ratio is INVISIBLE */
    invisibleContrastThreshold: positive.default(1.5),

    /** Font size (pt) below this is MICROSCOPIC */
    microscopicFontSize: positive.default(1.0),

    /** Font size (pt) below this is SMALL */
    smallFontSize: positive.default(4.0),

    /** Unperceivable (invisible, microscopic, offscreen) span count that lifts a document into HIGH */
    invisibleSpanThreshold: z.number().int().positive().default(2),

    /** Hidden span count that lifts a document into MEDIUM */
    suspiciousSpanThreshold: z.number().int().positive().default(5),

    /** Which span texts the prompt-injection matcher reads */
    scanScope: z.enum(['hidden', 'all']).default('hidden'),

    /** Page size for pages a span document does not describe (US Letter, points) */
    pageSize: z.object({
      width: positive,
      height: positive,
    }).default({ width: 612, height: 792 }),

    /** Report output directory */
    reportDir: z.string().default('hidden-text-reports'),

    /** Report format */
    format: z.enum(['markdown', 'json']).default('markdown'),

    /** Defaults for the clean command */
    sanitize: z.object({
      strategy: z.enum(['strip', 'flag', 'preserve']).default('strip'),
      /** strip: also remove low-contrast and small text */
      removeSuspicious: z.boolean().default(false),
      /** flag: prefix put in front of low-contrast and small text */
      flagPrefix: z.string().default('[HIDDEN] '),
    }).default({}),
  })
  .refine((c) => c.invisibleContrastThreshold <= c.contrastThreshold, {
    message: 'invisibleContrastThreshold must not exceed contrastThreshold',
    path: ['invisibleContrastThreshold'],
  })
  .refine((c) => c.microscopicFontSize <= c.smallFontSize, {
    message: 'microscopicFontSize must not exceed smallFontSize',
    path: ['microscopicFontSize'],
  });

export type AuditConfigInput = z.input<typeof auditConfigSchema>;
export type AuditConfigResolved = z.output<typeof auditConfigSchema>;
