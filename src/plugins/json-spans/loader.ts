import { z } from 'zod';
import { parseColor } from '../../core/color-utils.js';
import type { RGB, SpanDocument, TextSpan } from '../../core/types.js';
import { SpanDocumentError, type SpanSource } from '../interfaces.js';

const channel = z.number().int().min(0).max(255);

/** CSS color string or [r, g, b] tuple; null means "unknown" */
const colorSchema = z
  .union([z.string(), z.tuple([channel, channel, channel])])
  .transform((value, ctx): RGB => {
    if (typeof value !== 'string') {
      const [r, g, b] = value;
      return { r, g, b };
    }
    const parsed = parseColor(value);
    if (!parsed) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unrecognized color "${value}"` });
      return z.NEVER;
    }
    return parsed;
  });

const spanSchema = z.object({
  text: z.string(),
  page: z.number().int().positive(),
  bbox: z.tuple([z.number(), z.number(), z.number(), z.number()]),
  fontSize: z.number().nullish(),
  color: colorSchema.nullish(),
  backgroundColor: colorSchema.nullish(),
});

const pageSchema = z.object({
  page: z.number().int().positive(),
  width: z.number().positive(),
  height: z.number().positive(),
});

export const spanDocumentSchema = z.object({
  pages: z.array(pageSchema).default([]),
  spans: z.array(spanSchema),
});

type ParsedSpan = z.output<typeof spanSchema>;

/**
 * Builds a TextSpan carrying only the metadata the extractor actually knew.
 * Extractors write null or leave a key out for unknown values; both become absent.
 */
function toTextSpan(raw: ParsedSpan): TextSpan {
  return {
    text: raw.text,
    page: raw.page,
    bbox: raw.bbox,
    ...(raw.fontSize != null ? { fontSize: raw.fontSize } : {}),
    ...(raw.color != null ? { color: raw.color } : {}),
    ...(raw.backgroundColor != null ? { backgroundColor: raw.backgroundColor } : {}),
  };
}

/**
 * Parses a span document from JSON text.
 * Throws SpanDocumentError naming the first offending path.
 */
export function parseSpanDocument(content: string, filePath: string): SpanDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new SpanDocumentError(`invalid JSON (${message})`, filePath, { cause: err });
  }

  const result = spanDocumentSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new SpanDocumentError(
      `${where}${issue?.message ?? 'invalid span document'}`,
      filePath,
      { cause: result.error },
    );
  }

  return {
    pages: result.data.pages,
    spans: result.data.spans.map(toTextSpan),
  };
}

export const jsonSpanSource: SpanSource = {
  filePatterns: ['**/*.spans.json'],
  parse: parseSpanDocument,
};
