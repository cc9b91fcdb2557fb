import type { SpanDocument } from '../core/types.js';

/**
 * Turns an extractor's output file into a span document.
 * JSON implementation: reads the normalized span format.
 * Other extractors (PDF text layer dumps, OCR output) would plug in here.
 */
export interface SpanSource {
  /** Glob patterns used when no src patterns are configured */
  readonly filePatterns: string[];

  /** Parse a single file's contents */
  parse(content: string, filePath: string): SpanDocument;
}

/**
 * Raised when a span file cannot be read or does not describe a span document.
 * The CLI maps it to exit code 3.
 */
export class SpanDocumentError extends Error {
  readonly filePath: string;

  constructor(message: string, filePath: string, options?: { cause?: unknown }) {
    super(`${filePath}: ${message}`, options);
    this.name = 'SpanDocumentError';
    this.filePath = filePath;
  }
}
