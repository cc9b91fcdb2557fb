import { describe, test, expect } from 'vitest';
import { jsonSpanSource, parseSpanDocument } from '../loader.js';
import { SpanDocumentError } from '../../interfaces.js';

const FILE = 'docs/sample.spans.json';

function parse(value: unknown) {
  return parseSpanDocument(JSON.stringify(value), FILE);
}

function errorOf(fn: () => unknown): SpanDocumentError {
  try {
    fn();
  } catch (err) {
    if (err instanceof SpanDocumentError) return err;
    throw err;
  }
  throw new Error('expected a SpanDocumentError');
}

describe('parseSpanDocument', () => {
  test('reads pages and spans with CSS and tuple colors', () => {
    const document = parse({
      pages: [{ page: 1, width: 612, height: 792 }],
      spans: [
        {
          text: 'Hello',
          page: 1,
          bbox: [72, 100, 300, 114],
          fontSize: 12,
          color: '#333333',
          backgroundColor: [255, 255, 255],
        },
      ],
    });

    expect(document).toEqual({
      pages: [{ page: 1, width: 612, height: 792 }],
      spans: [
        {
          text: 'Hello',
          page: 1,
          bbox: [72, 100, 300, 114],
          fontSize: 12,
          color: { r: 51, g: 51, b: 51 },
          backgroundColor: { r: 255, g: 255, b: 255 },
        },
      ],
    });
  });

  test('null and missing metadata become absent fields', () => {
    const document = parse({
      spans: [{ text: 'OCR line', page: 2, bbox: [0, 0, 10, 10], fontSize: null, color: null }],
    });

    expect(document.pages).toEqual([]);
    expect(document.spans[0]).toEqual({ text: 'OCR line', page: 2, bbox: [0, 0, 10, 10] });
    expect(document.spans[0] && 'fontSize' in document.spans[0]).toBe(false);
  });

  test('named colors resolve', () => {
    const document = parse({
      spans: [{ text: 'x', page: 1, bbox: [0, 0, 1, 1], color: 'white' }],
    });
    expect(document.spans[0]?.color).toEqual({ r: 255, g: 255, b: 255 });
  });

  test('keeps color alpha', () => {
    const document = parse({
      spans: [{ text: 'x', page: 1, bbox: [0, 0, 1, 1], color: 'rgba(0, 0, 0, 0)', backgroundColor: 'transparent' }],
    });
    expect(document.spans[0]?.color).toEqual({ r: 0, g: 0, b: 0, a: 0 });
    expect(document.spans[0]?.backgroundColor).toEqual({ r: 0, g: 0, b: 0, a: 0 });
  });

  test('invalid JSON', () => {
    const err = errorOf(() => parseSpanDocument('{ spans: ', FILE));
    expect(err.filePath).toBe(FILE);
    expect(err.message.startsWith(`${FILE}: invalid JSON (`)).toBe(true);
  });

  test('names the offending path', () => {
    const err = errorOf(() => parse({ spans: [{ text: 'x', page: 0, bbox: [0, 0, 1, 1] }] }));
    expect(err.message.startsWith(`${FILE}: spans.0.page: `)).toBe(true);
  });

  test('rejects an unrecognized color', () => {
    const err = errorOf(() =>
      parse({ spans: [{ text: 'x', page: 1, bbox: [0, 0, 1, 1], color: 'not-a-color' }] }),
    );
    expect(err.message).toBe(`${FILE}: spans.0.color: Unrecognized color "not-a-color"`);
  });

  test('rejects out-of-range color channels', () => {
    expect(() =>
      parse({ spans: [{ text: 'x', page: 1, bbox: [0, 0, 1, 1], color: [0, 0, 256] }] }),
    ).toThrow(SpanDocumentError);
  });

  test('requires a spans array', () => {
    const err = errorOf(() => parse({ pages: [] }));
    expect(err.message.startsWith(`${FILE}: spans: `)).toBe(true);
  });

  test('rejects a bbox without four numbers', () => {
    expect(() => parse({ spans: [{ text: 'x', page: 1, bbox: [0, 0, 1] }] })).toThrow(
      SpanDocumentError,
    );
  });
});

describe('jsonSpanSource', () => {
  test('matches span files by default', () => {
    expect(jsonSpanSource.filePatterns).toEqual(['**/*.spans.json']);
  });

  test('parses through parseSpanDocument', () => {
    expect(jsonSpanSource.parse('{"spans": []}', FILE)).toEqual({ pages: [], spans: [] });
  });
});
